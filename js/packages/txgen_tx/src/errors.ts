import type { Sompi } from '@txgen/consensus';
import { TxgenError } from '@txgen/utils';

/**
 * The mature coins cannot cover the target (outputs, reserve and fees)
 */
export class InsufficientFundsError extends TxgenError {
  override name = 'InsufficientFundsError';

  constructor(
    public readonly required: Sompi,
    public readonly available: Sompi
  ) {
    super('INSUFFICIENT_FUNDS', `Insufficient funds: required ${required} sompi, available ${available} sompi`);
  }
}

/**
 * Even the smallest transaction shape for a request is over the mass limit
 */
export class MassExceedsLimitError extends TxgenError {
  override name = 'MassExceedsLimitError';

  constructor(
    public readonly mass: bigint,
    public readonly limit: bigint,
    detail?: string
  ) {
    super('MASS_EXCEEDS_LIMIT', `Transaction mass ${mass} exceeds the limit of ${limit}${detail ? `: ${detail}` : ''}`);
  }
}

export class IndexOutOfRangeError extends TxgenError {
  override name = 'IndexOutOfRangeError';

  constructor(
    public readonly index: number,
    public readonly length: number
  ) {
    super('INDEX_OUT_OF_RANGE', `Input index ${index} is out of range (transaction has ${length} inputs)`);
  }
}

export class AlreadySignedError extends TxgenError {
  override name = 'AlreadySignedError';

  constructor(public readonly index: number) {
    super('ALREADY_SIGNED', `Input ${index} is already signed`);
  }
}

export class IncompleteSignaturesError extends TxgenError {
  override name = 'IncompleteSignaturesError';

  constructor(public readonly missing: readonly number[]) {
    super('INCOMPLETE_SIGNATURES', `Inputs without a signature: ${missing.join(', ')}`);
  }
}

export class AlreadySubmittedError extends TxgenError {
  override name = 'AlreadySubmittedError';

  constructor(public readonly transactionId: string) {
    super('ALREADY_SUBMITTED', `Transaction ${transactionId} was already submitted`);
  }
}

export class InvalidSettingsError extends TxgenError {
  override name = 'InvalidSettingsError';

  constructor(message: string, cause?: Error) {
    super('INVALID_SETTINGS', message, cause);
  }
}

/**
 * Selection and fee did not settle within the pass limit
 */
export class FeeConvergenceError extends TxgenError {
  override name = 'FeeConvergenceError';

  constructor(public readonly passes: number) {
    super('FEE_CONVERGENCE', `Fee did not converge after ${passes} passes`);
  }
}

/**
 * A built transaction does not balance. Indicates a bug, never bad input.
 */
export class ValueConservationError extends TxgenError {
  override name = 'ValueConservationError';

  constructor(
    public readonly inputs: Sompi,
    public readonly outputs: Sompi,
    public readonly fee: Sompi
  ) {
    super('VALUE_CONSERVATION', `Inputs ${inputs} do not equal outputs ${outputs} plus fee ${fee}`);
  }
}

/**
 * A serialized pending transaction cannot be read back
 */
export class InvalidPendingRecordError extends TxgenError {
  override name = 'InvalidPendingRecordError';

  constructor(message: string, cause?: Error) {
    super('INVALID_PENDING_RECORD', message, cause);
  }
}

export class TransactionMismatchError extends TxgenError {
  override name = 'TransactionMismatchError';

  constructor(
    public readonly expected: string,
    public readonly actual: string
  ) {
    super('TRANSACTION_MISMATCH', `Cannot combine transaction ${actual} into ${expected}`);
  }
}

/**
 * Two copies of a transaction carry different signatures for one input
 */
export class SignatureConflictError extends TxgenError {
  override name = 'SignatureConflictError';

  constructor(public readonly index: number) {
    super('SIGNATURE_CONFLICT', `Input ${index} carries a different signature in each copy`);
  }
}

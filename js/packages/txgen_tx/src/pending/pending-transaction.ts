import {
  createTransaction,
  DEFAULT_SEQUENCE,
  withSignatureScripts,
  type Coin,
  type Sompi,
  type Transaction,
} from '@txgen/consensus';
import { createLogger, sumBigInt } from '@txgen/utils';
import type { CandidateTransaction } from '../builder/transaction-builder';
import {
  AlreadySignedError,
  AlreadySubmittedError,
  IncompleteSignaturesError,
  IndexOutOfRangeError,
  InvalidPendingRecordError,
  SignatureConflictError,
  TransactionMismatchError,
} from '../errors';
import {
  SIGHASH_ALL,
  type SignedTransaction,
  type Signer,
  type SigningDescriptor,
  type Submitter,
} from '../types/types';
import { decodePendingRecord, encodePendingRecord, type PendingTransactionRecord } from './pending-record';

const pendingLogger = createLogger('txgen:tx:pending');

export type PendingTransactionKind = PendingTransactionRecord['kind'];

export interface PendingTransactionOptions {
  kind: PendingTransactionKind;
  isFinal: boolean;
  sigOpCount: number;
}

/**
 * Unsigned transaction with one signature slot per input.
 *
 * Lifecycle: unsigned, signed in place, finalized, submitted exactly once.
 *
 * @example
 * ```typescript
 * const pending = generator.next();
 * if (pending !== END) {
 *   await pending.sign(signer);
 *   const txid = await pending.submit(submitter);
 * }
 * ```
 */
export class PendingTransaction {
  readonly transaction: Transaction;
  readonly kind: PendingTransactionKind;
  readonly isFinal: boolean;
  private readonly candidate: CandidateTransaction;
  private readonly signatures: (Uint8Array | undefined)[];
  private submitted = false;

  constructor(candidate: CandidateTransaction, options: PendingTransactionOptions) {
    this.candidate = candidate;
    this.kind = options.kind;
    this.isFinal = options.isFinal;
    this.signatures = new Array<Uint8Array | undefined>(candidate.inputs.length).fill(undefined);

    const outputs = [...candidate.outputs, ...(candidate.change ? [candidate.change] : [])];
    this.transaction = createTransaction({
      inputs: candidate.inputs.map((coin) => ({
        previousOutpoint: coin.outpoint,
        signatureScript: new Uint8Array(0),
        sequence: DEFAULT_SEQUENCE,
        sigOpCount: options.sigOpCount,
        utxo: coin,
      })),
      outputs: outputs.map((output) => ({ value: output.amount, scriptPublicKey: output.scriptPublicKey })),
      payload: candidate.payload,
      mass: candidate.mass,
    });
  }

  /**
   * Rebuild a pending transaction, signature slots included, from `toRecord()` output
   *
   * @throws InvalidPendingRecordError when the record is malformed or its id does not match
   */
  static fromRecord(record: unknown): PendingTransaction {
    const decoded = decodePendingRecord(record);
    const pending = new PendingTransaction(decoded.candidate, {
      kind: decoded.kind,
      isFinal: decoded.isFinal,
      sigOpCount: decoded.sigOpCount,
    });
    if (pending.id !== decoded.id) {
      throw new InvalidPendingRecordError(`Transaction id ${decoded.id} does not match its contents (${pending.id})`);
    }
    decoded.signatures.forEach((signature, index) => {
      pending.signatures[index] = signature;
    });
    return pending;
  }

  /**
   * @throws InvalidPendingRecordError when `json` is not a pending transaction record
   */
  static deserialize(json: string): PendingTransaction {
    let record: unknown;
    try {
      record = JSON.parse(json);
    } catch (error) {
      throw new InvalidPendingRecordError(
        'Pending transaction is not valid JSON',
        error instanceof Error ? error : undefined
      );
    }
    return PendingTransaction.fromRecord(record);
  }

  get id(): string {
    return this.transaction.id;
  }

  get entries(): readonly Coin[] {
    return this.candidate.inputs;
  }

  get fee(): Sompi {
    return this.candidate.fee;
  }

  get networkFee(): Sompi {
    return this.candidate.networkFee;
  }

  get priorityFee(): Sompi {
    return this.candidate.priorityFee;
  }

  get mass(): bigint {
    return this.candidate.mass;
  }

  get computeMass(): bigint {
    return this.candidate.computeMass;
  }

  get storageMass(): bigint {
    return this.candidate.storageMass;
  }

  /**
   * Value paid to the requested outputs (change excluded)
   */
  get paymentAmount(): Sompi {
    return sumBigInt(this.candidate.outputs.map((output) => output.amount));
  }

  get changeAmount(): Sompi {
    return this.candidate.change?.amount ?? 0n;
  }

  get aggregateInputAmount(): Sompi {
    return sumBigInt(this.candidate.inputs.map((coin) => coin.amount));
  }

  get aggregateOutputAmount(): Sompi {
    return this.paymentAmount + this.changeAmount;
  }

  /**
   * Distinct addresses owning the inputs, in input order
   */
  addresses(): string[] {
    const seen = new Set<string>();
    for (const coin of this.candidate.inputs) {
      if (coin.address !== undefined) seen.add(coin.address);
    }
    return [...seen];
  }

  signingDescriptors(): SigningDescriptor[] {
    return this.candidate.inputs.map((coin, index) => ({
      index,
      outpoint: coin.outpoint,
      amount: coin.amount,
      scriptPublicKey: coin.scriptPublicKey,
      ...(coin.address === undefined ? {} : { address: coin.address }),
      sigHashType: SIGHASH_ALL,
    }));
  }

  /**
   * Fill one signature slot
   *
   * @throws IndexOutOfRangeError if `index` is not an input
   * @throws AlreadySignedError if the slot is filled
   */
  signInput(index: number, signatureScript: Uint8Array): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.signatures.length) {
      throw new IndexOutOfRangeError(index, this.signatures.length);
    }
    if (this.signatures[index] !== undefined) {
      throw new AlreadySignedError(index);
    }
    this.signatures[index] = Uint8Array.from(signatureScript);
  }

  /**
   * Ask `signer` for every empty slot, in input order
   */
  async sign(signer: Signer): Promise<void> {
    for (const descriptor of this.signingDescriptors()) {
      if (this.signatures[descriptor.index] !== undefined) continue;
      const signatureScript = await signer.sign(descriptor, this.transaction);
      this.signInput(descriptor.index, signatureScript);
    }
    pendingLogger.debug('Transaction signed', { id: this.id, inputs: this.signatures.length });
  }

  isFullySigned(): boolean {
    return this.signatures.every((signature) => signature !== undefined);
  }

  /**
   * @throws IncompleteSignaturesError if any slot is empty
   */
  finalize(): SignedTransaction {
    const scripts: Uint8Array[] = [];
    const missing: number[] = [];
    this.signatures.forEach((signature, index) => {
      if (signature === undefined) {
        missing.push(index);
      } else {
        scripts.push(signature);
      }
    });

    if (missing.length > 0) {
      throw new IncompleteSignaturesError(missing);
    }

    const transaction = withSignatureScripts(this.transaction, scripts);
    return { id: transaction.id, transaction };
  }

  toRecord(): PendingTransactionRecord {
    return encodePendingRecord({
      transaction: this.transaction,
      kind: this.kind,
      isFinal: this.isFinal,
      candidate: this.candidate,
      signatures: this.signatures,
    });
  }

  serialize(): string {
    return JSON.stringify(this.toRecord());
  }

  /**
   * Copy into this transaction the signatures another copy of it holds for
   * slots still empty here. Nothing is copied when any slot conflicts.
   *
   * @throws TransactionMismatchError if `other` is a different transaction
   * @throws SignatureConflictError if both copies signed an input differently
   */
  combine(other: PendingTransaction): this {
    if (other.id !== this.id) {
      throw new TransactionMismatchError(this.id, other.id);
    }

    const incoming: number[] = [];
    other.signatures.forEach((theirs, index) => {
      if (theirs === undefined) return;
      const ours = this.signatures[index];
      if (ours === undefined) {
        incoming.push(index);
      } else if (!bytesEqual(ours, theirs)) {
        throw new SignatureConflictError(index);
      }
    });

    for (const index of incoming) {
      const signature = other.signatures[index];
      if (signature !== undefined) {
        this.signatures[index] = Uint8Array.from(signature);
      }
    }
    pendingLogger.debug('Combined signatures', { id: this.id, added: incoming.length });
    return this;
  }

  get isSubmitted(): boolean {
    return this.submitted;
  }

  /**
   * Finalize and hand the transaction to `submitter`. Single use: a second
   * call throws even if the first submission was rejected.
   *
   * @returns The id reported by the submitter
   * @throws AlreadySubmittedError on a second call
   */
  async submit(submitter: Submitter): Promise<string> {
    if (this.submitted) {
      throw new AlreadySubmittedError(this.id);
    }
    const signed = this.finalize();
    this.submitted = true;

    pendingLogger.debug('Submitting transaction', { id: this.id, kind: this.kind });
    return submitter.submit(signed);
  }
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, index) => byte === b[index]);
}

import type { Outpoint, ScriptPublicKey, Sompi, Transaction } from '@txgen/consensus';

/**
 * Pay `amount` sompi to `address`
 */
export interface PaymentOutput {
  address: string;
  amount: Sompi;
}

/**
 * Pay everything left after the other outputs and fees. Must be the last output.
 */
export interface SweepOutput {
  address: string;
  amount: 'all';
}

export type OutputRequest = PaymentOutput | SweepOutput;

/**
 * An output with its locking script resolved
 */
export interface ResolvedOutput {
  readonly address: string;
  readonly amount: Sompi;
  readonly scriptPublicKey: ScriptPublicKey;
}

/**
 * Maps an address to its locking script. Address encoding lives outside the engine.
 */
export interface ScriptResolver {
  resolve(address: string): ScriptPublicKey;
}

export const SIGHASH_ALL = 0x01;

/**
 * Everything a signer needs for one input
 */
export interface SigningDescriptor {
  index: number;
  outpoint: Outpoint;
  amount: Sompi;
  scriptPublicKey: ScriptPublicKey;
  address?: string;
  sigHashType: number;
}

export interface Signer {
  /** @returns The signature script for the input */
  sign(descriptor: SigningDescriptor, transaction: Transaction): Promise<Uint8Array>;
}

export interface SignedTransaction {
  readonly id: string;
  readonly transaction: Transaction;
}

export interface Submitter {
  /** @returns The transaction id reported by the node */
  submit(transaction: SignedTransaction): Promise<string>;
}

/**
 * Running totals of one generator run
 */
export interface GeneratorSummary {
  networkId: string;
  transactionsProduced: number;
  totalFees: Sompi;
  totalMass: bigint;
  /** Coins taken from the caller's set; chained change outputs are not counted */
  totalInputsConsumed: number;
  /** Payment value of the final transaction */
  finalAmount?: Sompi;
  finalTransactionId?: string;
}


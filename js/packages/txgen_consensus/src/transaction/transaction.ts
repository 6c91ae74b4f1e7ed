import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import type { Coin, Outpoint, ScriptPublicKey, Sompi } from '../types/types';
import { HashWriter } from './hash-writer';

export const TRANSACTION_VERSION = 0;
export const SUBNETWORK_ID_NATIVE = '00'.repeat(20);
export const DEFAULT_SEQUENCE = 0n;

export interface TransactionInput {
  readonly previousOutpoint: Outpoint;
  readonly signatureScript: Uint8Array;
  readonly sequence: bigint;
  readonly sigOpCount: number;
  /** Spent coin, when known; needed for storage mass and signing */
  readonly utxo?: Coin;
}

export interface TransactionOutput {
  readonly value: Sompi;
  readonly scriptPublicKey: ScriptPublicKey;
}

export interface Transaction {
  readonly id: string;
  readonly version: number;
  readonly inputs: readonly TransactionInput[];
  readonly outputs: readonly TransactionOutput[];
  readonly lockTime: bigint;
  /** 20-byte subnetwork id, hex */
  readonly subnetworkId: string;
  readonly gas: bigint;
  readonly payload: Uint8Array;
  /** Committed mass; 0 when not set */
  readonly mass: bigint;
}

export interface TransactionFields {
  inputs: readonly TransactionInput[];
  outputs: readonly TransactionOutput[];
  version?: number;
  lockTime?: bigint;
  subnetworkId?: string;
  gas?: bigint;
  payload?: Uint8Array;
  mass?: bigint;
}

/**
 * Transaction id: keyed BLAKE2b-256 over the serialization with signature
 * scripts left out, so signing never changes the id.
 */
export function computeTransactionId(tx: Omit<Transaction, 'id'>): string {
  const writer = new HashWriter('TransactionID');

  writer.u16(tx.version).u64(BigInt(tx.inputs.length));
  for (const input of tx.inputs) {
    writer
      .bytes(hexToBytes(input.previousOutpoint.transactionId))
      .u32(input.previousOutpoint.index)
      .varBytes(new Uint8Array(0))
      .u64(input.sequence);
  }

  writer.u64(BigInt(tx.outputs.length));
  for (const output of tx.outputs) {
    writer.u64(output.value).u16(output.scriptPublicKey.version).varBytes(output.scriptPublicKey.script);
  }

  writer.u64(tx.lockTime).bytes(hexToBytes(tx.subnetworkId)).u64(tx.gas).varBytes(tx.payload);

  return bytesToHex(writer.finalize());
}

/**
 * Assemble a frozen transaction and compute its id
 *
 * @example
 * ```typescript
 * const tx = createTransaction({ inputs, outputs, payload: new Uint8Array() });
 * console.log(tx.id);
 * ```
 */
export function createTransaction(fields: TransactionFields): Transaction {
  const body = {
    version: fields.version ?? TRANSACTION_VERSION,
    inputs: Object.freeze(fields.inputs.map((input) => Object.freeze({ ...input }))),
    outputs: Object.freeze(fields.outputs.map((output) => Object.freeze({ ...output }))),
    lockTime: fields.lockTime ?? 0n,
    subnetworkId: fields.subnetworkId ?? SUBNETWORK_ID_NATIVE,
    gas: fields.gas ?? 0n,
    payload: fields.payload ?? new Uint8Array(0),
    mass: fields.mass ?? 0n,
  };

  return Object.freeze({ id: computeTransactionId(body), ...body });
}

/**
 * Copy of `tx` with the given signature scripts placed on its inputs
 */
export function withSignatureScripts(tx: Transaction, scripts: readonly Uint8Array[]): Transaction {
  if (scripts.length !== tx.inputs.length) {
    throw new RangeError(`Expected ${tx.inputs.length} signature scripts, got ${scripts.length}`);
  }
  return createTransaction({
    ...tx,
    inputs: tx.inputs.map((input, i) => ({ ...input, signatureScript: scripts[i] })),
  });
}

export function totalInputAmount(tx: Transaction): Sompi | undefined {
  let total = 0n;
  for (const input of tx.inputs) {
    if (!input.utxo) return undefined;
    total += input.utxo.amount;
  }
  return total;
}

export function totalOutputAmount(tx: Transaction): Sompi {
  return tx.outputs.reduce((sum, output) => sum + output.value, 0n);
}

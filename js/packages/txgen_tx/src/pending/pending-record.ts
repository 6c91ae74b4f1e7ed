import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import {
  describeZodError,
  hexSchema,
  transactionFromRecord,
  transactionToRecord,
  u64Schema,
  type Coin,
  type Transaction,
  type TransactionRecord,
} from '@txgen/consensus';
import { sumBigInt } from '@txgen/utils';
import { z } from 'zod';
import type { CandidateTransaction } from '../builder/transaction-builder';
import { InvalidPendingRecordError } from '../errors';
import type { ResolvedOutput } from '../types/types';

export const PENDING_RECORD_VERSION = 1;

/**
 * JSON-safe form of a pending transaction, passed between signers and
 * merged back with `PendingTransaction.combine`.
 */
export interface PendingTransactionRecord {
  version: typeof PENDING_RECORD_VERSION;
  kind: 'compound' | 'payment';
  isFinal: boolean;
  /** Unsigned; every input carries its UTXO entry */
  transaction: TransactionRecord;
  /** One per transaction output */
  addresses: string[];
  /** The last output is change */
  hasChange: boolean;
  computeMass: string;
  storageMass: string;
  networkFee: string;
  priorityFee: string;
  /** One slot per input, `null` until signed */
  signatures: (string | null)[];
}

const pendingRecordSchema = z
  .object({
    version: z.literal(PENDING_RECORD_VERSION),
    kind: z.enum(['compound', 'payment']),
    isFinal: z.boolean(),
    transaction: z.unknown(),
    addresses: z.array(z.string().min(1)),
    hasChange: z.boolean(),
    computeMass: u64Schema,
    storageMass: u64Schema,
    networkFee: u64Schema,
    priorityFee: u64Schema,
    signatures: z.array(hexSchema.min(2, 'must not be empty').nullable()),
  })
  .strict();

export interface DecodedPendingRecord {
  kind: PendingTransactionRecord['kind'];
  isFinal: boolean;
  sigOpCount: number;
  candidate: CandidateTransaction;
  signatures: (Uint8Array | undefined)[];
  id: string;
}

export function encodePendingRecord(parts: {
  transaction: Transaction;
  kind: PendingTransactionRecord['kind'];
  isFinal: boolean;
  candidate: CandidateTransaction;
  signatures: readonly (Uint8Array | undefined)[];
}): PendingTransactionRecord {
  const { candidate } = parts;
  const outputs = candidate.change ? [...candidate.outputs, candidate.change] : candidate.outputs;
  return {
    version: PENDING_RECORD_VERSION,
    kind: parts.kind,
    isFinal: parts.isFinal,
    transaction: transactionToRecord(parts.transaction),
    addresses: outputs.map((output) => output.address),
    hasChange: candidate.change !== undefined,
    computeMass: candidate.computeMass.toString(),
    storageMass: candidate.storageMass.toString(),
    networkFee: candidate.networkFee.toString(),
    priorityFee: candidate.priorityFee.toString(),
    signatures: parts.signatures.map((signature) => (signature === undefined ? null : bytesToHex(signature))),
  };
}

/**
 * @throws InvalidPendingRecordError when the record is malformed or does not balance
 */
export function decodePendingRecord(record: unknown): DecodedPendingRecord {
  const parsed = pendingRecordSchema.safeParse(record);
  if (!parsed.success) {
    throw new InvalidPendingRecordError(`Invalid pending transaction: ${describeZodError(parsed.error)}`, parsed.error);
  }
  const data = parsed.data;

  let transaction: Transaction;
  try {
    transaction = transactionFromRecord(data.transaction);
  } catch (error) {
    throw new InvalidPendingRecordError(
      `Invalid pending transaction: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }

  const inputs: Coin[] = transaction.inputs.map((input, index) => {
    if (!input.utxo) {
      throw new InvalidPendingRecordError(`Input ${index} carries no UTXO entry`);
    }
    return input.utxo;
  });
  if (data.signatures.length !== inputs.length) {
    throw new InvalidPendingRecordError(`Expected ${inputs.length} signature slots, got ${data.signatures.length}`);
  }
  if (data.addresses.length !== transaction.outputs.length) {
    throw new InvalidPendingRecordError(
      `Expected ${transaction.outputs.length} output addresses, got ${data.addresses.length}`
    );
  }

  const resolved: ResolvedOutput[] = transaction.outputs.map((output, index) => ({
    address: data.addresses[index] ?? '',
    amount: output.value,
    scriptPublicKey: output.scriptPublicKey,
  }));
  const change = data.hasChange ? resolved.pop() : undefined;
  if (data.hasChange && change === undefined) {
    throw new InvalidPendingRecordError('Record marks a change output but the transaction has none');
  }

  const inputTotal = sumBigInt(inputs.map((coin) => coin.amount));
  const outputTotal = sumBigInt(transaction.outputs.map((output) => output.value));
  const fee = inputTotal - outputTotal;
  if (fee < data.networkFee + data.priorityFee) {
    throw new InvalidPendingRecordError(
      `Inputs ${inputTotal} do not cover outputs ${outputTotal} and fees ${data.networkFee + data.priorityFee}`
    );
  }

  return {
    kind: data.kind,
    isFinal: data.isFinal,
    sigOpCount: transaction.inputs[0]?.sigOpCount ?? 1,
    candidate: {
      inputs,
      outputs: resolved,
      ...(change ? { change } : {}),
      payload: transaction.payload,
      computeMass: data.computeMass,
      storageMass: data.storageMass,
      mass: transaction.mass,
      networkFee: data.networkFee,
      priorityFee: data.priorityFee,
      fee,
    },
    signatures: data.signatures.map((hex) => (hex === null ? undefined : hexToBytes(hex))),
    id: transaction.id,
  };
}

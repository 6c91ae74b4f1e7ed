import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { z } from 'zod';
import { InvalidUtxoRecordError } from '../errors';
import { scriptPublicKeyToHex } from '../utxo/script-public-key';
import {
  describeZodError,
  hexSchema,
  outpointSchema,
  scriptPublicKeySchema,
  u64Schema,
  utxoEntryFromRecord,
  utxoEntryToRecord,
  type UtxoEntryRecord,
} from '../utxo/utxo-entry';
import { createTransaction, type Transaction, type TransactionInput } from './transaction';

const inputSchema = z
  .object({
    previousOutpoint: outpointSchema,
    signatureScript: hexSchema.default(''),
    sequence: u64Schema.default(0n),
    sigOpCount: z.number().int().min(0).max(0xff).default(1),
    utxo: z.unknown().optional(),
  })
  .strict();

const outputSchema = z
  .object({
    value: u64Schema,
    scriptPublicKey: scriptPublicKeySchema,
  })
  .strict();

const transactionSchema = z
  .object({
    id: z.string().optional(),
    version: z.number().int().min(0).max(0xffff).default(0),
    inputs: z.array(inputSchema),
    outputs: z.array(outputSchema),
    lockTime: u64Schema.default(0n),
    subnetworkId: z
      .string()
      .regex(/^[0-9a-fA-F]{40}$/, 'must be 20 bytes of hex')
      .transform((id) => id.toLowerCase())
      .optional(),
    gas: u64Schema.default(0n),
    payload: hexSchema.default(''),
    mass: u64Schema.default(0n),
  })
  .strict();

export interface TransactionInputRecord {
  previousOutpoint: { transactionId: string; index: number };
  signatureScript: string;
  sequence: string;
  sigOpCount: number;
  utxo?: UtxoEntryRecord;
}

export interface TransactionOutputRecord {
  value: string;
  scriptPublicKey: string;
}

export interface TransactionRecord {
  id: string;
  version: number;
  inputs: TransactionInputRecord[];
  outputs: TransactionOutputRecord[];
  lockTime: string;
  subnetworkId: string;
  gas: string;
  payload: string;
  mass: string;
}

export function transactionToRecord(tx: Transaction): TransactionRecord {
  return {
    id: tx.id,
    version: tx.version,
    inputs: tx.inputs.map((input) => ({
      previousOutpoint: {
        transactionId: input.previousOutpoint.transactionId,
        index: input.previousOutpoint.index,
      },
      signatureScript: bytesToHex(input.signatureScript),
      sequence: input.sequence.toString(),
      sigOpCount: input.sigOpCount,
      ...(input.utxo ? { utxo: utxoEntryToRecord(input.utxo) } : {}),
    })),
    outputs: tx.outputs.map((output) => ({
      value: output.value.toString(),
      scriptPublicKey: scriptPublicKeyToHex(output.scriptPublicKey),
    })),
    lockTime: tx.lockTime.toString(),
    subnetworkId: tx.subnetworkId,
    gas: tx.gas.toString(),
    payload: bytesToHex(tx.payload),
    mass: tx.mass.toString(),
  };
}

/**
 * Rebuild a transaction from its dictionary form. A supplied `id` must match
 * the id computed from the contents.
 */
export function transactionFromRecord(record: unknown): Transaction {
  const parsed = transactionSchema.safeParse(record);
  if (!parsed.success) {
    throw new InvalidUtxoRecordError(`Invalid transaction: ${describeZodError(parsed.error)}`, parsed.error);
  }

  const { id, inputs, payload, ...rest } = parsed.data;

  const txInputs: TransactionInput[] = inputs.map((input) => {
    const base = {
      previousOutpoint: input.previousOutpoint,
      signatureScript: hexToBytes(input.signatureScript),
      sequence: input.sequence,
      sigOpCount: input.sigOpCount,
    };
    return input.utxo === undefined ? base : { ...base, utxo: utxoEntryFromRecord(input.utxo) };
  });

  const tx = createTransaction({ ...rest, inputs: txInputs, payload: hexToBytes(payload) });

  if (id !== undefined && id.toLowerCase() !== tx.id) {
    throw new InvalidUtxoRecordError(`Transaction id ${id} does not match its contents (${tx.id})`);
  }
  return tx;
}

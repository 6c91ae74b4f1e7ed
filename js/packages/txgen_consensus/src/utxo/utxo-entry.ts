import { hexToBytes } from '@noble/hashes/utils';
import { U64_MAX } from '@txgen/utils';
import { z } from 'zod';
import { InvalidUtxoRecordError } from '../errors';
import { createCoin, type Coin } from '../types/types';
import { scriptPublicKeyFromHex, scriptPublicKeyToHex } from './script-public-key';

const HEX = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * u64 accepted as a bigint, a safe integer or a decimal string
 */
export const u64Schema = z
  .union([
    z.bigint(),
    z.number().int().nonnegative().refine(Number.isSafeInteger, 'must be a safe integer'),
    z.string().regex(/^\d+$/, 'must be a decimal integer'),
  ])
  .transform((value) => BigInt(value))
  .refine((value) => value >= 0n && value <= U64_MAX, 'must fit in 64 bits');

export const hexSchema = z.string().regex(HEX, 'must be even-length hex');

export const outpointSchema = z
  .object({
    transactionId: z
      .string()
      .regex(/^[0-9a-fA-F]{64}$/, 'must be 32 bytes of hex')
      .transform((id) => id.toLowerCase()),
    index: z.number().int().min(0).max(0xffff_ffff),
  })
  .strict();

export const scriptPublicKeySchema = z.union([
  z
    .object({
      version: z.number().int().min(0).max(0xffff),
      script: hexSchema,
    })
    .strict()
    .transform(({ version, script }) => ({ version, script: hexToBytes(script) })),
  hexSchema
    .refine((hex) => hex.length >= 4, 'must carry a 2-byte version prefix')
    .transform(scriptPublicKeyFromHex),
]);

export const utxoEntryRecordSchema = z
  .object({
    address: z.string().min(1).nullish(),
    outpoint: outpointSchema,
    amount: u64Schema,
    scriptPublicKey: scriptPublicKeySchema,
    blockDaaScore: u64Schema,
    isCoinbase: z.boolean(),
  })
  .strict();

export type UtxoEntryInput = z.input<typeof utxoEntryRecordSchema>;

/**
 * JSON-safe dictionary form of a coin
 */
export interface UtxoEntryRecord {
  address?: string;
  outpoint: { transactionId: string; index: number };
  amount: string;
  scriptPublicKey: string;
  blockDaaScore: string;
  isCoinbase: boolean;
}

export function describeZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse a coin from its dictionary form; unknown keys are rejected
 *
 * @example
 * ```typescript
 * const coin = utxoEntryFromRecord({
 *   outpoint: { transactionId: 'ab'.repeat(32), index: 0 },
 *   amount: '100000000',
 *   scriptPublicKey: { version: 0, script: '20' + '11'.repeat(32) + 'ac' },
 *   blockDaaScore: 12345,
 *   isCoinbase: false,
 * });
 * ```
 */
export function utxoEntryFromRecord(record: unknown): Coin {
  const parsed = utxoEntryRecordSchema.safeParse(record);
  if (!parsed.success) {
    throw new InvalidUtxoRecordError(`Invalid UTXO entry: ${describeZodError(parsed.error)}`, parsed.error);
  }

  const { address, ...rest } = parsed.data;
  return createCoin(address ? { ...rest, address } : rest);
}

export function utxoEntryToRecord(coin: Coin): UtxoEntryRecord {
  return {
    ...(coin.address === undefined ? {} : { address: coin.address }),
    outpoint: { transactionId: coin.outpoint.transactionId, index: coin.outpoint.index },
    amount: coin.amount.toString(),
    scriptPublicKey: scriptPublicKeyToHex(coin.scriptPublicKey),
    blockDaaScore: coin.blockDaaScore.toString(),
    isCoinbase: coin.isCoinbase,
  };
}

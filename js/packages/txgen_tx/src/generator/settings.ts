import { hexToBytes } from '@noble/hashes/utils';
import {
  describeZodError,
  getConsensusParams,
  isCoin,
  normalizeNetworkId,
  type Coin,
  type ConsensusParams,
  type ScriptPublicKey,
  type Sompi,
} from '@txgen/consensus';
import { isMaturitySet, matureCoins, type MaturitySet } from '@txgen/utxo';
import { z } from 'zod';
import { InvalidSettingsError } from '../errors';
import type { OutputRequest, ResolvedOutput, ScriptResolver } from '../types/types';

function isNetworkId(value: string): boolean {
  try {
    normalizeNetworkId(value);
    return true;
  } catch {
    return false;
  }
}

const coinSchema = z.custom<Coin>(isCoin, { message: 'must be a coin' });
const maturitySetSchema = z.custom<MaturitySet>(isMaturitySet, { message: 'must be a maturity set' });

const outputSchema = z
  .object({
    address: z.string().min(1),
    amount: z.union([z.bigint().positive(), z.literal('all')]),
  })
  .strict();

/**
 * Generator request. Unknown keys are rejected.
 */
export const generatorSettingsSchema = z
  .object({
    /** Spendable coins; for a maturity set only the mature coins are used */
    entries: z.union([z.array(coinSchema), maturitySetSchema]),
    outputs: z.array(outputSchema).default([]),
    changeAddress: z.string().min(1),
    priorityFee: z.bigint().nonnegative().default(0n),
    /** Coins spent first, in this order */
    priorityEntries: z.array(coinSchema).default([]),
    payload: z
      .union([
        z.instanceof(Uint8Array),
        z.string().regex(/^(?:[0-9a-fA-F]{2})*$/, 'must be even-length hex'),
      ])
      .default(new Uint8Array(0))
      .transform((payload) => (typeof payload === 'string' ? hexToBytes(payload) : Uint8Array.from(payload))),
    sigOpCount: z.number().int().min(1).max(255).default(1),
    minimumSignatures: z.number().int().min(1).max(255).default(1),
    /** Sompi per gram of mass; network default when omitted */
    feeRate: z.number().finite().nonnegative().optional(),
    networkId: z.string().refine(isNetworkId, 'must be mainnet, testnet-<n>, devnet or simnet').default('mainnet'),
  })
  .strict()
  .superRefine((settings, ctx) => {
    settings.outputs.forEach((output, index) => {
      if (output.amount === 'all' && index !== settings.outputs.length - 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['outputs', index, 'amount'],
          message: 'a sweep output must be the last output',
        });
      }
    });
  });

export type GeneratorSettings = z.input<typeof generatorSettingsSchema>;

export interface GeneratorOptions {
  scripts: ScriptResolver;
  /** Overrides the parameters of `settings.networkId` */
  params?: ConsensusParams;
}

/**
 * Validated request with scripts resolved, pinned for the life of a generator
 */
export interface ResolvedSettings {
  readonly networkId: string;
  readonly params: ConsensusParams;
  readonly entries: readonly Coin[];
  readonly priorityEntries: readonly Coin[];
  readonly outputs: readonly ResolvedOutput[];
  /** Present when the request ends with an `amount: 'all'` output (or has no outputs) */
  readonly sweep?: Omit<ResolvedOutput, 'amount'>;
  readonly change: Omit<ResolvedOutput, 'amount'>;
  readonly priorityFee: Sompi;
  readonly payload: Uint8Array;
  readonly sigOpCount: number;
  readonly minimumSignatures: number;
  readonly feeRate: number;
}

function resolveScript(scripts: ScriptResolver, address: string): ScriptPublicKey {
  const spk = scripts.resolve(address);
  return Object.freeze({ version: spk.version, script: Uint8Array.from(spk.script) });
}

/**
 * Validate `settings` and resolve every address to its script
 *
 * @throws InvalidSettingsError on a malformed request
 */
export function resolveSettings(settings: unknown, options: GeneratorOptions): ResolvedSettings {
  const parsed = generatorSettingsSchema.safeParse(settings);
  if (!parsed.success) {
    throw new InvalidSettingsError(`Invalid generator settings: ${describeZodError(parsed.error)}`, parsed.error);
  }

  const data = parsed.data;
  const networkId = normalizeNetworkId(data.networkId);
  const params = options.params ?? getConsensusParams(networkId);
  const change = { address: data.changeAddress, scriptPublicKey: resolveScript(options.scripts, data.changeAddress) };

  // No outputs at all means: send everything to the change address
  const requests: OutputRequest[] =
    data.outputs.length === 0 ? [{ address: data.changeAddress, amount: 'all' }] : data.outputs;

  const outputs: ResolvedOutput[] = [];
  let sweep: Omit<ResolvedOutput, 'amount'> | undefined;
  for (const request of requests) {
    const scriptPublicKey = resolveScript(options.scripts, request.address);
    if (request.amount === 'all') {
      sweep = { address: request.address, scriptPublicKey };
    } else {
      outputs.push({ address: request.address, amount: request.amount, scriptPublicKey });
    }
  }

  return Object.freeze({
    networkId,
    params,
    entries: Object.freeze(isMaturitySet(data.entries) ? matureCoins(data.entries) : [...data.entries]),
    priorityEntries: Object.freeze([...data.priorityEntries]),
    outputs: Object.freeze(outputs),
    ...(sweep ? { sweep } : {}),
    change,
    priorityFee: data.priorityFee,
    payload: data.payload,
    sigOpCount: data.sigOpCount,
    minimumSignatures: data.minimumSignatures,
    feeRate: data.feeRate ?? params.defaultFeeRate,
  });
}

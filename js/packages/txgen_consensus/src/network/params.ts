import { normalizeNetworkId, type NetworkId } from './network-id';

export const SOMPI_PER_KASPA = 100_000_000n;

/**
 * Static consensus constants the engine needs for one network
 */
export interface ConsensusParams {
  readonly networkId: string;
  /** Upper bound on the mass of a standard (relayable) transaction */
  readonly maximumStandardTransactionMass: bigint;
  readonly massPerTxByte: bigint;
  readonly massPerScriptPubKeyByte: bigint;
  readonly massPerSigOp: bigint;
  /** KIP-9 storage mass parameter `C` */
  readonly storageMassParameter: bigint;
  /** DAA score distance before a coinbase output may be spent */
  readonly coinbaseMaturity: bigint;
  /** DAA score distance before an ordinary output may be spent */
  readonly userTransactionMaturity: bigint;
  /** Sompi per 1000 grams of mass */
  readonly minimumRelayTransactionFee: bigint;
  /** Sompi per gram applied when the caller sets no fee rate */
  readonly defaultFeeRate: number;
}

type ParamsPatch = Partial<Omit<ConsensusParams, 'networkId'>>;

const BASE_PARAMS: Omit<ConsensusParams, 'networkId'> = {
  maximumStandardTransactionMass: 100_000n,
  massPerTxByte: 1n,
  massPerScriptPubKeyByte: 10n,
  massPerSigOp: 1_000n,
  storageMassParameter: SOMPI_PER_KASPA * 10_000n,
  coinbaseMaturity: 1_000n,
  userTransactionMaturity: 100n,
  minimumRelayTransactionFee: 1_000n,
  defaultFeeRate: 1,
};

// Runtime maturity overrides keyed by canonical network id
const maturityOverrides = new Map<string, { coinbase?: bigint; user?: bigint }>();

/**
 * Consensus parameters for a network, with any maturity overrides applied
 *
 * @example
 * ```typescript
 * const params = getConsensusParams('testnet-10');
 * params.maximumStandardTransactionMass; // 100000n
 * ```
 */
export function getConsensusParams(networkId: string | NetworkId = 'mainnet'): ConsensusParams {
  const id = normalizeNetworkId(networkId);
  const overrides = maturityOverrides.get(id);

  return Object.freeze({
    ...BASE_PARAMS,
    networkId: id,
    coinbaseMaturity: overrides?.coinbase ?? BASE_PARAMS.coinbaseMaturity,
    userTransactionMaturity: overrides?.user ?? BASE_PARAMS.userTransactionMaturity,
  });
}

/**
 * Frozen copy of `params` with `patch` applied (custom devnets, tests)
 */
export function withConsensusOverrides(params: ConsensusParams, patch: ParamsPatch): ConsensusParams {
  return Object.freeze({ ...params, ...patch });
}

function assertDaaPeriod(value: bigint): void {
  if (value < 0n) {
    throw new RangeError(`Maturity period must not be negative, got ${value}`);
  }
}

export function setCoinbaseMaturity(networkId: string | NetworkId, value: bigint): void {
  assertDaaPeriod(value);
  const id = normalizeNetworkId(networkId);
  maturityOverrides.set(id, { ...maturityOverrides.get(id), coinbase: value });
}

export function setUserTransactionMaturity(networkId: string | NetworkId, value: bigint): void {
  assertDaaPeriod(value);
  const id = normalizeNetworkId(networkId);
  maturityOverrides.set(id, { ...maturityOverrides.get(id), user: value });
}

/**
 * Drop every runtime maturity override
 */
export function resetMaturityOverrides(): void {
  maturityOverrides.clear();
}

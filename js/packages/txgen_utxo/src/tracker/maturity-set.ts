import { coinKey, type Coin, type ConsensusParams, type Sompi } from '@txgen/consensus';

/**
 * Read-only view of one address (or of every tracked address when `address`
 * is undefined) at a tracker version. Every set owns its maps.
 */
export interface MaturitySet {
  readonly address?: string;
  readonly mature: ReadonlyMap<string, Coin>;
  readonly pending: ReadonlyMap<string, Coin>;
  readonly daaScore: bigint;
  readonly version: number;
}

export interface Balance {
  /** Spendable now */
  mature: Sompi;
  /** Immature non-coinbase value */
  pending: Sompi;
  matureUtxoCount: number;
  pendingUtxoCount: number;
  /** Immature coinbase outputs */
  stasisUtxoCount: number;
}

export function emptyMaturitySet(daaScore: bigint, version: number, address?: string): MaturitySet {
  return Object.freeze({
    ...(address === undefined ? {} : { address }),
    mature: new Map<string, Coin>(),
    pending: new Map<string, Coin>(),
    daaScore,
    version,
  });
}

export function maturityThreshold(coin: Coin, params: ConsensusParams): bigint {
  return coin.isCoinbase ? params.coinbaseMaturity : params.userTransactionMaturity;
}

/**
 * A coin whose block is ahead of `daaScore` (unconfirmed, virtual) is never mature
 */
export function isMature(coin: Coin, daaScore: bigint, params: ConsensusParams): boolean {
  if (coin.blockDaaScore > daaScore) return false;
  return daaScore - coin.blockDaaScore >= maturityThreshold(coin, params);
}

/**
 * Partition loose coins into a maturity set at `daaScore`
 */
export function partitionCoins(
  coins: Iterable<Coin>,
  daaScore: bigint,
  params: ConsensusParams,
  version = 0
): MaturitySet {
  const mature = new Map<string, Coin>();
  const pending = new Map<string, Coin>();
  for (const coin of coins) {
    (isMature(coin, daaScore, params) ? mature : pending).set(coinKey(coin), coin);
  }
  return Object.freeze({ mature, pending, daaScore, version });
}

export function matureCoins(set: MaturitySet): Coin[] {
  return [...set.mature.values()];
}

export function isMaturitySet(value: unknown): value is MaturitySet {
  return (
    typeof value === 'object' &&
    value !== null &&
    'mature' in value &&
    'pending' in value &&
    value.mature instanceof Map &&
    value.pending instanceof Map
  );
}

export function balanceOf(sets: Iterable<MaturitySet>): Balance {
  const balance: Balance = {
    mature: 0n,
    pending: 0n,
    matureUtxoCount: 0,
    pendingUtxoCount: 0,
    stasisUtxoCount: 0,
  };

  for (const set of sets) {
    for (const coin of set.mature.values()) {
      balance.mature += coin.amount;
      balance.matureUtxoCount++;
    }
    for (const coin of set.pending.values()) {
      if (coin.isCoinbase) {
        balance.stasisUtxoCount++;
      } else {
        balance.pending += coin.amount;
        balance.pendingUtxoCount++;
      }
    }
  }
  return balance;
}

import { createCoin, getConsensusParams } from '@txgen/consensus';
import { emptyMaturitySet, isMature, isMaturitySet, matureCoins, partitionCoins } from './maturity-set';

const params = getConsensusParams('mainnet');

const coin = (n: number, blockDaaScore: bigint, isCoinbase = false) =>
  createCoin({
    outpoint: { transactionId: n.toString(16).padStart(64, '0'), index: n },
    amount: 1_000n,
    scriptPublicKey: { version: 0, script: Uint8Array.of(0x51) },
    blockDaaScore,
    isCoinbase,
  });

describe('maturity sets', () => {
  test('ordinary and coinbase coins use their own thresholds', () => {
    expect(isMature(coin(1, 900n), 1_000n, params)).toBe(true);
    expect(isMature(coin(1, 901n), 1_000n, params)).toBe(false);
    expect(isMature(coin(1, 0n, true), 999n, params)).toBe(false);
    expect(isMature(coin(1, 0n, true), 1_000n, params)).toBe(true);
  });

  test('partitions loose coins', () => {
    const set = partitionCoins([coin(1, 0n), coin(2, 950n), coin(3, 10n, true)], 1_000n, params);

    expect(matureCoins(set).map((c) => c.outpoint.index)).toEqual([1]);
    expect(set.pending.size).toBe(2);
    expect(set.daaScore).toBe(1_000n);
  });

  test('recognizes maturity sets', () => {
    expect(isMaturitySet(emptyMaturitySet(0n, 0))).toBe(true);
    expect(isMaturitySet([coin(1, 0n)])).toBe(false);
    expect(isMaturitySet(null)).toBe(false);
  });
});

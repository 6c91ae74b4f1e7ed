import { coinKey, type Coin, type Sompi } from '@txgen/consensus';
import { isMaturitySet, matureCoins, type MaturitySet } from '@txgen/utxo';
import { InsufficientFundsError } from '../errors';

export interface Selection {
  chosen: Coin[];
  totalSelected: Sompi;
}

/**
 * Largest amount first; older coins break ties, then the outpoint key
 */
export function compareCoins(a: Coin, b: Coin): number {
  if (a.amount !== b.amount) return a.amount > b.amount ? -1 : 1;
  if (a.blockDaaScore !== b.blockDaaScore) return a.blockDaaScore < b.blockDaaScore ? -1 : 1;
  const ka = coinKey(a);
  const kb = coinKey(b);
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

/**
 * Greedy coin selection. Priority coins always come first in caller order;
 * the rest are taken largest first until the target is covered. No attempt is
 * made at a minimal-input (subset-sum) optimum.
 *
 * @example
 * ```typescript
 * const selector = new CoinSelector();
 * const { chosen, totalSelected } = selector.select(tracker.snapshot(address), 150_000_000n);
 * ```
 */
export class CoinSelector {
  /**
   * Candidate order: priority coins, then mature coins not already listed
   */
  order(available: MaturitySet | readonly Coin[], priorityCoins: readonly Coin[] = []): Coin[] {
    const seen = new Set<string>();
    const ordered: Coin[] = [];

    for (const coin of priorityCoins) {
      const key = coinKey(coin);
      if (seen.has(key)) continue;
      seen.add(key);
      ordered.push(coin);
    }

    const rest = (isMaturitySet(available) ? matureCoins(available) : [...available])
      .filter((coin) => !seen.has(coinKey(coin)))
      .sort(compareCoins);

    for (const coin of rest) {
      const key = coinKey(coin);
      if (seen.has(key)) continue;
      seen.add(key);
      ordered.push(coin);
    }
    return ordered;
  }

  /**
   * @throws InsufficientFundsError when the coins run out before `target`
   */
  select(available: MaturitySet | readonly Coin[], target: Sompi, priorityCoins: readonly Coin[] = []): Selection {
    return CoinSelector.takeUntil(this.order(available, priorityCoins), target);
  }

  /**
   * Every candidate in selection order (sweeps)
   */
  selectAll(available: MaturitySet | readonly Coin[], priorityCoins: readonly Coin[] = []): Selection {
    const chosen = this.order(available, priorityCoins);
    return { chosen, totalSelected: chosen.reduce((sum, coin) => sum + coin.amount, 0n) };
  }

  /**
   * Shortest prefix of an already ordered list covering `target`
   */
  static takeUntil(ordered: readonly Coin[], target: Sompi): Selection {
    const chosen: Coin[] = [];
    let totalSelected = 0n;

    for (const coin of ordered) {
      if (totalSelected >= target && chosen.length > 0) break;
      chosen.push(coin);
      totalSelected += coin.amount;
    }

    if (totalSelected < target || chosen.length === 0) {
      throw new InsufficientFundsError(target, totalSelected);
    }
    return { chosen, totalSelected };
  }
}

import type { Coin, Outpoint } from '@txgen/consensus';
import { createLogger } from '@txgen/utils';

const feedLogger = createLogger('txgen:utxo:feed');

/**
 * One chain-tip advancement: the new DAA score plus the coins created and spent
 */
export interface ChainTipEvent {
  daaScore: bigint;
  added: readonly Coin[];
  /** Spent or rolled-back coins, by coin or bare outpoint */
  removed: readonly (Coin | Outpoint)[];
}

export type ChainTipListener = (event: ChainTipEvent) => void;

/**
 * Source of chain-tip events (a node subscription, a test driver)
 */
export interface ChainTipFeed {
  /** @returns A function that cancels the subscription */
  subscribe(listener: ChainTipListener): () => void;
}

/**
 * Source of the full unspent set for a group of addresses
 */
export interface CoinSource {
  getUtxosByAddresses(addresses: readonly string[]): Promise<Coin[]>;
}

/**
 * Feed driven by explicit `publish` calls. Delivery is synchronous and in
 * subscription order.
 *
 * @example
 * ```typescript
 * const feed = new ManualChainTipFeed();
 * tracker.attach(feed);
 * feed.publish({ daaScore: 1200n, added: [coin], removed: [] });
 * ```
 */
export class ManualChainTipFeed implements ChainTipFeed {
  private readonly listeners = new Set<ChainTipListener>();

  subscribe(listener: ChainTipListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(event: ChainTipEvent): void {
    feedLogger.debug('Publishing chain tip', {
      daaScore: event.daaScore.toString(),
      added: event.added.length,
      removed: event.removed.length,
    });
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }
}

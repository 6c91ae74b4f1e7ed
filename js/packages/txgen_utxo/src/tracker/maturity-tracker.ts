import {
  coinKey,
  getConsensusParams,
  outpointKey,
  type Coin,
  type ConsensusParams,
  type Outpoint,
} from '@txgen/consensus';
import { TypedEventEmitter, createLogger } from '@txgen/utils';
import { InvalidRangeError, StaleSnapshotError } from '../errors';
import type { ChainTipEvent, ChainTipFeed, CoinSource } from '../feed/chain-tip-feed';
import {
  balanceOf,
  emptyMaturitySet,
  isMature,
  type Balance,
  type MaturitySet,
} from './maturity-set';

const trackerLogger = createLogger('txgen:utxo:tracker');

export interface UtxoMaturityTrackerOptions {
  /** Network whose maturity periods apply (default: mainnet) */
  networkId?: string;
  /** Explicit parameters; wins over `networkId` */
  params?: ConsensusParams;
  /** Starting DAA score (default: 0) */
  daaScore?: bigint;
}

export interface TrackerEvents {
  'coins-matured': [coins: Coin[], daaScore: bigint];
  'coins-added': [coins: Coin[]];
  'coins-removed': [coins: Coin[]];
  'daa-score': [daaScore: bigint];
}

interface AddressState {
  readonly mature: ReadonlyMap<string, Coin>;
  readonly pending: ReadonlyMap<string, Coin>;
}

const EMPTY_STATE: AddressState = { mature: new Map(), pending: new Map() };

/**
 * Working copy of the tracker state for one update. Inner maps are cloned the
 * first time an address is touched, so untouched published maps stay shared.
 */
class StateDraft {
  readonly states: Map<string, AddressState>;
  readonly owners: Map<string, string>;
  private readonly cloned = new Map<string, { mature: Map<string, Coin>; pending: Map<string, Coin> }>();

  constructor(states: ReadonlyMap<string, AddressState>, owners: ReadonlyMap<string, string>) {
    this.states = new Map(states);
    this.owners = new Map(owners);
  }

  edit(address: string): { mature: Map<string, Coin>; pending: Map<string, Coin> } {
    const existing = this.cloned.get(address);
    if (existing) return existing;

    const current = this.states.get(address) ?? EMPTY_STATE;
    const copy = { mature: new Map(current.mature), pending: new Map(current.pending) };
    this.cloned.set(address, copy);
    this.states.set(address, copy);
    return copy;
  }

  get changed(): boolean {
    return this.cloned.size > 0;
  }
}

function isCoin(value: Coin | Outpoint): value is Coin {
  return 'outpoint' in value;
}

/**
 * Tracks the coins owned by a set of addresses and partitions them into
 * mature and pending by DAA score.
 *
 * There is a single writer (an attached feed or direct `onChainTipAdvance`
 * calls) and any number of readers. Every update builds new maps and publishes
 * them at once, so a snapshot handed out earlier never changes.
 *
 * @example
 * ```typescript
 * const tracker = new UtxoMaturityTracker({ networkId: 'testnet-10' });
 * await tracker.scan(coinSource, ['kaspatest:qz...'], 1_000_000n);
 * const detach = tracker.attach(feed);
 * const spendable = tracker.snapshot('kaspatest:qz...').mature;
 * ```
 */
export class UtxoMaturityTracker extends TypedEventEmitter<TrackerEvents> {
  readonly params: ConsensusParams;
  private states: ReadonlyMap<string, AddressState> = new Map();
  private owners: ReadonlyMap<string, string> = new Map();
  private currentDaaScore: bigint;
  private currentVersion = 0;
  private detachFeed?: () => void;

  constructor(options: UtxoMaturityTrackerOptions = {}) {
    super();
    this.params = options.params ?? getConsensusParams(options.networkId ?? 'mainnet');
    this.currentDaaScore = options.daaScore ?? 0n;
  }

  get daaScore(): bigint {
    return this.currentDaaScore;
  }

  /**
   * Incremented on every published change
   */
  get version(): number {
    return this.currentVersion;
  }

  get addresses(): string[] {
    return [...this.states.keys()];
  }

  isTracked(address: string): boolean {
    return this.states.has(address);
  }

  /**
   * Start tracking addresses. Already tracked addresses are left alone.
   *
   * @returns The addresses that were not tracked before
   */
  ingest(addresses: Iterable<string>): string[] {
    const fresh = [...new Set(addresses)].filter((address) => !this.states.has(address));
    if (fresh.length === 0) return [];

    const states = new Map(this.states);
    for (const address of fresh) {
      states.set(address, EMPTY_STATE);
    }
    this.publish(states, this.owners, this.currentDaaScore);

    trackerLogger.debug('Tracking addresses', { added: fresh.length, total: states.size });
    return fresh;
  }

  /**
   * Track addresses and load their unspent coins from `source`.
   *
   * @returns Number of coins loaded
   */
  async scan(source: CoinSource, addresses: Iterable<string>, currentDaaScore?: bigint): Promise<number> {
    const fresh = this.ingest(addresses);
    if (fresh.length === 0) {
      if (currentDaaScore !== undefined) {
        this.onChainTipAdvance({ daaScore: currentDaaScore, added: [], removed: [] });
      }
      return 0;
    }

    const coins = await source.getUtxosByAddresses(fresh);
    const before = this.coinCount();
    this.onChainTipAdvance({
      daaScore: currentDaaScore ?? this.currentDaaScore,
      added: coins,
      removed: [],
    });

    const loaded = this.coinCount() - before;
    trackerLogger.info('Scanned addresses', { addresses: fresh.length, coins: loaded });
    return loaded;
  }

  /**
   * Stop tracking addresses and forget their coins
   */
  unregister(addresses: Iterable<string>): void {
    const draft = new StateDraft(this.states, this.owners);
    let removed = 0;

    for (const address of new Set(addresses)) {
      const state = this.states.get(address);
      if (!state) continue;

      for (const key of [...state.mature.keys(), ...state.pending.keys()]) {
        draft.owners.delete(key);
      }
      draft.states.delete(address);
      removed++;
    }

    if (removed > 0) {
      this.publish(draft.states, draft.owners, this.currentDaaScore);
      trackerLogger.debug('Stopped tracking addresses', { removed, total: draft.states.size });
    }
  }

  /**
   * Forget every address and coin. The DAA score is kept.
   */
  clear(): void {
    this.publish(new Map(), new Map(), this.currentDaaScore);
  }

  /**
   * Apply one chain-tip event. Added coins go in first, then removals, then
   * every pending coin is re-tested against the new score. A lower score than
   * the current one is ignored: maturity never moves backwards.
   */
  onChainTipAdvance(event: ChainTipEvent): void {
    const daaScore = event.daaScore > this.currentDaaScore ? event.daaScore : this.currentDaaScore;
    if (event.daaScore < this.currentDaaScore) {
      trackerLogger.debug('Ignoring DAA score regression', {
        current: this.currentDaaScore.toString(),
        received: event.daaScore.toString(),
      });
    }

    const draft = new StateDraft(this.states, this.owners);
    const added = new Map<string, Coin>();
    const removed: Coin[] = [];
    const matured: Coin[] = [];

    for (const coin of event.added) {
      const key = coinKey(coin);
      if (coin.address === undefined || !draft.states.has(coin.address)) {
        trackerLogger.debug('Ignoring coin for untracked address', { outpoint: key, address: coin.address });
        continue;
      }
      if (draft.owners.has(key)) {
        trackerLogger.debug('Ignoring duplicate coin', { outpoint: key });
        continue;
      }

      const state = draft.edit(coin.address);
      (isMature(coin, daaScore, this.params) ? state.mature : state.pending).set(key, coin);
      draft.owners.set(key, coin.address);
      added.set(key, coin);
    }

    for (const item of event.removed) {
      const key = isCoin(item) ? coinKey(item) : outpointKey(item);
      const owner = draft.owners.get(key);
      if (owner === undefined) {
        trackerLogger.warn('Ignoring removal of untracked coin', { outpoint: key });
        continue;
      }

      const state = draft.edit(owner);
      const coin = state.mature.get(key) ?? state.pending.get(key);
      state.mature.delete(key);
      state.pending.delete(key);
      draft.owners.delete(key);

      if (added.has(key)) {
        added.delete(key);
      } else if (coin) {
        removed.push(coin);
      }
    }

    if (daaScore !== this.currentDaaScore) {
      for (const [address, state] of this.statesWithPending(draft)) {
        const ready = [...state.pending.values()].filter((coin) => isMature(coin, daaScore, this.params));
        if (ready.length === 0) continue;

        const editable = draft.edit(address);
        for (const coin of ready) {
          const key = coinKey(coin);
          editable.pending.delete(key);
          editable.mature.set(key, coin);
          matured.push(coin);
        }
      }
    }

    const scoreChanged = daaScore !== this.currentDaaScore;
    if (!draft.changed && !scoreChanged) return;

    this.publish(draft.states, draft.owners, daaScore);

    trackerLogger.debug('Chain tip applied', {
      daaScore: daaScore.toString(),
      version: this.currentVersion,
      added: added.size,
      removed: removed.length,
      matured: matured.length,
    });

    if (scoreChanged) this.emit('daa-score', daaScore);
    if (added.size > 0) this.emit('coins-added', [...added.values()]);
    if (removed.length > 0) this.emit('coins-removed', removed);
    if (matured.length > 0) this.emit('coins-matured', matured, daaScore);
  }

  /**
   * Subscribe to a feed as the single writer
   *
   * @returns A function that detaches the feed
   * @throws Error if a feed is already attached
   */
  attach(feed: ChainTipFeed): () => void {
    if (this.detachFeed) {
      throw new Error('A chain tip feed is already attached; detach it first');
    }

    const unsubscribe = feed.subscribe((event) => this.onChainTipAdvance(event));
    const detach = (): void => {
      if (this.detachFeed !== detach) return;
      unsubscribe();
      this.detachFeed = undefined;
      trackerLogger.debug('Chain tip feed detached');
    };
    this.detachFeed = detach;

    trackerLogger.debug('Chain tip feed attached');
    return detach;
  }

  detach(): void {
    this.detachFeed?.();
  }

  get isAttached(): boolean {
    return this.detachFeed !== undefined;
  }

  /**
   * View of one address; empty for an untracked address. The maps are copies,
   * so writing to them leaves the tracker untouched.
   */
  snapshot(address: string): MaturitySet {
    const state = this.states.get(address);
    if (!state) {
      return emptyMaturitySet(this.currentDaaScore, this.currentVersion, address);
    }
    return Object.freeze({
      address,
      mature: new Map(state.mature),
      pending: new Map(state.pending),
      daaScore: this.currentDaaScore,
      version: this.currentVersion,
    });
  }

  /**
   * Read-only view merging every tracked address
   */
  snapshotAll(): MaturitySet {
    const mature = new Map<string, Coin>();
    const pending = new Map<string, Coin>();
    for (const state of this.states.values()) {
      state.mature.forEach((coin, key) => mature.set(key, coin));
      state.pending.forEach((coin, key) => pending.set(key, coin));
    }
    return Object.freeze({ mature, pending, daaScore: this.currentDaaScore, version: this.currentVersion });
  }

  balance(address?: string): Balance {
    return balanceOf(address === undefined ? [this.snapshotAll()] : [this.snapshot(address)]);
  }

  /**
   * Mature coins of every address, ordered by outpoint key, sliced to
   * `[from, to)`. Bounds past the end are clamped.
   *
   * @throws InvalidRangeError if `from > to` or either bound is negative
   */
  matureRange(from: number, to: number): Coin[] {
    if (!Number.isInteger(from) || !Number.isInteger(to) || from < 0 || from > to) {
      throw new InvalidRangeError(from, to);
    }

    const entries = [...this.snapshotAll().mature.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return entries.slice(from, Math.min(to, entries.length)).map(([, coin]) => coin);
  }

  isStale(snapshot: MaturitySet): boolean {
    return snapshot.version !== this.currentVersion;
  }

  /**
   * @throws StaleSnapshotError if the tracker changed since `snapshot` was taken
   */
  assertFresh(snapshot: MaturitySet): void {
    if (this.isStale(snapshot)) {
      throw new StaleSnapshotError(snapshot.version, this.currentVersion);
    }
  }

  private *statesWithPending(draft: StateDraft): Generator<[string, AddressState]> {
    for (const entry of draft.states) {
      if (entry[1].pending.size > 0) yield entry;
    }
  }

  private coinCount(): number {
    return this.owners.size;
  }

  private publish(
    states: ReadonlyMap<string, AddressState>,
    owners: ReadonlyMap<string, string>,
    daaScore: bigint
  ): void {
    this.states = states;
    this.owners = owners;
    this.currentDaaScore = daaScore;
    this.currentVersion++;
  }
}

export { UtxoMaturityTracker } from './tracker/maturity-tracker';
export type { TrackerEvents, UtxoMaturityTrackerOptions } from './tracker/maturity-tracker';

export {
  balanceOf,
  emptyMaturitySet,
  isMature,
  isMaturitySet,
  matureCoins,
  maturityThreshold,
  partitionCoins,
} from './tracker/maturity-set';
export type { Balance, MaturitySet } from './tracker/maturity-set';

export { ManualChainTipFeed } from './feed/chain-tip-feed';
export type { ChainTipEvent, ChainTipFeed, ChainTipListener, CoinSource } from './feed/chain-tip-feed';

export { InvalidRangeError, StaleSnapshotError } from './errors';

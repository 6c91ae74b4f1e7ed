export {
  createTransactions,
  END,
  estimateTransactions,
  Generator,
} from './generator/generator';
export type { End, GeneratorState } from './generator/generator';
export { generatorSettingsSchema, resolveSettings } from './generator/settings';
export type { GeneratorOptions, GeneratorSettings, ResolvedSettings } from './generator/settings';
export { batchMass, planBatches } from './generator/batch-planner';
export type { PlannedOutput, PlanContext } from './generator/batch-planner';

export { TransactionBuilder, MAX_FEE_PASSES } from './builder/transaction-builder';
export type { BuildRequest, BuildResult, CandidateTransaction, CompoundRequest } from './builder/transaction-builder';

export { CoinSelector, compareCoins } from './selection/coin-selector';
export type { Selection } from './selection/coin-selector';

export { PendingTransaction } from './pending/pending-transaction';
export type { PendingTransactionKind, PendingTransactionOptions } from './pending/pending-transaction';
export { PENDING_RECORD_VERSION } from './pending/pending-record';
export type { PendingTransactionRecord } from './pending/pending-record';

export { SIGHASH_ALL } from './types/types';
export type {
  GeneratorSummary,
  OutputRequest,
  ResolvedOutput,
  PaymentOutput,
  ScriptResolver,
  SignedTransaction,
  Signer,
  SigningDescriptor,
  Submitter,
  SweepOutput,
} from './types/types';

export {
  AlreadySignedError,
  AlreadySubmittedError,
  FeeConvergenceError,
  IncompleteSignaturesError,
  IndexOutOfRangeError,
  InsufficientFundsError,
  InvalidPendingRecordError,
  InvalidSettingsError,
  MassExceedsLimitError,
  SignatureConflictError,
  TransactionMismatchError,
  ValueConservationError,
} from './errors';

export {
  createLogger,
  setGlobalLogLevel,
  setNamespaceLogLevel,
  configureLogger,
  disableLogging,
  enableDebugLogging,
  resetLogger,
} from './logger';

export type { ILogger, LogContext, LoggerConfig, LogFormatter } from './types';
export { LogLevel } from './types';

export { TxgenError } from './errors';

export { TypedEventEmitter } from './event-emitter';
export type { EventArgsMap, Listener } from './event-emitter';

export { U64_MAX, ceilDiv, sumBigInt, maxBigInt, minBigInt, compareBigInt } from './bigint';

export const VERSION = '0.1.0';

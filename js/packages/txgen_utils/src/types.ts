/**
 * Log levels in ascending order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  /** No logging */
  SILENT = 4,
}

/**
 * Structured context printed after the message
 */
export type LogContext = Record<string, unknown>;

/**
 * Line formatter; receives the level name, the namespace, the message and the time of the call
 */
export type LogFormatter = (
  level: string,
  namespace: string,
  message: string,
  timestamp: Date
) => string;

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  /** Global log level (default: ERROR) */
  level?: LogLevel;
  /** Per-namespace overrides, `txgen:tx:*` style wildcards allowed */
  namespaces?: Record<string, LogLevel>;
  /** ANSI colours (default: true) */
  colors?: boolean;
  /** ISO timestamps (default: true) */
  timestamps?: boolean;
  formatter?: LogFormatter;
}

export interface ILogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error | LogContext, context?: LogContext): void;
  /** Create a child logger with additional namespace */
  child(subNamespace: string): ILogger;
  isLevelEnabled(level: LogLevel): boolean;
}

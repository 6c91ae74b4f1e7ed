import { type ILogger, type LogContext, type LoggerConfig, LogLevel } from './types';

const ANSI = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  gray: '\x1b[90m',
};

type LevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

function levelColor(level: string): string {
  switch (level) {
    case 'DEBUG':
      return ANSI.gray;
    case 'INFO':
      return ANSI.blue;
    case 'WARN':
      return ANSI.yellow;
    case 'ERROR':
      return ANSI.red;
    default:
      return ANSI.reset;
  }
}

const CONSOLE_METHODS: Record<LevelName, 'debug' | 'info' | 'warn' | 'error'> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
};

/**
 * Process-wide logger configuration shared by every namespace
 */
class LoggerManager {
  private config: Required<LoggerConfig> = this.defaults();

  private defaults(): Required<LoggerConfig> {
    // Silent by default: only errors, until the application opts in
    return {
      level: LogLevel.ERROR,
      namespaces: {},
      colors: true,
      timestamps: true,
      formatter: this.format.bind(this),
    };
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = {
      ...this.config,
      ...config,
      namespaces: { ...this.config.namespaces, ...config.namespaces },
    };
  }

  setGlobalLogLevel(level: LogLevel): void {
    this.config.level = level;
  }

  setNamespaceLogLevel(namespace: string, level: LogLevel): void {
    this.config.namespaces[namespace] = level;
  }

  reset(): void {
    this.config = this.defaults();
  }

  get current(): Required<LoggerConfig> {
    return this.config;
  }

  /**
   * Resolve the level for a namespace: exact match, then the longest matching
   * prefix (`a:b` or `a:b:*`), then the global level.
   */
  getEffectiveLevel(namespace: string): LogLevel {
    const { namespaces } = this.config;
    const parts = namespace.split(':');

    for (let i = parts.length; i > 0; i--) {
      const prefix = parts.slice(0, i).join(':');
      const exact = namespaces[prefix];
      if (exact !== undefined) return exact;

      const wildcard = namespaces[`${prefix}:*`];
      if (wildcard !== undefined) return wildcard;
    }

    return this.config.level;
  }

  private format(level: string, namespace: string, message: string, timestamp: Date): string {
    const time = this.config.timestamps ? timestamp.toISOString() : '';

    if (!this.config.colors) {
      return time ? `${time} [${level}] [${namespace}] ${message}` : `[${level}] [${namespace}] ${message}`;
    }

    const color = levelColor(level);
    const timeStr = time ? `${ANSI.gray}${time}${ANSI.reset} ` : '';
    return `${timeStr}${color}[${level}]${ANSI.reset} ${ANSI.magenta}[${namespace}]${ANSI.reset} ${message}`;
  }
}

const loggerManager = new LoggerManager();

class Logger implements ILogger {
  constructor(private readonly namespace: string) {}

  /**
   * Checked on every call so configuration changes take effect immediately
   */
  isLevelEnabled(level: LogLevel): boolean {
    return loggerManager.getEffectiveLevel(this.namespace) <= level;
  }

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.DEBUG, 'DEBUG', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.INFO, 'INFO', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.WARN, 'WARN', message, context);
  }

  error(message: string, error?: Error | LogContext, context?: LogContext): void {
    if (error instanceof Error) {
      this.write(LogLevel.ERROR, 'ERROR', message, context);
      if (error.stack && this.isLevelEnabled(LogLevel.ERROR)) {
        // eslint-disable-next-line no-console
        console.error(error.stack);
      }
      return;
    }
    this.write(LogLevel.ERROR, 'ERROR', message, error);
  }

  child(subNamespace: string): ILogger {
    return new Logger(`${this.namespace}:${subNamespace}`);
  }

  private write(level: LogLevel, name: LevelName, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) return;

    const line = loggerManager.current.formatter(name, this.namespace, message, new Date());
    const method = CONSOLE_METHODS[name];

    if (context && Object.keys(context).length > 0) {
      // eslint-disable-next-line no-console
      console[method](line, context);
    } else {
      // eslint-disable-next-line no-console
      console[method](line);
    }
  }
}

/**
 * Create a logger for a namespace
 *
 * @example
 * ```typescript
 * const logger = createLogger('txgen:utxo:tracker');
 * logger.info('Tracker attached', { addresses: 2 });
 * ```
 */
export function createLogger(namespace: string): ILogger {
  return new Logger(namespace);
}

export function setGlobalLogLevel(level: LogLevel): void {
  loggerManager.setGlobalLogLevel(level);
}

/**
 * Set log level for a namespace or a `prefix:*` pattern
 *
 * @example
 * ```typescript
 * setNamespaceLogLevel('txgen:tx:*', LogLevel.DEBUG);
 * ```
 */
export function setNamespaceLogLevel(namespace: string, level: LogLevel): void {
  loggerManager.setNamespaceLogLevel(namespace, level);
}

/**
 * Merge a partial configuration into the current one
 *
 * @example
 * ```typescript
 * configureLogger({
 *   level: LogLevel.WARN,
 *   namespaces: { 'txgen:tx:generator': LogLevel.DEBUG },
 *   colors: false,
 * });
 * ```
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  loggerManager.configure(config);
}

export function disableLogging(): void {
  loggerManager.setGlobalLogLevel(LogLevel.SILENT);
}

export function enableDebugLogging(): void {
  loggerManager.setGlobalLogLevel(LogLevel.DEBUG);
}

/**
 * Restore the silent default configuration (used by tests)
 */
export function resetLogger(): void {
  loggerManager.reset();
}

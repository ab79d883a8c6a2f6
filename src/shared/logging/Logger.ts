/**
 * Structured log metadata
 */
export type LogMeta = Record<string, unknown>;

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: unknown, meta?: LogMeta): void;
  fatal(message: string, error?: unknown, meta?: LogMeta): void;
}

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
  SILENT = 5
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  name?: string;
  timestamp?: boolean;
  colorize?: boolean;
  json?: boolean;
  destination?: LogDestination;
}

/**
 * Log destination. `stderr` keeps stdout free for command output.
 */
export type LogDestination = 'stdout' | 'stderr';

/**
 * Log entry
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  logger: string;
  message: string;
  meta?: LogMeta;
  error?: Error;
}

type ConsoleMethod = (...args: unknown[]) => void;

/**
 * Parse a level name such as "debug" or "WARN"
 */
export function parseLogLevel(level: string): LogLevel | undefined {
  switch (level.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'FATAL':
      return LogLevel.FATAL;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

/**
 * Console logger implementation
 */
export class ConsoleLogger implements ILogger {
  private config: LoggerConfig;
  private readonly name: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: LogLevel.INFO,
      timestamp: true,
      colorize: true,
      json: false,
      destination: 'stdout',
      ...config
    };
    this.name = config.name || 'App';
  }

  get loggerName(): string {
    return this.name;
  }

  debug(message: string, meta?: LogMeta): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    this.log(LogLevel.ERROR, message, meta, toError(error));
  }

  fatal(message: string, error?: unknown, meta?: LogMeta): void {
    this.log(LogLevel.FATAL, message, meta, toError(error));
  }

  /**
   * Merge configuration into this logger
   */
  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  /**
   * Core logging method
   */
  private log(level: LogLevel, message: string, meta?: LogMeta, error?: Error): void {
    if (level < this.config.level) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      logger: this.name,
      message,
      meta,
      error
    };

    if (this.config.json) {
      this.logJson(entry);
    } else {
      this.logPretty(entry);
    }
  }

  /**
   * Log in JSON format
   */
  private logJson(entry: LogEntry): void {
    const output = {
      timestamp: entry.timestamp.toISOString(),
      level: LogLevel[entry.level],
      logger: entry.logger,
      message: entry.message,
      ...(entry.meta && { meta: entry.meta }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack
        }
      })
    };

    this.getConsoleMethod(entry.level)(JSON.stringify(output));
  }

  /**
   * Log in pretty format
   */
  private logPretty(entry: LogEntry): void {
    const parts: string[] = [];

    if (this.config.timestamp) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }

    parts.push(this.getLevelString(entry.level));
    parts.push(`[${entry.logger}]`);
    parts.push(entry.message);

    const logMethod = this.getConsoleMethod(entry.level);
    logMethod(parts.join(' '));

    if (entry.meta) {
      logMethod('  Meta:', entry.meta);
    }

    if (entry.error) {
      logMethod('  Error:', entry.error.message);
      if (entry.error.stack && entry.level >= LogLevel.ERROR) {
        logMethod('  Stack:', entry.error.stack);
      }
    }
  }

  /**
   * Get level string with color
   */
  private getLevelString(level: LogLevel): string {
    const levelName = LogLevel[level];

    if (!this.config.colorize) {
      return `[${levelName}]`;
    }

    // ANSI color codes
    const colors: Record<number, string> = {
      [LogLevel.DEBUG]: '\x1b[36m', // Cyan
      [LogLevel.INFO]: '\x1b[32m',  // Green
      [LogLevel.WARN]: '\x1b[33m',  // Yellow
      [LogLevel.ERROR]: '\x1b[31m', // Red
      [LogLevel.FATAL]: '\x1b[35m'  // Magenta
    };

    const reset = '\x1b[0m';
    return `${colors[level]}[${levelName}]${reset}`;
  }

  /**
   * Get console method for level
   */
  private getConsoleMethod(level: LogLevel): ConsoleMethod {
    if (this.config.destination === 'stderr') {
      return console.error;
    }

    switch (level) {
      case LogLevel.DEBUG:
        return console.debug;
      case LogLevel.INFO:
        return console.info;
      case LogLevel.WARN:
        return console.warn;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        return console.error;
      default:
        return console.log;
    }
  }
}

function toError(error: unknown): Error | undefined {
  if (error === undefined || error === null) {
    return undefined;
  }
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Logger factory
 */
export class LoggerFactory {
  private static loggers: Map<string, ConsoleLogger> = new Map();
  private static defaultConfig: Partial<LoggerConfig> = {
    level: LogLevel.INFO,
    timestamp: true,
    colorize: true
  };

  /**
   * Create or get logger
   */
  static getLogger(name: string, config?: Partial<LoggerConfig>): ILogger {
    const key = name || 'default';

    const existing = this.loggers.get(key);
    if (existing) {
      return existing;
    }

    const created = new ConsoleLogger({
      ...this.defaultConfig,
      ...config,
      name
    });
    this.loggers.set(key, created);
    return created;
  }

  /**
   * Set default configuration. Loggers created earlier pick it up too.
   */
  static setDefaultConfig(config: Partial<LoggerConfig>): void {
    this.defaultConfig = { ...this.defaultConfig, ...config };
    this.loggers.forEach(logger => logger.configure(config));
  }

  /**
   * Clear all loggers
   */
  static clear(): void {
    this.loggers.clear();
  }
}

/**
 * Create child logger
 */
export function createChildLogger(parent: ILogger, name: string): ILogger {
  if (parent instanceof ConsoleLogger) {
    return LoggerFactory.getLogger(`${parent.loggerName}.${name}`);
  }
  return parent;
}

/**
 * Type alias for backward compatibility
 */
export type Logger = ILogger;

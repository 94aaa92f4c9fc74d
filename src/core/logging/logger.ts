/**
 * Structured logging for the switchboard.
 *
 * Loggers are named (`switchboard.<area>`), share one global configuration and
 * can be bound to a context that is attached to every entry they write.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

/**
 * Named logger. `context` is written as a JSON object after the message.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  /** `error` is described under `context.error` */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  /** A logger that adds `context` to every entry and follows this logger's level */
  child(context: Record<string, unknown>): Logger;
  setLevel(level: LogLevel): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export interface LoggingConfig {
  /** Defaults to INFO */
  level?: LogLevel;
  /** Defaults to 'text' */
  format?: 'json' | 'text';
  /** Where formatted entries go. Defaults to the console method for the level. */
  destination?: (message: string, level: LogLevel) => void;
  /** Defaults to true */
  includeTimestamp?: boolean;
  /** Defaults to true */
  includeLoggerName?: boolean;
}

export const ROOT_LOGGER_NAME = 'switchboard';

const LOG_LEVEL_HIERARCHY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function consoleDestination(message: string, level: LogLevel): void {
  switch (level) {
    case LogLevel.DEBUG:
    case LogLevel.INFO:
      console.log(message);
      break;
    case LogLevel.WARN:
      console.warn(message);
      break;
    case LogLevel.ERROR:
      console.error(message);
      break;
  }
}

function defaultConfig(): Required<LoggingConfig> {
  return {
    level: LogLevel.INFO,
    format: 'text',
    destination: consoleDestination,
    includeTimestamp: true,
    includeLoggerName: true,
  };
}

let globalConfig: Required<LoggingConfig> = defaultConfig();

const loggers = new Map<string, ConsoleLogger>();

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

class ConsoleLogger implements Logger {
  private minLevel: LogLevel | undefined;

  constructor(
    private readonly name: string,
    private readonly bound: Record<string, unknown> = {},
    private readonly parent?: ConsoleLogger
  ) {}

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_HIERARCHY[level] >= LOG_LEVEL_HIERARCHY[this.effectiveLevel()];
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.name, { ...this.bound, ...context }, this);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const enhancedContext = { ...context };
    if (error !== undefined) {
      enhancedContext.error = describeError(error);
    }
    this.log(LogLevel.ERROR, message, enhancedContext);
  }

  private effectiveLevel(): LogLevel {
    return this.minLevel ?? this.parent?.effectiveLevel() ?? globalConfig.level;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const merged = { ...this.bound, ...context };
    globalConfig.destination(this.formatLogEntry(level, message, merged), level);
  }

  private formatLogEntry(level: LogLevel, message: string, context: Record<string, unknown>): string {
    const label = level.toUpperCase();
    const hasContext = Object.keys(context).length > 0;

    if (globalConfig.format === 'json') {
      return JSON.stringify({
        level: label,
        message,
        ...(globalConfig.includeTimestamp ? { timestamp: new Date().toISOString() } : {}),
        ...(globalConfig.includeLoggerName ? { logger: this.name } : {}),
        ...(hasContext ? { context } : {}),
      });
    }

    // [2024-05-01 12:00:00 - switchboard.http - INFO] message {"key":"value"}
    const header: string[] = [];
    if (globalConfig.includeTimestamp) {
      header.push(new Date().toISOString().replace('T', ' ').slice(0, 19));
    }
    if (globalConfig.includeLoggerName) {
      header.push(this.name);
    }
    header.push(label);

    const line = `[${header.join(' - ')}] ${message}`;
    return hasContext ? `${line} ${JSON.stringify(context)}` : line;
  }
}

/**
 * Update the global logging settings. Fields left undefined keep their value;
 * a new level applies to loggers that already exist.
 *
 * @example
 * ```typescript
 * configureLogging({ level: LogLevel.DEBUG, format: 'json' });
 * ```
 */
export function configureLogging(config: LoggingConfig): void {
  globalConfig = {
    level: config.level ?? globalConfig.level,
    format: config.format ?? globalConfig.format,
    destination: config.destination ?? globalConfig.destination,
    includeTimestamp: config.includeTimestamp ?? globalConfig.includeTimestamp,
    includeLoggerName: config.includeLoggerName ?? globalConfig.includeLoggerName,
  };

  const level = config.level;
  if (level !== undefined) {
    loggers.forEach((logger) => logger.setLevel(level));
  }
}

/**
 * The logger registered under `name`, created on first use.
 *
 * @throws {Error} If the name is outside the `switchboard` namespace
 *
 * @example
 * ```typescript
 * const logger = getLogger('switchboard.registry');
 * logger.info('Provider registered', { provider: 'openrouter' });
 * ```
 */
export function getLogger(name: string = ROOT_LOGGER_NAME): Logger {
  if (!name.startsWith(ROOT_LOGGER_NAME)) {
    throw new Error(`Logger name must start with '${ROOT_LOGGER_NAME}'`);
  }

  let logger = loggers.get(name);
  if (!logger) {
    logger = new ConsoleLogger(name);
    loggers.set(name, logger);
  }
  return logger;
}

/**
 * Forget every logger and restore the default configuration.
 * @internal
 */
export function resetLoggers(): void {
  loggers.clear();
  globalConfig = defaultConfig();
}

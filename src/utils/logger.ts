/**
 * Structured Logging Utility
 *
 * Module loggers with levels, fixed context and text or JSON output.
 * The level comes from BREATH_AVERAGER_LOG_LEVEL (or LOG_LEVEL) when set.
 *
 * @module utils/logger
 */

/**
 * Available log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/**
 * Log level string representations
 */
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log entry structure
 */
export interface LogEntry {
  /** Timestamp in ISO format */
  timestamp: string;

  level: LogLevelName;

  /** Module/component name */
  module: string;

  message: string;

  /** Additional context data */
  context?: Record<string, unknown>;

  /** Error object if applicable */
  error?: Error;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  minLevel: LogLevel;

  /** Emit one JSON object per entry */
  jsonOutput?: boolean;

  /** Include timestamps in text output */
  includeTimestamp?: boolean;

  /** Custom output handler (default: console) */
  outputHandler?: (entry: LogEntry) => void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: LogLevel.INFO,
  jsonOutput: false,
  includeTimestamp: true,
};

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG };

const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.SILENT]: 'silent',
};

/**
 * Parse log level from string; unknown names fall back to INFO
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return LogLevel.INFO;

  switch (level.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
    case 'none':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Configure the global logger.
 * Applies to existing loggers as well.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Read the log level from BREATH_AVERAGER_LOG_LEVEL or LOG_LEVEL
 */
export function configureFromEnvironment(env: NodeJS.ProcessEnv = process.env): void {
  const envLevel = env.BREATH_AVERAGER_LOG_LEVEL || env.LOG_LEVEL;

  if (envLevel) {
    globalConfig.minLevel = parseLogLevel(envLevel);
  }
}

/**
 * Set minimum log level
 */
export function setLogLevel(level: LogLevel | LogLevelName): void {
  globalConfig.minLevel = typeof level === 'string' ? parseLogLevel(level) : level;
}

export function getLogLevel(): LogLevel {
  return globalConfig.minLevel;
}

/**
 * Format log entry for console output
 */
export function formatLogEntry(entry: LogEntry, includeTimestamp: boolean = true): string {
  const parts: string[] = [];

  if (includeTimestamp) {
    parts.push(`[${entry.timestamp}]`);
  }

  parts.push(`[${entry.level.toUpperCase()}]`);
  parts.push(`[${entry.module}]`);
  parts.push(entry.message);

  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }

  return parts.join(' ');
}

function consoleOutput(entry: LogEntry, config: LoggerConfig): void {
  const output = config.jsonOutput
    ? JSON.stringify({ ...entry, error: entry.error?.message })
    : formatLogEntry(entry, config.includeTimestamp ?? true);

  switch (entry.level) {
    case 'error':
      console.error(output);
      if (entry.error && !config.jsonOutput) {
        console.error(entry.error);
      }
      break;
    case 'warn':
      console.warn(output);
      break;
    case 'debug':
      console.debug(output);
      break;
    default:
      console.log(output);
  }
}

/**
 * Module-specific logger instance.
 * Settings not overridden here follow the global configuration at log time.
 */
export class Logger {
  private readonly module: string;
  private readonly overrides: Partial<LoggerConfig>;

  constructor(module: string, overrides: Partial<LoggerConfig> = {}) {
    this.module = module;
    this.overrides = overrides;
  }

  get name(): string {
    return this.module;
  }

  private get config(): LoggerConfig {
    return { ...globalConfig, ...this.overrides };
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.config.minLevel;
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    const config = this.config;
    if (level < config.minLevel) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      module: this.module,
      message,
      context,
      error,
    };

    if (config.outputHandler) {
      config.outputHandler(entry);
    } else {
      consoleOutput(entry, config);
    }
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

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  /**
   * Logger for a sub-module, e.g. `signal` -> `signal:segmenter`
   */
  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`, this.overrides);
  }

  /**
   * Logger that merges `fixedContext` into every entry
   */
  withContext(fixedContext: Record<string, unknown>): Logger {
    const parentOverrides = this.overrides;

    return new Logger(this.module, {
      ...parentOverrides,
      outputHandler: entry => {
        const config = { ...globalConfig, ...parentOverrides };
        const merged: LogEntry = { ...entry, context: { ...fixedContext, ...entry.context } };
        if (config.outputHandler) {
          config.outputHandler(merged);
        } else {
          consoleOutput(merged, config);
        }
      },
    });
  }
}

/**
 * Create a logger for a specific module
 */
export function createLogger(module: string): Logger {
  return new Logger(module);
}

/**
 * Create a silent logger (for testing)
 */
export function createSilentLogger(module: string): Logger {
  return new Logger(module, { minLevel: LogLevel.SILENT });
}

configureFromEnvironment();

/**
 * Root logger for the package
 */
export const defaultLogger = createLogger('breath-averager');

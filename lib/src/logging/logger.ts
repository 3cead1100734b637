/**
 * Logger Implementation
 *
 * Structured, levelled logger with child loggers per component.
 */

import {
  type LogEntry,
  type LoggerConfig,
  type LogLevel,
  LogLevelName,
  LogLevelColors,
  LogColors,
  LogFormat,
  LogLevel as LogLevelEnum,
  createDefaultLoggerConfig,
  formatError,
  parseLogFormat,
  parseLogLevel,
  shouldLog,
} from './types.js';

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly config: LoggerConfig;
  private level: LogLevel;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = createDefaultLoggerConfig(config);
    this.level = this.config.level;
  }

  /**
   * Create a child logger; sources nest as `parent:child`
   */
  child(source: string): Logger {
    return new Logger({
      ...this.config,
      level: this.level,
      source: this.config.source ? `${this.config.source}:${source}` : source,
    });
  }

  error(message: string, context?: Record<string, unknown>): void;
  error(message: string, error: unknown, context?: Record<string, unknown>): void;
  error(
    message: string,
    errorOrContext?: unknown,
    context?: Record<string, unknown>
  ): void {
    if (errorOrContext instanceof Error) {
      this.log(LogLevelEnum.ERROR, message, context, errorOrContext);
      return;
    }
    if (isContext(errorOrContext)) {
      this.log(LogLevelEnum.ERROR, message, errorOrContext);
      return;
    }
    this.log(LogLevelEnum.ERROR, message, context, errorOrContext);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.WARN, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.INFO, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.DEBUG, message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.TRACE, message, context);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  getSource(): string | undefined {
    return this.config.source;
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (!shouldLog(level, this.level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context,
      source: this.config.source,
      error: error === undefined ? undefined : formatError(error),
    };

    this.output(this.format(entry), level);
  }

  private format(entry: LogEntry): string {
    switch (this.config.format) {
      case LogFormat.JSON:
        return JSON.stringify({
          timestamp: entry.timestamp.toISOString(),
          level: LogLevelName[entry.level],
          source: entry.source,
          message: entry.message,
          context: entry.context,
          error: entry.error,
        });
      case LogFormat.PRETTY:
        return this.formatLine(entry, true);
      case LogFormat.TEXT:
      default:
        return this.formatLine(entry, false);
    }
  }

  private formatLine(entry: LogEntry, colors: boolean): string {
    const paint = (color: string, text: string): string =>
      colors ? `${color}${text}${LogColors.reset}` : text;
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(paint(LogColors.gray, `[${entry.timestamp.toISOString()}]`));
    }

    parts.push(paint(LogLevelColors[entry.level], LogLevelName[entry.level].padEnd(5)));

    if (entry.source) {
      parts.push(paint(LogColors.cyan, `[${entry.source}]`));
    }

    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(paint(LogColors.dim, JSON.stringify(entry.context)));
    }

    if (entry.error) {
      const code = entry.error.code ? ` (${entry.error.code})` : '';
      parts.push(
        paint(LogColors.red, `\n  ${entry.error.name}${code}: ${entry.error.message}`)
      );
      if (entry.error.stack && entry.level === LogLevelEnum.ERROR) {
        parts.push(paint(LogColors.gray, `\n  ${entry.error.stack.replace(/\n/g, '\n  ')}`));
      }
    }

    return parts.join(' ');
  }

  private output(formatted: string, level: LogLevel): void {
    if (this.config.output) {
      this.config.output(formatted, level);
      return;
    }

    if (!this.config.console) {
      return;
    }

    if (level === LogLevelEnum.ERROR) {
      console.error(formatted);
    } else if (level === LogLevelEnum.WARN) {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }
}

function isContext(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// Global Logger Instance
// =============================================================================

let globalLogger: Logger | null = null;

/**
 * Build a logger from LOG_LEVEL / LOG_FORMAT
 */
export function createLoggerFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides?: Partial<LoggerConfig>
): Logger {
  return new Logger({
    level: parseLogLevel(env['LOG_LEVEL']),
    format: parseLogFormat(env['LOG_FORMAT'], LogFormat.PRETTY),
    ...overrides,
  });
}

/**
 * Get or create the global logger (configured from the environment)
 */
export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = createLoggerFromEnv();
  }
  return globalLogger;
}

export function setGlobalLogger(logger: Logger): void {
  globalLogger = logger;
}

export function resetGlobalLogger(): void {
  globalLogger = null;
}

/**
 * Create a child of the global logger for a component
 */
export function createLogger(source: string): Logger {
  return getGlobalLogger().child(source);
}

/**
 * Logging Types and Schemas
 *
 * Levels, formats and configuration for the structured logger shared by
 * every service, handler and script in the assistant.
 */

import { z } from 'zod';

// =============================================================================
// Log Levels
// =============================================================================

/**
 * Log level severity (lower number = higher priority)
 */
export const LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
  TRACE: 4,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelName = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.TRACE]: 'TRACE',
} as const;

export type LogLevelName = (typeof LogLevelName)[keyof typeof LogLevelName];

export const LogLevelSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
]);

/**
 * Level names as they appear in the LOG_LEVEL environment variable
 */
const LEVELS_BY_NAME: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
  trace: LogLevel.TRACE,
};

// =============================================================================
// Log Entry
// =============================================================================

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: Record<string, unknown> | undefined;
  error?: { name: string; message: string; code?: string; stack?: string } | undefined;
  /** Component that emitted the entry, e.g. `rag:chain` */
  source?: string | undefined;
}

// =============================================================================
// Logger Configuration
// =============================================================================

export const LogFormat = {
  /** Human-readable single line */
  TEXT: 'text',
  /** One JSON object per line, for log drains */
  JSON: 'json',
  /** Text with ANSI colors */
  PRETTY: 'pretty',
} as const;

export type LogFormat = (typeof LogFormat)[keyof typeof LogFormat];

export const LogFormatSchema = z.enum(['text', 'json', 'pretty']);

export type LogOutput = (formatted: string, level: LogLevel) => void;

export const LoggerConfigSchema = z.object({
  level: LogLevelSchema.default(LogLevel.INFO),
  format: LogFormatSchema.default('text'),
  timestamps: z.boolean().default(true),
  source: z.string().optional(),
  /** Write to console when no custom output is set */
  console: z.boolean().default(true),
  /** Custom sink; replaces console output */
  output: z.custom<LogOutput>((value) => typeof value === 'function').optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;

export function createDefaultLoggerConfig(
  overrides?: Partial<LoggerConfig>
): LoggerConfig {
  return LoggerConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Terminal Colors
// =============================================================================

export const LogColors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export const LogLevelColors: Record<LogLevel, string> = {
  [LogLevel.ERROR]: LogColors.red,
  [LogLevel.WARN]: LogColors.yellow,
  [LogLevel.INFO]: LogColors.blue,
  [LogLevel.DEBUG]: LogColors.cyan,
  [LogLevel.TRACE]: LogColors.gray,
};

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Parse a level name (case-insensitive). Unknown names fall back to INFO.
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) {
    return LogLevel.INFO;
  }
  return LEVELS_BY_NAME[level.trim().toLowerCase()] ?? LogLevel.INFO;
}

/**
 * Parse a format name. Unknown names fall back to the given default.
 */
export function parseLogFormat(
  format: string | undefined,
  fallback: LogFormat = LogFormat.TEXT
): LogFormat {
  const parsed = LogFormatSchema.safeParse(format?.trim().toLowerCase());
  return parsed.success ? parsed.data : fallback;
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return level <= minLevel;
}

/**
 * Flatten an error for a log entry. Errors carrying a string `code`
 * (KnowledgeBaseError, VectorStoreError, ...) keep it.
 */
export function formatError(error: unknown): NonNullable<LogEntry['error']> {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(code !== undefined && { code }),
      ...(error.stack !== undefined && { stack: error.stack }),
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}

/**
 * Logging Types and Schemas
 *
 * Structured logging for the rulebook knowledge base: levels, formats and
 * logger configuration.
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

// =============================================================================
// Log Entry
// =============================================================================

export const LogEntrySchema = z.object({
  level: LogLevelSchema,
  message: z.string(),
  timestamp: z.date(),
  /** Structured context (document id, chunk counts, durations...) */
  context: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      code: z.string().optional(),
      stack: z.string().optional(),
    })
    .optional(),
  /** Emitting component, e.g. "kb:publisher" */
  source: z.string().optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

// =============================================================================
// Logger Configuration
// =============================================================================

export const LogFormat = {
  /** Human-readable text format */
  TEXT: 'text',
  /** One JSON object per line */
  JSON: 'json',
  /** Text with ANSI colors (for terminal) */
  PRETTY: 'pretty',
} as const;

export type LogFormat = (typeof LogFormat)[keyof typeof LogFormat];

export const LogFormatSchema = z.enum(['text', 'json', 'pretty']);

export const LoggerConfigSchema = z.object({
  /**
   * Minimum log level to output
   * @default LogLevel.INFO
   */
  level: LogLevelSchema.default(LogLevel.INFO),

  /**
   * Console output format
   * @default 'text'
   */
  format: LogFormatSchema.default('text'),

  /** @default true */
  timestamps: z.boolean().default(true),

  /** @default true */
  colors: z.boolean().default(true),

  source: z.string().optional(),

  /** @default true */
  console: z.boolean().default(true),

  /**
   * Append every entry (plain text, no colors) to this file as well.
   * The directory is created on first write.
   */
  filePath: z.string().optional(),

  /**
   * Custom output handler; replaces console output when set
   */
  output: z
    .function()
    .args(z.string(), LogLevelSchema)
    .returns(z.void())
    .optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;

export function createDefaultLoggerConfig(overrides?: Partial<LoggerConfig>): LoggerConfig {
  return LoggerConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Log Formatting
// =============================================================================

/**
 * ANSI color codes for terminal output
 */
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
 * Parse a log level name ("debug", "WARN"); unknown names map to INFO
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.trim().toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'TRACE':
      return LogLevel.TRACE;
    default:
      return LogLevel.INFO;
  }
}

export function getLogLevelName(level: LogLevel): LogLevelName {
  return LogLevelName[level];
}

/**
 * Check if a log level should be output given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return level <= minLevel;
}

/**
 * Format an error for logging; keeps the knowledge base error code when present
 */
export function formatError(error: unknown): NonNullable<LogEntry['error']> {
  if (error instanceof Error) {
    const formatted: NonNullable<LogEntry['error']> = {
      name: error.name,
      message: error.message,
    };
    if ('code' in error && typeof error.code === 'string') {
      formatted.code = error.code;
    }
    if (error.stack) {
      formatted.stack = error.stack;
    }
    return formatted;
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}

/**
 * Tests for logging types and helpers
 */

import { describe, it, expect } from 'vitest';
import {
  LogLevel,
  LogLevelSchema,
  LogFormatSchema,
  LoggerConfigSchema,
  createDefaultLoggerConfig,
  parseLogLevel,
  getLogLevelName,
  shouldLog,
  formatError,
} from '../../lib/src/logging/types.js';
import { MalformedInputError } from '../../lib/src/errors.js';

describe('LogLevelSchema', () => {
  it('should accept the five levels only', () => {
    expect([0, 1, 2, 3, 4].every((level) => LogLevelSchema.safeParse(level).success)).toBe(true);
    expect(LogLevelSchema.safeParse(5).success).toBe(false);
    expect(LogLevelSchema.safeParse('info').success).toBe(false);
  });
});

describe('LogFormatSchema', () => {
  it('should reject unknown formats', () => {
    expect(LogFormatSchema.safeParse('pretty').success).toBe(true);
    expect(LogFormatSchema.safeParse('compact').success).toBe(false);
  });
});

describe('LoggerConfigSchema', () => {
  it('should apply defaults', () => {
    const config = LoggerConfigSchema.parse({});

    expect(config).toMatchObject({
      level: LogLevel.INFO,
      format: 'text',
      timestamps: true,
      colors: true,
      console: true,
    });
    expect(config.filePath).toBeUndefined();
  });

  it('should accept overrides', () => {
    expect(createDefaultLoggerConfig({ level: LogLevel.ERROR, filePath: 'logs/kb.log' })).toMatchObject({
      level: LogLevel.ERROR,
      filePath: 'logs/kb.log',
    });
  });
});

describe('parseLogLevel', () => {
  it('should parse level names case insensitively', () => {
    expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
    expect(parseLogLevel('Warning')).toBe(LogLevel.WARN);
    expect(parseLogLevel(' DEBUG ')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('trace')).toBe(LogLevel.TRACE);
  });

  it('should default to INFO for unknown levels', () => {
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
  });
});

describe('getLogLevelName', () => {
  it('should name each level', () => {
    expect(getLogLevelName(LogLevel.WARN)).toBe('WARN');
  });
});

describe('shouldLog', () => {
  it('should log levels at or above the minimum severity', () => {
    expect(shouldLog(LogLevel.ERROR, LogLevel.INFO)).toBe(true);
    expect(shouldLog(LogLevel.INFO, LogLevel.INFO)).toBe(true);
    expect(shouldLog(LogLevel.DEBUG, LogLevel.INFO)).toBe(false);
  });
});

describe('formatError', () => {
  it('should keep the knowledge base error code', () => {
    const formatted = formatError(new MalformedInputError('no headings'));

    expect(formatted).toMatchObject({
      name: 'MalformedInputError',
      message: 'no headings',
      code: 'MALFORMED_INPUT',
    });
    expect(typeof formatted.stack).toBe('string');
  });

  it('should ignore non-string codes', () => {
    const error = Object.assign(new Error('x'), { code: 5 });
    expect(formatError(error).code).toBeUndefined();
  });

  it('should wrap thrown values that are not errors', () => {
    expect(formatError(42)).toEqual({ name: 'UnknownError', message: '42' });
  });
});

/**
 * Tests for Logger class
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  Logger,
  getGlobalLogger,
  setGlobalLogger,
  resetGlobalLogger,
  createLogger,
} from '../../lib/src/logging/logger.js';
import { LogLevel } from '../../lib/src/logging/types.js';
import { ChunkStoreIOError } from '../../lib/src/errors.js';

function captureLogger(config?: ConstructorParameters<typeof Logger>[0]) {
  const lines: Array<{ line: string; level: LogLevel }> = [];
  const logger = new Logger({
    timestamps: false,
    output: (line, level) => {
      lines.push({ line, level });
    },
    ...config,
  });
  return { logger, lines };
}

function withoutStack(error: Error): Error {
  error.stack = undefined;
  return error;
}

describe('Logger', () => {
  describe('constructor', () => {
    it('should create logger with default config', () => {
      const config = new Logger().getConfig();

      expect(config.level).toBe(LogLevel.INFO);
      expect(config.format).toBe('text');
      expect(config.timestamps).toBe(true);
      expect(config.console).toBe(true);
    });
  });

  describe('child', () => {
    it('should nest sources', () => {
      const child = new Logger({ source: 'kb' }).child('publisher');
      expect(child.getConfig().source).toBe('kb:publisher');
    });

    it('should use the child source when the parent has none', () => {
      expect(new Logger().child('retrieval').getConfig().source).toBe('retrieval');
    });

    it('should inherit level and output', () => {
      const { logger, lines } = captureLogger({ level: LogLevel.DEBUG });
      logger.child('store').debug('read');

      expect(lines).toEqual([{ line: 'DEBUG [store] read', level: LogLevel.DEBUG }]);
    });
  });

  // ===========================================================================
  // Levels & formats
  // ===========================================================================

  describe('log levels', () => {
    it('should drop entries below the minimum level', () => {
      const { logger, lines } = captureLogger({ level: LogLevel.WARN });
      logger.info('skipped');
      logger.debug('skipped');
      logger.warn('kept');

      expect(lines.map((l) => l.line)).toEqual(['WARN  kept']);
    });

    it('should change level at runtime', () => {
      const { logger, lines } = captureLogger();
      logger.setLevel(LogLevel.TRACE);
      logger.trace('detail');

      expect(logger.getLevel()).toBe(LogLevel.TRACE);
      expect(lines.map((l) => l.level)).toEqual([LogLevel.TRACE]);
    });
  });

  describe('text format', () => {
    it('should write level, source, message and context', () => {
      const { logger, lines } = captureLogger({ source: 'kb' });
      logger.info('Published', { documentId: 'rj', chunks: 3 });

      expect(lines[0]?.line).toBe('INFO  [kb] Published {"documentId":"rj","chunks":3}');
    });

    it('should include the error name and code', () => {
      const { logger, lines } = captureLogger();
      const error = withoutStack(new ChunkStoreIOError('disk full', 'chunks/rj/b1/x.md', 'write'));
      logger.error('Build failed', error);

      expect(lines[0]?.line).toBe('ERROR Build failed \n  Error: ChunkStoreIOError (CHUNK_STORE_IO): disk full');
    });

    it('should treat a plain object as context', () => {
      const { logger, lines } = captureLogger();
      logger.error('Rejected', { documentId: 'rj' });

      expect(lines[0]?.line).toBe('ERROR Rejected {"documentId":"rj"}');
    });

    it('should format thrown non-errors', () => {
      const { logger, lines } = captureLogger();
      logger.error('Failed', 'oops');

      expect(lines[0]?.line).toBe('ERROR Failed \n  Error: UnknownError: oops');
    });

    it('should prefix a timestamp when enabled', () => {
      const { logger, lines } = captureLogger({ timestamps: true });
      logger.info('hello');

      expect(lines[0]?.line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] INFO  hello$/);
    });
  });

  describe('json format', () => {
    it('should write one JSON object per entry', () => {
      const { logger, lines } = captureLogger({ format: 'json', source: 'kb' });
      logger.warn('Oversized unit', { unit: 'Art. 4' });

      const parsed: unknown = JSON.parse(lines[0]?.line ?? '');
      expect(parsed).toMatchObject({
        level: 'WARN',
        message: 'Oversized unit',
        source: 'kb',
        context: { unit: 'Art. 4' },
      });
    });
  });

  describe('pretty format', () => {
    it('should color the level', () => {
      const { logger, lines } = captureLogger({ format: 'pretty' });
      logger.info('hello');

      expect(lines[0]?.line).toBe('\x1b[34mINFO \x1b[0m hello');
    });

    it('should fall back to text without colors', () => {
      const { logger, lines } = captureLogger({ format: 'pretty', colors: false });
      logger.info('hello');

      expect(lines[0]?.line).toBe('INFO  hello');
    });
  });

  // ===========================================================================
  // Destinations
  // ===========================================================================

  describe('console output', () => {
    let logSpy: ReturnType<typeof vi.spyOn>;
    let errorSpy: ReturnType<typeof vi.spyOn>;

    beforeEach(() => {
      logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
      logSpy.mockRestore();
      errorSpy.mockRestore();
    });

    it('should route errors to stderr', () => {
      const logger = new Logger({ timestamps: false });
      logger.info('info');
      logger.error('error');

      expect(logSpy).toHaveBeenCalledWith('INFO  info');
      expect(errorSpy).toHaveBeenCalledWith('ERROR error');
    });

    it('should stay silent when console output is off', () => {
      const logger = new Logger({ console: false });
      logger.error('hidden');

      expect(errorSpy).not.toHaveBeenCalled();
    });
  });

  describe('file output', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'kb-logger-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should append plain lines to the log file', async () => {
      const filePath = join(dir, 'logs', 'kb.log');
      const logger = new Logger({ console: false, timestamps: false, format: 'pretty', filePath });
      logger.info('first');
      logger.warn('second');

      expect(await readFile(filePath, 'utf-8')).toBe('INFO  first\nWARN  second\n');
    });
  });
});

// =============================================================================
// Global logger
// =============================================================================

describe('Global Logger', () => {
  beforeEach(() => {
    resetGlobalLogger();
  });

  afterEach(() => {
    resetGlobalLogger();
  });

  it('should return the same instance', () => {
    expect(getGlobalLogger()).toBe(getGlobalLogger());
  });

  it('should be replaceable', () => {
    const custom = new Logger({ source: 'custom' });
    setGlobalLogger(custom);
    expect(getGlobalLogger()).toBe(custom);
  });

  it('should create a new instance after reset', () => {
    const first = getGlobalLogger();
    resetGlobalLogger();
    expect(getGlobalLogger()).not.toBe(first);
  });
});

describe('createLogger', () => {
  it('should set the source and keep other config', () => {
    const config = createLogger('manage-index', { level: LogLevel.DEBUG, format: 'json' }).getConfig();

    expect(config).toMatchObject({ source: 'manage-index', level: LogLevel.DEBUG, format: 'json' });
  });
});

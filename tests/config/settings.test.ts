/**
 * Tests for settings loading
 */

import { describe, it, expect } from 'vitest';
import { join, resolve } from 'node:path';
import { ZodError } from 'zod';
import { loadSettings, resolveDataPaths, toLogFormat } from '../../lib/src/config/index.js';
import { LogLevel } from '../../lib/src/logging/index.js';

describe('loadSettings', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadSettings({})).toEqual({
      dataDir: resolve('./data'),
      chunkMaxTokens: 14000,
      contextTokenCeiling: 24000,
      charsPerToken: 4,
      keywordsPerChunk: 15,
      cacheMaxEntries: 64,
      cacheMaxBytes: 32 * 1024 * 1024,
      storeMaxRetries: 3,
      logLevel: LogLevel.INFO,
      logFormat: 'pretty',
    });
  });

  it('should read environment variables', () => {
    const settings = loadSettings({
      KB_DATA_DIR: '/srv/kb',
      KB_CHUNK_MAX_TOKENS: '8000',
      KB_CONTEXT_TOKEN_CEILING: '12000',
      KB_STORE_MAX_RETRIES: '0',
      LOG_LEVEL: 'debug',
      LOG_FORMAT: 'json',
      LOG_FILE: '/srv/kb/logs/kb.log',
    });

    expect(settings).toMatchObject({
      dataDir: '/srv/kb',
      chunkMaxTokens: 8000,
      contextTokenCeiling: 12000,
      storeMaxRetries: 0,
      logLevel: LogLevel.DEBUG,
      logFormat: 'json',
      logFile: '/srv/kb/logs/kb.log',
    });
  });

  it('should ignore blank values', () => {
    const settings = loadSettings({ KB_CHUNK_MAX_TOKENS: ' ', LOG_FILE: '' });

    expect(settings.chunkMaxTokens).toBe(14000);
    expect(settings.logFile).toBeUndefined();
  });

  it('should let overrides win over the environment', () => {
    const settings = loadSettings({ KB_DATA_DIR: '/srv/kb', KB_CHUNK_MAX_TOKENS: '8000' }, {
      dataDir: '/tmp/other',
      chunkMaxTokens: 500,
    });

    expect(settings.dataDir).toBe('/tmp/other');
    expect(settings.chunkMaxTokens).toBe(500);
  });

  it('should reject values that are not numbers', () => {
    expect(() => loadSettings({ KB_CHUNK_MAX_TOKENS: 'many' })).toThrow(
      'Environment variable KB_CHUNK_MAX_TOKENS must be a number, got "many"'
    );
  });

  it('should reject values out of range', () => {
    expect(() => loadSettings({ KB_CONTEXT_TOKEN_CEILING: '-1' })).toThrow(ZodError);
    expect(() => loadSettings({ LOG_FORMAT: 'xml' })).toThrow(ZodError);
  });
});

describe('resolveDataPaths', () => {
  it('should lay out directories under the data directory', () => {
    expect(resolveDataPaths({ dataDir: '/srv/kb' })).toEqual({
      raw: join('/srv/kb', 'raw'),
      chunks: join('/srv/kb', 'chunks'),
      indices: join('/srv/kb', 'indices'),
      logs: join('/srv/kb', 'logs'),
    });
  });
});

describe('toLogFormat', () => {
  it('should keep known formats and fall back otherwise', () => {
    expect(toLogFormat('json', 'pretty')).toBe('json');
    expect(toLogFormat('xml', 'text')).toBe('text');
    expect(toLogFormat(undefined, 'pretty')).toBe('pretty');
  });
});

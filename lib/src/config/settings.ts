/**
 * Knowledge Base Settings
 *
 * Reads configuration from environment variables with defaults suited to a
 * local data directory. Everything downstream receives the parsed
 * `Settings` object rather than reading the environment itself.
 */

import { resolve, join } from 'node:path';
import { z } from 'zod';
import { LogFormatSchema, LogLevelSchema, parseLogLevel, type LogFormat } from '../logging/index.js';

export const SettingsSchema = z.object({
  /** Root of raw sources, chunk files, indices and logs */
  dataDir: z.string().min(1),

  /** Chunk token budget B */
  chunkMaxTokens: z.number().int().positive().default(14000),

  /** Default retrieval context ceiling C */
  contextTokenCeiling: z.number().int().positive().default(24000),

  /** Characters per token of the estimation counting scheme */
  charsPerToken: z.number().positive().default(4),

  keywordsPerChunk: z.number().int().positive().default(15),

  /** Content cache bounds */
  cacheMaxEntries: z.number().int().positive().default(64),
  cacheMaxBytes: z.number().int().positive().default(32 * 1024 * 1024),

  /** Retries for transient chunk store failures */
  storeMaxRetries: z.number().int().nonnegative().default(3),

  logLevel: LogLevelSchema.default(2),
  logFormat: LogFormatSchema.default('pretty'),
  logFile: z.string().optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Directory layout under the data directory
 */
export interface DataPaths {
  /** Source texts and the document catalog */
  raw: string;
  /** Persisted chunk files */
  chunks: string;
  /** Persisted indices and the version manifest */
  indices: string;
  logs: string;
}

const LOCAL_DEFAULTS = {
  dataDir: './data',
} as const;

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${name} must be a number, got "${raw}"`);
  }
  return parsed;
}

/**
 * Load settings from environment variables.
 *
 * Environment variables:
 * - KB_DATA_DIR: data directory (default: ./data)
 * - KB_CHUNK_MAX_TOKENS: chunk token budget (default: 14000)
 * - KB_CONTEXT_TOKEN_CEILING: retrieval ceiling (default: 24000)
 * - KB_CHARS_PER_TOKEN: estimation ratio (default: 4)
 * - KB_KEYWORDS_PER_CHUNK: keywords kept per chunk (default: 15)
 * - KB_CACHE_MAX_ENTRIES / KB_CACHE_MAX_BYTES: content cache bounds
 * - KB_STORE_MAX_RETRIES: retries for transient I/O (default: 3)
 * - LOG_LEVEL: error | warn | info | debug | trace (default: info)
 * - LOG_FORMAT: text | json | pretty (default: pretty)
 * - LOG_FILE: optional log file path
 *
 * @throws {z.ZodError} when a value is out of range
 */
export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  overrides?: Partial<Settings>
): Settings {
  const raw = {
    dataDir: resolve(env['KB_DATA_DIR'] ?? LOCAL_DEFAULTS.dataDir),
    chunkMaxTokens: readNumber(env, 'KB_CHUNK_MAX_TOKENS'),
    contextTokenCeiling: readNumber(env, 'KB_CONTEXT_TOKEN_CEILING'),
    charsPerToken: readNumber(env, 'KB_CHARS_PER_TOKEN'),
    keywordsPerChunk: readNumber(env, 'KB_KEYWORDS_PER_CHUNK'),
    cacheMaxEntries: readNumber(env, 'KB_CACHE_MAX_ENTRIES'),
    cacheMaxBytes: readNumber(env, 'KB_CACHE_MAX_BYTES'),
    storeMaxRetries: readNumber(env, 'KB_STORE_MAX_RETRIES'),
    logLevel: env['LOG_LEVEL'] ? parseLogLevel(env['LOG_LEVEL']) : undefined,
    logFormat: env['LOG_FORMAT'],
    logFile: env['LOG_FILE'] || undefined,
    ...overrides,
  };

  return SettingsSchema.parse(raw);
}

export function resolveDataPaths(settings: Pick<Settings, 'dataDir'>): DataPaths {
  return {
    raw: join(settings.dataDir, 'raw'),
    chunks: join(settings.dataDir, 'chunks'),
    indices: join(settings.dataDir, 'indices'),
    logs: join(settings.dataDir, 'logs'),
  };
}

/**
 * Narrow a CLI/env string to a log format, falling back to the given default
 */
export function toLogFormat(value: string | undefined, fallback: LogFormat): LogFormat {
  const parsed = LogFormatSchema.safeParse(value);
  return parsed.success ? parsed.data : fallback;
}

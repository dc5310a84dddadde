/**
 * File system adapter used by the chunk store and the index store.
 *
 * Tests substitute their own implementation to simulate transient or
 * permanent I/O failures.
 */

import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ChunkStoreIOError, isTransientIOError } from '../errors.js';
import type { Logger } from '../logging/index.js';
import { withRetry, type RetryConfig } from '../utils/retry.js';

export interface FileSystemIO {
  readFile(path: string): Promise<string>;
  writeFile(path: string, data: string): Promise<void>;
  /** Recursive; succeeds when the directory exists */
  mkdir(path: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  /** Recursive and forced; succeeds when nothing is there */
  rm(path: string): Promise<void>;
  readdir(path: string): Promise<string[]>;
}

export const nodeFileSystem: FileSystemIO = {
  readFile: (path) => readFile(path, 'utf-8'),
  writeFile: (path, data) => writeFile(path, data, 'utf-8'),
  mkdir: async (path) => {
    await mkdir(path, { recursive: true });
  },
  rename: (from, to) => rename(from, to),
  rm: (path) => rm(path, { recursive: true, force: true }),
  readdir: (path) => readdir(path),
};

/**
 * Node error code of a thrown value, if any
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isNotFound(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

/**
 * Write to a sibling temp file, then rename over the target
 */
export async function writeFileAtomic(io: FileSystemIO, path: string, data: string): Promise<void> {
  const tempPath = `${path}.tmp`;
  await io.mkdir(dirname(path));
  await io.writeFile(tempPath, data);
  await io.rename(tempPath, path);
}

export interface StoreOperationOptions {
  retry?: Partial<RetryConfig> | undefined;
  logger: Logger;
}

/**
 * Run one store operation with bounded retry of transient failures.
 *
 * @throws {ChunkStoreIOError} once retries are exhausted or on a permanent failure
 */
export async function runStoreOperation<T>(
  operation: ChunkStoreIOError['operation'],
  path: string,
  fn: () => Promise<T>,
  options: StoreOperationOptions
): Promise<T> {
  const { logger } = options;
  try {
    return await withRetry(fn, {
      config: options.retry,
      isRetryable: isTransientIOError,
      onRetryEvent: (event) => {
        if (event.type === 'retrying') {
          logger.warn(`Transient ${operation} failure, retrying`, {
            path,
            attempt: event.attemptNumber,
            delayMs: event.nextDelayMs,
          });
        } else if (event.type === 'max_retries_exceeded') {
          logger.error(`Giving up ${operation} after ${event.attemptNumber} attempts`, event.error, { path });
        }
      },
    });
  } catch (error) {
    if (error instanceof ChunkStoreIOError) {
      throw error;
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ChunkStoreIOError(`${operation} failed for ${path}: ${cause.message}`, path, operation, {
      cause,
      retryable: isTransientIOError(error),
    });
  }
}

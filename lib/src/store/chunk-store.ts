/**
 * Chunk Store
 *
 * One file per chunk: a JSON metadata header between `---` lines, a blank
 * line, then the chunk content with its page markers preserved. Paths are
 * relative to the data directory, exactly as recorded in the main index.
 *
 * Every file operation is retried on transient errors; anything else
 * surfaces as a `ChunkStoreIOError`.
 */

import { join } from 'node:path';
import { z } from 'zod';
import type { Chunk } from '../chunking/types.js';
import { ChunkStoreIOError } from '../errors.js';
import { getGlobalLogger, type Logger } from '../logging/index.js';
import type { RetryConfig } from '../utils/retry.js';
import {
  isNotFound,
  nodeFileSystem,
  runStoreOperation,
  writeFileAtomic,
  type FileSystemIO,
} from './file-system.js';

// =============================================================================
// File Format
// =============================================================================

export const CHUNK_FILE_EXTENSION = '.md';

/** Chunk files live under <dataDir>/chunks/<doc>/<buildId>/ */
export const CHUNKS_DIR = 'chunks';

export function chunkBuildDir(documentId: string, buildId: string): string {
  return `${CHUNKS_DIR}/${documentId}/${buildId}`;
}

const HEADER_FENCE = '---';

export const ChunkHeaderSchema = z.object({
  document_id: z.string().min(1),
  chunk_id: z.string().min(1),
  title: z.string(),
  tokens: z.number().int().nonnegative(),
  source_pdf: z.string(),
  articles: z.array(z.string()),
  keywords: z.array(z.string()),
  section: z.string().nullable(),
  pages: z.array(z.number().int().positive()),
  created_at: z.string(),
});

export type ChunkHeader = z.infer<typeof ChunkHeaderSchema>;

export interface StoredChunk {
  header: ChunkHeader;
  content: string;
}

export function toChunkHeader(chunk: Chunk): ChunkHeader {
  return {
    document_id: chunk.documentId,
    chunk_id: chunk.chunkId,
    title: chunk.title,
    tokens: chunk.tokenCount,
    source_pdf: chunk.sourcePdf,
    articles: chunk.unitIds,
    keywords: chunk.keywords,
    section: chunk.section,
    pages: chunk.pages,
    created_at: chunk.createdAt,
  };
}

export function serializeChunkFile(chunk: Chunk): string {
  const header = JSON.stringify(toChunkHeader(chunk), null, 2);
  return `${HEADER_FENCE}\n${header}\n${HEADER_FENCE}\n\n${chunk.content}\n`;
}

/**
 * @returns null when the text is not a chunk file
 */
export function parseChunkFile(text: string): StoredChunk | null {
  const opening = `${HEADER_FENCE}\n`;
  const closing = `\n${HEADER_FENCE}\n\n`;
  if (!text.startsWith(opening)) {
    return null;
  }
  const headerEnd = text.indexOf(closing, opening.length);
  if (headerEnd < 0) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(text.slice(opening.length, headerEnd));
  } catch {
    return null;
  }
  const header = ChunkHeaderSchema.safeParse(json);
  if (!header.success) {
    return null;
  }

  const body = text.slice(headerEnd + closing.length);
  return {
    header: header.data,
    content: body.endsWith('\n') ? body.slice(0, -1) : body,
  };
}

// =============================================================================
// Chunk Store
// =============================================================================

export interface ChunkStoreOptions {
  /** Data directory; chunk paths are resolved against it */
  rootDir: string;
  io?: FileSystemIO;
  retry?: Partial<RetryConfig>;
  logger?: Logger;
}

export interface ChunkStore {
  write(chunk: Chunk): Promise<void>;
  read(filePath: string): Promise<StoredChunk>;
  readContent(filePath: string): Promise<string>;
  /** Chunk ids stored under a relative directory, sorted */
  list(dir: string): Promise<string[]>;
  remove(dir: string): Promise<void>;
  listBuildIds(documentId: string): Promise<string[]>;
}

export class FileChunkStore implements ChunkStore {
  private readonly rootDir: string;
  private readonly io: FileSystemIO;
  private readonly retry: Partial<RetryConfig> | undefined;
  private readonly logger: Logger;

  constructor(options: ChunkStoreOptions) {
    this.rootDir = options.rootDir;
    this.io = options.io ?? nodeFileSystem;
    this.retry = options.retry;
    this.logger = (options.logger ?? getGlobalLogger()).child('chunk-store');
  }

  async write(chunk: Chunk): Promise<void> {
    const path = this.resolve(chunk.filePath);
    await this.run('write', path, () => writeFileAtomic(this.io, path, serializeChunkFile(chunk)));
  }

  async read(filePath: string): Promise<StoredChunk> {
    const path = this.resolve(filePath);
    const text = await this.run('read', path, () => this.io.readFile(path));
    const stored = parseChunkFile(text);
    if (!stored) {
      throw new ChunkStoreIOError(`Malformed chunk file ${filePath}`, path, 'read');
    }
    return stored;
  }

  async readContent(filePath: string): Promise<string> {
    return (await this.read(filePath)).content;
  }

  async list(dir: string): Promise<string[]> {
    const path = this.resolve(dir);
    const entries = await this.run('list', path, () => this.readdirOrEmpty(path));
    return entries
      .filter((name) => name.endsWith(CHUNK_FILE_EXTENSION))
      .map((name) => name.slice(0, -CHUNK_FILE_EXTENSION.length))
      .sort();
  }

  async remove(dir: string): Promise<void> {
    const path = this.resolve(dir);
    await this.run('remove', path, () => this.io.rm(path));
  }

  /**
   * Build directories kept for a document under chunks/<doc>/
   */
  async listBuildIds(documentId: string): Promise<string[]> {
    const path = this.resolve(join(CHUNKS_DIR, documentId));
    const entries = await this.run('list', path, () => this.readdirOrEmpty(path));
    return entries.filter((name) => !name.endsWith('.tmp')).sort();
  }

  private resolve(relativePath: string): string {
    return join(this.rootDir, relativePath);
  }

  private async readdirOrEmpty(path: string): Promise<string[]> {
    try {
      return await this.io.readdir(path);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }

  private run<T>(operation: ChunkStoreIOError['operation'], path: string, fn: () => Promise<T>): Promise<T> {
    return runStoreOperation(operation, path, fn, { retry: this.retry, logger: this.logger });
  }
}

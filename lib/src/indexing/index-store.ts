/**
 * Index Store
 *
 * Reads and writes the persisted index documents of each build under
 * `<indicesDir>/<doc>/<buildId>/` and the `current.json` pointer that names
 * the published build. Every write is write-to-temp + rename.
 */

import { join } from 'node:path';
import type { z } from 'zod';
import { IndexConsistencyError } from '../errors.js';
import { getGlobalLogger, type Logger } from '../logging/index.js';
import type { RetryConfig } from '../utils/retry.js';
import {
  isNotFound,
  nodeFileSystem,
  runStoreOperation,
  writeFileAtomic,
  type FileSystemIO,
  type StoreOperationOptions,
} from '../store/file-system.js';
import {
  ArticleIndexSchema,
  CURRENT_POINTER_FILE,
  CurrentPointerSchema,
  INDEX_FILES,
  KeywordIndexSchema,
  MainIndexSchema,
  type CurrentPointer,
  type IndexSet,
  type IndexSnapshot,
} from './types.js';

export interface IndexStoreOptions {
  /** <dataDir>/indices */
  indicesDir: string;
  io?: FileSystemIO;
  retry?: Partial<RetryConfig>;
  logger?: Logger;
}

/**
 * Stable JSON text for a persisted document
 */
export function serializeIndexDocument(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export class IndexStore {
  private readonly indicesDir: string;
  private readonly io: FileSystemIO;
  private readonly retry: Partial<RetryConfig> | undefined;
  private readonly logger: Logger;

  constructor(options: IndexStoreOptions) {
    this.indicesDir = options.indicesDir;
    this.io = options.io ?? nodeFileSystem;
    this.retry = options.retry;
    this.logger = (options.logger ?? getGlobalLogger()).child('index-store');
  }

  buildDir(documentId: string, buildId: string): string {
    return join(this.indicesDir, documentId, buildId);
  }

  // ===========================================================================
  // Indices
  // ===========================================================================

  async writeIndices(documentId: string, buildId: string, indices: IndexSet): Promise<void> {
    const dir = this.buildDir(documentId, buildId);
    await this.writeJson(join(dir, INDEX_FILES.main), indices.main);
    await this.writeJson(join(dir, INDEX_FILES.keywords), indices.keywords);
    await this.writeJson(join(dir, INDEX_FILES.articles), indices.articles);
  }

  /**
   * @throws {IndexConsistencyError} when a file is missing or fails validation
   */
  async readIndices(documentId: string, buildId: string): Promise<IndexSet> {
    const dir = this.buildDir(documentId, buildId);
    return {
      main: await this.readJson(join(dir, INDEX_FILES.main), MainIndexSchema),
      keywords: await this.readJson(join(dir, INDEX_FILES.keywords), KeywordIndexSchema),
      articles: await this.readJson(join(dir, INDEX_FILES.articles), ArticleIndexSchema),
    };
  }

  // ===========================================================================
  // Pointer
  // ===========================================================================

  async readPointer(documentId: string): Promise<CurrentPointer | null> {
    const path = join(this.indicesDir, documentId, CURRENT_POINTER_FILE);
    const text = await this.readTextOrNull(path);
    if (text === null) {
      return null;
    }
    return this.parse(path, text, CurrentPointerSchema);
  }

  /**
   * Replace the published pointer in one rename
   */
  async writePointer(pointer: CurrentPointer): Promise<void> {
    await this.writeJson(join(this.indicesDir, pointer.document_id, CURRENT_POINTER_FILE), pointer);
  }

  /**
   * Load the published snapshot of a document, or null when it has none
   */
  async loadSnapshot(documentId: string): Promise<IndexSnapshot | null> {
    const pointer = await this.readPointer(documentId);
    if (!pointer) {
      return null;
    }
    const indices = await this.readIndices(documentId, pointer.build_id);
    this.logger.debug('Loaded snapshot', { documentId, buildId: pointer.build_id, chunks: indices.main.total_chunks });
    return {
      documentId,
      version: pointer.version,
      buildId: pointer.build_id,
      publishedAt: pointer.published_at,
      indices,
    };
  }

  // ===========================================================================
  // Listing & Pruning
  // ===========================================================================

  /**
   * Document ids that have a directory under the indices root
   */
  async listDocumentIds(): Promise<string[]> {
    const entries = await this.listDir(this.indicesDir);
    return entries.filter((name) => !name.endsWith('.json') && !name.endsWith('.tmp')).sort();
  }

  async listBuildIds(documentId: string): Promise<string[]> {
    const entries = await this.listDir(join(this.indicesDir, documentId));
    return entries.filter((name) => !name.endsWith('.json') && !name.endsWith('.tmp')).sort();
  }

  async removeBuild(documentId: string, buildId: string): Promise<void> {
    const dir = this.buildDir(documentId, buildId);
    await runStoreOperation('remove', dir, () => this.io.rm(dir), this.operationOptions());
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private async writeJson(path: string, value: unknown): Promise<void> {
    await runStoreOperation(
      'write',
      path,
      () => writeFileAtomic(this.io, path, serializeIndexDocument(value)),
      this.operationOptions()
    );
  }

  private async readJson<T extends z.ZodTypeAny>(path: string, schema: T): Promise<z.infer<T>> {
    const text = await this.readTextOrNull(path);
    if (text === null) {
      throw new IndexConsistencyError(`Index file ${path} is missing`, [`missing file ${path}`], { path });
    }
    return this.parse(path, text, schema);
  }

  private parse<T extends z.ZodTypeAny>(path: string, text: string, schema: T): z.infer<T> {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new IndexConsistencyError(`Index file ${path} is not valid JSON`, [reason], { path });
    }
    const result = schema.safeParse(json);
    if (!result.success) {
      throw new IndexConsistencyError(
        `Index file ${path} does not match its schema`,
        result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
        { path }
      );
    }
    return result.data;
  }

  private readTextOrNull(path: string): Promise<string | null> {
    return runStoreOperation(
      'read',
      path,
      async () => {
        try {
          return await this.io.readFile(path);
        } catch (error) {
          if (isNotFound(error)) return null;
          throw error;
        }
      },
      this.operationOptions()
    );
  }

  private listDir(path: string): Promise<string[]> {
    return runStoreOperation(
      'list',
      path,
      async () => {
        try {
          return await this.io.readdir(path);
        } catch (error) {
          if (isNotFound(error)) return [];
          throw error;
        }
      },
      this.operationOptions()
    );
  }

  private operationOptions(): StoreOperationOptions {
    return { retry: this.retry, logger: this.logger };
  }
}

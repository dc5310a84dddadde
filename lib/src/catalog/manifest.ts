/**
 * Catalog Store & Version Manifest
 *
 * Loads the document catalog and source texts from the raw directory, and
 * keeps the manifest of indexed versions that drives incremental updates.
 */

import { join } from 'node:path';
import { MalformedInputError } from '../errors.js';
import type { BuildReport } from '../indexing/types.js';
import { getGlobalLogger, type Logger } from '../logging/index.js';
import {
  isNotFound,
  nodeFileSystem,
  runStoreOperation,
  writeFileAtomic,
  type FileSystemIO,
  type StoreOperationOptions,
} from '../store/file-system.js';
import type { RetryConfig } from '../utils/retry.js';
import {
  CATALOG_FILE,
  CatalogSchema,
  ChangeReason,
  MANIFEST_FILE,
  MANIFEST_HISTORY_LIMIT,
  ManifestSchema,
  type CatalogEntry,
  type Manifest,
} from './types.js';

export interface CatalogStoreOptions {
  rawDir: string;
  indicesDir: string;
  io?: FileSystemIO;
  retry?: Partial<RetryConfig>;
  logger?: Logger;
}

export function createEmptyManifest(): Manifest {
  return { updated_at: null, documents: {} };
}

// =============================================================================
// Pure Manifest Operations
// =============================================================================

/**
 * Manifest with a successful build recorded; the replaced version moves to
 * the front of the document's history
 */
export function recordBuild(manifest: Manifest, report: BuildReport, checksum: string): Manifest {
  const previous = manifest.documents[report.documentId];
  const history = previous
    ? previous.build_id === report.buildId
      ? previous.history
      : [
          {
            version: previous.version,
            checksum: previous.checksum,
            build_id: previous.build_id,
            indexed_at: previous.indexed_at,
          },
          ...previous.history,
        ].slice(0, MANIFEST_HISTORY_LIMIT)
    : [];

  return {
    updated_at: report.publishedAt,
    documents: {
      ...manifest.documents,
      [report.documentId]: {
        version: report.version,
        checksum,
        build_id: report.buildId,
        units: report.units,
        chunks: report.chunks,
        indexed_at: report.publishedAt,
        history,
      },
    },
  };
}

/**
 * Why the document must be (re)indexed, or null when the manifest is current
 */
export function detectChange(
  manifest: Manifest,
  entry: CatalogEntry,
  checksum: string,
  hasPublishedIndex: boolean
): ChangeReason | null {
  const indexed = manifest.documents[entry.id];
  if (!indexed) {
    return ChangeReason.NEW;
  }
  if (indexed.version !== entry.version) {
    return ChangeReason.VERSION_CHANGED;
  }
  if (indexed.checksum !== checksum) {
    return ChangeReason.CHECKSUM_CHANGED;
  }
  if (!hasPublishedIndex) {
    return ChangeReason.INDEX_MISSING;
  }
  return null;
}

// =============================================================================
// Catalog Store
// =============================================================================

export class CatalogStore {
  private readonly rawDir: string;
  private readonly indicesDir: string;
  private readonly io: FileSystemIO;
  private readonly operationOptions: StoreOperationOptions;

  constructor(options: CatalogStoreOptions) {
    this.rawDir = options.rawDir;
    this.indicesDir = options.indicesDir;
    this.io = options.io ?? nodeFileSystem;
    this.operationOptions = {
      retry: options.retry,
      logger: (options.logger ?? getGlobalLogger()).child('catalog'),
    };
  }

  /**
   * Catalog entries; empty when raw/documents.json does not exist
   *
   * @throws {MalformedInputError} when the catalog does not validate
   */
  async loadCatalog(): Promise<CatalogEntry[]> {
    const path = join(this.rawDir, CATALOG_FILE);
    const text = await this.readOrNull(path);
    if (text === null) {
      return [];
    }
    const result = CatalogSchema.safeParse(parseJson(path, text));
    if (!result.success) {
      throw new MalformedInputError(`Catalog ${path} is invalid`, {
        path,
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return result.data;
  }

  async readSource(entry: CatalogEntry): Promise<string> {
    const path = join(this.rawDir, entry.file);
    return runStoreOperation('read', path, () => this.io.readFile(path), this.operationOptions);
  }

  async loadManifest(): Promise<Manifest> {
    const path = join(this.indicesDir, MANIFEST_FILE);
    const text = await this.readOrNull(path);
    if (text === null) {
      return createEmptyManifest();
    }
    const result = ManifestSchema.safeParse(parseJson(path, text));
    if (!result.success) {
      throw new MalformedInputError(`Manifest ${path} is invalid`, {
        path,
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return result.data;
  }

  async saveManifest(manifest: Manifest): Promise<void> {
    const path = join(this.indicesDir, MANIFEST_FILE);
    await runStoreOperation(
      'write',
      path,
      () => writeFileAtomic(this.io, path, `${JSON.stringify(manifest, null, 2)}\n`),
      this.operationOptions
    );
  }

  private readOrNull(path: string): Promise<string | null> {
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
      this.operationOptions
    );
  }
}

function parseJson(path: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedInputError(`${path} is not valid JSON`, {
      path,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

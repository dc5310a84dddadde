/**
 * Knowledge Base
 *
 * Boundary of the engine: builds and publishes document versions, serves
 * retrieval over every published snapshot, validates persisted indices and
 * keeps the version manifest in step. Build-side calls never throw; they
 * report `{ ok: false, error }` with the error code and diagnostic detail.
 *
 * @example
 * ```typescript
 * const kb = new KnowledgeBase({ settings: loadSettings() });
 * await kb.load();
 *
 * const outcome = await kb.rebuild({ documentId: 'rfebm-2024', version: '2024.1', text });
 * if (!outcome.ok) console.error(outcome.error.code, outcome.error.message);
 *
 * const result = await kb.retrieve('Art. 8 sanciones');
 * ```
 */

import { CatalogStore, detectChange, recordBuild, type CatalogEntry, type ChangeReason } from './catalog/index.js';
import { TokenCounter, type TokenizerInterface } from './chunking/token-counter.js';
import { resolveDataPaths, type DataPaths, type Settings } from './config/index.js';
import {
  IndexConsistencyError,
  KnowledgeBaseError,
  KnowledgeBaseErrorCode,
  type ErrorDetail,
} from './errors.js';
import { findIndexProblems } from './indexing/index-builder.js';
import { IndexStore } from './indexing/index-store.js';
import { IndexPublisher } from './indexing/publisher.js';
import type { BuildReport, CurrentPointer, DocumentVersionInput, IndexSnapshot } from './indexing/types.js';
import { createLogger, type Logger } from './logging/index.js';
import { ContentCache } from './retrieval/content-cache.js';
import { RetrievalEngine } from './retrieval/retrieval-engine.js';
import type { RetrievalResult, RetrieveOptions } from './retrieval/types.js';
import { chunkBuildDir, FileChunkStore } from './store/chunk-store.js';
import type { FileSystemIO } from './store/file-system.js';
import { calculateChecksum } from './utils/checksum.js';

// =============================================================================
// Types
// =============================================================================

export interface KnowledgeBaseOptions {
  settings: Settings;
  /** File system adapter shared by every store (tests inject failures here) */
  io?: FileSystemIO;
  logger?: Logger;
  clock?: () => Date;
  /** Exact tokenizer; estimation from settings.charsPerToken otherwise */
  tokenizer?: TokenizerInterface;
}

export type RebuildOutcome =
  | { ok: true; report: BuildReport }
  | { ok: false; documentId: string; error: ErrorDetail };

export interface UpdateSummary {
  rebuilt: BuildReport[];
  skipped: string[];
  failed: Array<{ documentId: string; error: ErrorDetail }>;
  /** Why each rebuilt or failed document was selected */
  reasons: Record<string, ChangeReason | 'requested'>;
}

export interface ValidationReport {
  documentId: string;
  buildId: string | null;
  ok: boolean;
  problems: string[];
}

export interface DocumentStatus {
  documentId: string;
  title: string;
  catalogVersion: string | null;
  indexedVersion: string | null;
  checksum: string | null;
  buildId: string | null;
  chunks: number | null;
  indexedAt: string | null;
  published: boolean;
}

// =============================================================================
// Knowledge Base
// =============================================================================

export class KnowledgeBase {
  readonly paths: DataPaths;
  private readonly settings: Settings;
  private readonly logger: Logger;
  private readonly chunkStore: FileChunkStore;
  private readonly indexStore: IndexStore;
  private readonly catalog: CatalogStore;
  private readonly publisher: IndexPublisher;
  private readonly engine: RetrievalEngine;
  private manifestQueue: Promise<void> = Promise.resolve();

  constructor(options: KnowledgeBaseOptions) {
    const { settings } = options;
    this.settings = settings;
    this.paths = resolveDataPaths(settings);
    this.logger =
      options.logger ??
      createLogger('knowledge-base', {
        level: settings.logLevel,
        format: settings.logFormat,
        filePath: settings.logFile,
      });

    const retry = { maxRetries: settings.storeMaxRetries };
    const shared = { retry, logger: this.logger, ...(options.io ? { io: options.io } : {}) };

    const counter = new TokenCounter({ charsPerToken: settings.charsPerToken });
    if (options.tokenizer) {
      counter.setTokenizer(options.tokenizer);
    }

    this.chunkStore = new FileChunkStore({ rootDir: settings.dataDir, ...shared });
    this.indexStore = new IndexStore({ indicesDir: this.paths.indices, ...shared });
    this.catalog = new CatalogStore({ rawDir: this.paths.raw, indicesDir: this.paths.indices, ...shared });
    this.publisher = new IndexPublisher({
      chunkStore: this.chunkStore,
      indexStore: this.indexStore,
      chunking: { maxTokens: settings.chunkMaxTokens, keywordsPerChunk: settings.keywordsPerChunk },
      counter,
      logger: this.logger,
      ...(options.clock ? { clock: options.clock } : {}),
    });
    this.engine = new RetrievalEngine({
      chunkStore: this.chunkStore,
      cache: new ContentCache({ maxEntries: settings.cacheMaxEntries, maxBytes: settings.cacheMaxBytes }),
      tokenCeiling: settings.contextTokenCeiling,
      logger: this.logger,
    });
  }

  // ===========================================================================
  // Loading
  // ===========================================================================

  /**
   * Publish every persisted snapshot to the retrieval engine
   *
   * @returns ids of the documents loaded
   */
  async load(): Promise<string[]> {
    const loaded: string[] = [];
    for (const documentId of await this.indexStore.listDocumentIds()) {
      try {
        const snapshot = await this.indexStore.loadSnapshot(documentId);
        if (snapshot) {
          this.engine.publish(snapshot);
          loaded.push(documentId);
        }
      } catch (error) {
        this.logger.error(`Could not load index of ${documentId}`, error);
      }
    }
    this.logger.info('Loaded published indices', { documents: loaded.length });
    return loaded;
  }

  getSnapshot(documentId: string): IndexSnapshot | undefined {
    return this.engine.getSnapshot(documentId);
  }

  // ===========================================================================
  // Building
  // ===========================================================================

  /**
   * Build and publish one document version. The previous snapshot keeps
   * serving until the new one is complete.
   */
  async rebuild(doc: DocumentVersionInput): Promise<RebuildOutcome> {
    try {
      const { report, snapshot } = await this.publisher.publish(doc);
      this.engine.publish(snapshot);
      await this.recordInManifest(report, calculateChecksum(doc.text));
      return { ok: true, report };
    } catch (error) {
      const failure = KnowledgeBaseError.fromError(error);
      this.logger.error(`Build of ${doc.documentId} failed`, failure);
      return { ok: false, documentId: doc.documentId, error: failure.toDetail() };
    }
  }

  /**
   * Rebuild catalogued documents (all, or the given ids)
   */
  async rebuildCatalog(documentIds?: string[]): Promise<UpdateSummary> {
    const entries = await this.catalog.loadCatalog();
    const selected = documentIds ? entries.filter((entry) => documentIds.includes(entry.id)) : entries;
    const summary = createSummary();

    for (const documentId of documentIds ?? []) {
      if (!entries.some((entry) => entry.id === documentId)) {
        summary.failed.push({
          documentId,
          error: {
            code: KnowledgeBaseErrorCode.NOT_FOUND,
            message: `Document "${documentId}" is not in the catalog`,
            details: {},
          },
        });
      }
    }

    for (const entry of selected) {
      summary.reasons[entry.id] = 'requested';
      await this.rebuildEntry(entry, summary);
    }
    return summary;
  }

  /**
   * Rebuild only catalogued documents whose version or source checksum
   * changed, or whose published index is missing
   */
  async update(): Promise<UpdateSummary> {
    const entries = await this.catalog.loadCatalog();
    const manifest = await this.catalog.loadManifest();
    const summary = createSummary();

    for (const entry of entries) {
      let text: string;
      try {
        text = await this.catalog.readSource(entry);
      } catch (error) {
        summary.failed.push({ documentId: entry.id, error: KnowledgeBaseError.fromError(error).toDetail() });
        continue;
      }

      const published = (await this.indexStore.readPointer(entry.id)) !== null;
      const reason = detectChange(manifest, entry, calculateChecksum(text), published);
      if (reason === null) {
        summary.skipped.push(entry.id);
        continue;
      }

      this.logger.info(`Updating ${entry.id}`, { reason });
      summary.reasons[entry.id] = reason;
      await this.rebuildEntry(entry, summary, text);
    }
    return summary;
  }

  private async rebuildEntry(entry: CatalogEntry, summary: UpdateSummary, source?: string): Promise<void> {
    let text: string;
    try {
      text = source ?? (await this.catalog.readSource(entry));
    } catch (error) {
      summary.failed.push({ documentId: entry.id, error: KnowledgeBaseError.fromError(error).toDetail() });
      return;
    }

    const outcome = await this.rebuild({
      documentId: entry.id,
      version: entry.version,
      title: entry.title,
      sourcePdf: entry.source_pdf,
      text,
      ...(entry.created_at ? { createdAt: entry.created_at } : {}),
    });
    if (outcome.ok) {
      summary.rebuilt.push(outcome.report);
    } else {
      summary.failed.push({ documentId: outcome.documentId, error: outcome.error });
    }
  }

  /**
   * Manifest writes are serialized; a failure is logged because the
   * snapshot is already published and the next update rebuilds it
   */
  private recordInManifest(report: BuildReport, checksum: string): Promise<void> {
    const next = this.manifestQueue.then(async () => {
      try {
        const manifest = await this.catalog.loadManifest();
        await this.catalog.saveManifest(recordBuild(manifest, report, checksum));
      } catch (error) {
        this.logger.error(`Could not record ${report.documentId} in the manifest`, error);
      }
    });
    this.manifestQueue = next;
    return next;
  }

  // ===========================================================================
  // Validation
  // ===========================================================================

  /**
   * Check persisted indices against each other and against the chunk files
   */
  async validate(documentId?: string): Promise<ValidationReport[]> {
    const documentIds = documentId ? [documentId] : await this.indexStore.listDocumentIds();
    const reports: ValidationReport[] = [];
    for (const id of documentIds) {
      reports.push(await this.validateDocument(id));
    }
    return reports;
  }

  private async validateDocument(documentId: string): Promise<ValidationReport> {
    let pointer: CurrentPointer | null;
    try {
      pointer = await this.indexStore.readPointer(documentId);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { documentId, buildId: null, ok: false, problems: [message] };
    }
    if (pointer === null) {
      return { documentId, buildId: null, ok: false, problems: ['No published index'] };
    }

    const buildId = pointer.build_id;
    try {
      const indices = await this.indexStore.readIndices(documentId, buildId);
      const chunkDir = chunkBuildDir(documentId, buildId);
      const problems = findIndexProblems(indices, await this.chunkStore.list(chunkDir));

      if (indices.main.version !== pointer.version) {
        problems.push(`Pointer names version ${pointer.version} but indices hold ${indices.main.version}`);
      }

      for (const entry of indices.main.documents) {
        try {
          const { header } = await this.chunkStore.read(entry.file_path);
          if (header.chunk_id !== entry.id || header.tokens !== entry.tokens) {
            problems.push(`Chunk file ${entry.file_path} header disagrees with the main index`);
          } else if (header.articles.join('\n') !== entry.articles.join('\n')) {
            problems.push(`Chunk file ${entry.file_path} lists different units than the main index`);
          }
        } catch (error) {
          problems.push(error instanceof Error ? error.message : String(error));
        }
      }

      return { documentId, buildId, ok: problems.length === 0, problems };
    } catch (error) {
      const problems = error instanceof IndexConsistencyError ? error.problems : [];
      const message = error instanceof Error ? error.message : String(error);
      return { documentId, buildId, ok: false, problems: [message, ...problems] };
    }
  }

  // ===========================================================================
  // Retrieval & Status
  // ===========================================================================

  /**
   * @throws {RetrievalAbortedError} when options.signal fires
   * @throws {ChunkStoreIOError} when chunk content cannot be read
   */
  retrieve(query: string, options?: RetrieveOptions): Promise<RetrievalResult> {
    return this.engine.retrieve(query, options);
  }

  async status(): Promise<DocumentStatus[]> {
    const entries = await this.catalog.loadCatalog();
    const manifest = await this.catalog.loadManifest();
    const ids = [...new Set([...entries.map((e) => e.id), ...Object.keys(manifest.documents)])].sort();

    return ids.map((documentId): DocumentStatus => {
      const entry = entries.find((e) => e.id === documentId);
      const indexed = manifest.documents[documentId];
      return {
        documentId,
        title: entry?.title ?? '',
        catalogVersion: entry?.version ?? null,
        indexedVersion: indexed?.version ?? null,
        checksum: indexed?.checksum ?? null,
        buildId: indexed?.build_id ?? null,
        chunks: indexed?.chunks ?? null,
        indexedAt: indexed?.indexed_at ?? null,
        published: this.engine.getSnapshot(documentId) !== undefined,
      };
    });
  }

  getSettings(): Readonly<Settings> {
    return this.settings;
  }

  getCacheStats(): ReturnType<ContentCache['getStats']> {
    return this.engine.getCache().getStats();
  }
}

function createSummary(): UpdateSummary {
  return { rebuilt: [], skipped: [], failed: [], reasons: {} };
}

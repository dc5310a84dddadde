/**
 * Index Publisher
 *
 * Runs one build of a document version end to end: chunk, persist chunk
 * files, build and persist indices, validate them against the store, then
 * swap the `current.json` pointer. Until the swap the previous snapshot
 * stays published; a failure removes the staging output and leaves it alone.
 *
 * One build per document id at a time; a second call for the same id while
 * one runs fails with `BuildInProgressError`.
 */

import { chunkDocument } from '../chunking/chunker.js';
import type { TokenCounter } from '../chunking/token-counter.js';
import { createDefaultChunkingConfig, type ChunkingConfig } from '../chunking/types.js';
import { BuildInProgressError, IndexConsistencyError, MalformedInputError } from '../errors.js';
import { getGlobalLogger, type Logger } from '../logging/index.js';
import { chunkBuildDir, type ChunkStore } from '../store/chunk-store.js';
import { calculateChecksum } from '../utils/checksum.js';
import { buildIndices, findIndexProblems } from './index-builder.js';
import type { IndexStore } from './index-store.js';
import {
  DocumentVersionSchema,
  type BuildReport,
  type CurrentPointer,
  type DocumentVersionInput,
  type IndexSnapshot,
} from './types.js';

export interface PublisherOptions {
  chunkStore: ChunkStore;
  indexStore: IndexStore;
  chunking?: Partial<ChunkingConfig>;
  counter?: TokenCounter;
  /** Source of build timestamps when the document carries none */
  clock?: () => Date;
  logger?: Logger;
}

export interface PublishResult {
  report: BuildReport;
  snapshot: IndexSnapshot;
}

/** Length of the hex build id */
const BUILD_ID_LENGTH = 16;

export class IndexPublisher {
  private readonly chunkStore: ChunkStore;
  private readonly indexStore: IndexStore;
  private readonly chunking: ChunkingConfig;
  private readonly counter: TokenCounter | undefined;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly building = new Set<string>();

  constructor(options: PublisherOptions) {
    this.chunkStore = options.chunkStore;
    this.indexStore = options.indexStore;
    this.chunking = createDefaultChunkingConfig(options.chunking);
    this.counter = options.counter;
    this.clock = options.clock ?? (() => new Date());
    this.logger = (options.logger ?? getGlobalLogger()).child('publisher');
  }

  isBuilding(documentId: string): boolean {
    return this.building.has(documentId);
  }

  /**
   * Build and publish one document version
   *
   * @throws {BuildInProgressError} when a build for the same document is running
   * @throws {MalformedInputError} when the text cannot be parsed
   * @throws {IndexConsistencyError} when the derived indices disagree
   * @throws {ChunkStoreIOError} on permanent store failure
   */
  async publish(input: DocumentVersionInput): Promise<PublishResult> {
    // Lock is taken before the first await
    const documentId = input.documentId;
    if (this.building.has(documentId)) {
      throw new BuildInProgressError(documentId);
    }
    this.building.add(documentId);

    try {
      return await this.runBuild(input);
    } finally {
      this.building.delete(documentId);
    }
  }

  private async runBuild(input: DocumentVersionInput): Promise<PublishResult> {
    const parsed = DocumentVersionSchema.safeParse(input);
    if (!parsed.success) {
      throw new MalformedInputError(`Invalid document version for "${input.documentId}"`, {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    const doc = parsed.data;
    const createdAt = doc.createdAt ?? this.clock().toISOString();
    const buildId = this.computeBuildId(doc.text, doc.version, doc.title, doc.sourcePdf, createdAt);
    const chunkDir = chunkBuildDir(doc.documentId, buildId);
    const log = this.logger.child(doc.documentId);

    log.info('Building index', { version: doc.version, buildId });

    const chunking = chunkDocument({
      documentId: doc.documentId,
      sourcePdf: doc.sourcePdf,
      createdAt,
      text: doc.text,
      config: this.chunking,
      resolvePath: (chunkId) => `${chunkDir}/${chunkId}.md`,
      ...(this.counter ? { counter: this.counter } : {}),
    });
    for (const warning of chunking.warnings) {
      log.warn(warning);
    }

    const indices = buildIndices({
      chunks: chunking.chunks,
      units: chunking.units,
      version: doc.version,
      createdAt,
    });

    const current = await this.indexStore.readPointer(doc.documentId);
    const unchanged = current?.build_id === buildId;
    const live = new Set([current?.build_id, current?.previous_build_id]);
    const previousBuildId = unchanged ? (current?.previous_build_id ?? null) : (current?.build_id ?? null);
    const pointer: CurrentPointer = {
      document_id: doc.documentId,
      version: doc.version,
      build_id: buildId,
      previous_build_id: previousBuildId,
      published_at: this.clock().toISOString(),
    };

    try {
      for (const chunk of chunking.chunks) {
        await this.chunkStore.write(chunk);
      }
      await this.indexStore.writeIndices(doc.documentId, buildId, indices);

      const problems = findIndexProblems(indices, await this.chunkStore.list(chunkDir));
      if (problems.length > 0) {
        throw new IndexConsistencyError(`Build ${buildId} of ${doc.documentId} failed validation`, problems, {
          documentId: doc.documentId,
          buildId,
        });
      }

      await this.indexStore.writePointer(pointer);
    } catch (error) {
      if (!live.has(buildId)) {
        await this.discardBuild(doc.documentId, buildId, log);
      }
      throw error;
    }

    await this.prune(doc.documentId, new Set([buildId, previousBuildId]), log);

    const report: BuildReport = {
      documentId: doc.documentId,
      version: doc.version,
      buildId,
      units: chunking.totalUnits,
      chunks: chunking.totalChunks,
      totalTokens: chunking.stats.totalTokens,
      oversized: chunking.warnings,
      previousBuildId,
      unchanged,
      publishedAt: pointer.published_at,
    };

    log.info('Published index', {
      buildId,
      units: report.units,
      chunks: report.chunks,
      oversized: report.oversized.length,
      unchanged,
    });

    return {
      report,
      snapshot: {
        documentId: doc.documentId,
        version: doc.version,
        buildId,
        publishedAt: pointer.published_at,
        indices,
      },
    };
  }

  /**
   * Content hash of everything that shapes the build output
   */
  private computeBuildId(...parts: string[]): string {
    const fingerprint = JSON.stringify({
      parts,
      chunking: this.chunking,
      charsPerToken: this.counter?.getCharsPerToken() ?? null,
      tokenizer: this.counter?.hasTokenizer() ?? false,
    });
    return calculateChecksum(fingerprint).slice(0, BUILD_ID_LENGTH);
  }

  private async discardBuild(documentId: string, buildId: string, log: Logger): Promise<void> {
    try {
      await this.chunkStore.remove(chunkBuildDir(documentId, buildId));
      await this.indexStore.removeBuild(documentId, buildId);
    } catch (cleanupError) {
      log.error('Failed to remove staging output', cleanupError, { buildId });
    }
  }

  /**
   * Remove build directories other than the kept ones. Failures are logged;
   * the new snapshot is already published.
   */
  private async prune(documentId: string, keep: Set<string | null>, log: Logger): Promise<void> {
    try {
      for (const buildId of await this.chunkStore.listBuildIds(documentId)) {
        if (!keep.has(buildId)) {
          await this.chunkStore.remove(chunkBuildDir(documentId, buildId));
        }
      }
      for (const buildId of await this.indexStore.listBuildIds(documentId)) {
        if (!keep.has(buildId)) {
          await this.indexStore.removeBuild(documentId, buildId);
        }
      }
    } catch (error) {
      log.warn('Pruning old builds failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

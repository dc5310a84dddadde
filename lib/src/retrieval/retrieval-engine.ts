/**
 * Retrieval Engine
 *
 * Resolves a query against the published index snapshots:
 * 1. parse the query into keyword terms and direct unit references
 * 2. look terms up in each keyword index and references in each article index
 * 3. rank candidates by the number of distinct matches, ties in document order
 * 4. take ranked chunks while the running token total stays within the ceiling
 *
 * Snapshots are replaced by reference; a retrieval works on the map it saw
 * when it started.
 */

import { RetrievalAbortedError } from '../errors.js';
import type { IndexSnapshot, MainIndexEntry } from '../indexing/types.js';
import { getGlobalLogger, type Logger } from '../logging/index.js';
import type { ChunkStore } from '../store/chunk-store.js';
import { ContentCache } from './content-cache.js';
import { parseQuery } from './query.js';
import {
  RetrievalStatus,
  type ParsedQuery,
  type RetrievalResult,
  type RetrievedChunk,
  type RetrieveOptions,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface RetrievalEngineOptions {
  chunkStore: ChunkStore;
  cache?: ContentCache;
  /** Default context ceiling C */
  tokenCeiling?: number;
  logger?: Logger;
}

/**
 * A chunk that matched the query, before the ceiling is applied
 */
export interface Candidate {
  documentId: string;
  entry: MainIndexEntry;
  /** Position of the document among snapshots, then of the chunk in its main index */
  order: [number, number];
  matchedTerms: string[];
  directReference: boolean;
}

export const DEFAULT_TOKEN_CEILING = 24000;

// =============================================================================
// Candidate Resolution
// =============================================================================

/**
 * Every chunk matching at least one term or reference, ranked by score
 * descending, then document id, then chunk position
 */
export function rankCandidates(query: ParsedQuery, snapshots: readonly IndexSnapshot[]): Candidate[] {
  const ordered = [...snapshots].sort((a, b) =>
    a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0
  );
  const candidates: Candidate[] = [];

  ordered.forEach((snapshot, documentIndex) => {
    const { main, keywords, articles } = snapshot.indices;
    const positions = new Map(main.documents.map((entry, index) => [entry.id, index]));
    const matches = new Map<string, { terms: string[]; direct: boolean }>();

    const record = (chunkId: string, term: string, direct: boolean): void => {
      const match = matches.get(chunkId) ?? { terms: [], direct: false };
      if (!match.terms.includes(term)) {
        match.terms.push(term);
      }
      match.direct = match.direct || direct;
      matches.set(chunkId, match);
    };

    for (const unitRef of query.unitRefs) {
      const article = articles.index[unitRef];
      if (article) {
        record(article.chunk_id, unitRef, true);
      }
    }

    for (const term of query.terms) {
      for (const chunkId of keywords.index[term]?.chunks ?? []) {
        record(chunkId, term, false);
      }
    }

    for (const [chunkId, match] of matches) {
      const position = positions.get(chunkId);
      const entry = position === undefined ? undefined : main.documents[position];
      if (position === undefined || !entry) {
        continue;
      }
      candidates.push({
        documentId: snapshot.documentId,
        entry,
        order: [documentIndex, position],
        matchedTerms: match.terms,
        directReference: match.direct,
      });
    }
  });

  return candidates.sort(
    (a, b) =>
      b.matchedTerms.length - a.matchedTerms.length ||
      a.order[0] - b.order[0] ||
      a.order[1] - b.order[1]
  );
}

/**
 * Longest prefix of the ranked candidates whose token total stays within
 * the ceiling
 */
export function applyTokenCeiling(
  candidates: readonly Candidate[],
  ceiling: number
): { selected: Candidate[]; totalTokens: number; truncated: boolean } {
  const selected: Candidate[] = [];
  let totalTokens = 0;

  for (const candidate of candidates) {
    if (totalTokens + candidate.entry.tokens > ceiling) {
      return { selected, totalTokens, truncated: true };
    }
    selected.push(candidate);
    totalTokens += candidate.entry.tokens;
  }

  return { selected, totalTokens, truncated: false };
}

// =============================================================================
// Retrieval Engine Class
// =============================================================================

export class RetrievalEngine {
  private readonly chunkStore: ChunkStore;
  private readonly cache: ContentCache;
  private readonly tokenCeiling: number;
  private readonly logger: Logger;
  private snapshots: ReadonlyMap<string, IndexSnapshot> = new Map();

  constructor(options: RetrievalEngineOptions) {
    this.chunkStore = options.chunkStore;
    this.cache = options.cache ?? new ContentCache();
    this.tokenCeiling = options.tokenCeiling ?? DEFAULT_TOKEN_CEILING;
    this.logger = (options.logger ?? getGlobalLogger()).child('retrieval');
  }

  /**
   * Make a snapshot live, replacing any previous one for its document.
   * Cached content of the replaced build is dropped.
   */
  publish(snapshot: IndexSnapshot): void {
    const next = new Map(this.snapshots);
    const previous = next.get(snapshot.documentId);
    next.set(snapshot.documentId, snapshot);
    this.snapshots = next;
    if (previous) {
      this.cache.clear();
    }
  }

  unpublish(documentId: string): boolean {
    if (!this.snapshots.has(documentId)) {
      return false;
    }
    const next = new Map(this.snapshots);
    next.delete(documentId);
    this.snapshots = next;
    this.cache.clear();
    return true;
  }

  getSnapshot(documentId: string): IndexSnapshot | undefined {
    return this.snapshots.get(documentId);
  }

  listSnapshots(): IndexSnapshot[] {
    return [...this.snapshots.values()];
  }

  getCache(): ContentCache {
    return this.cache;
  }

  /**
   * Retrieve the chunks most relevant to a query within the token ceiling
   *
   * @throws {RetrievalAbortedError} when the signal fires before completion
   * @throws {ChunkStoreIOError} when chunk content cannot be read
   */
  async retrieve(query: string, options?: RetrieveOptions): Promise<RetrievalResult> {
    const signal = options?.signal;
    throwIfAborted(signal);

    const ceiling = options?.tokenCeiling ?? this.tokenCeiling;
    const parsed = parseQuery(query);
    const filter = options?.documentIds;
    const snapshots = [...this.snapshots.values()].filter(
      (snapshot) => !filter || filter.includes(snapshot.documentId)
    );

    const candidates = rankCandidates(parsed, snapshots);
    if (candidates.length === 0) {
      this.logger.debug('No match', { query, terms: parsed.terms, unitRefs: parsed.unitRefs });
      return {
        status: RetrievalStatus.NO_MATCH_FOUND,
        chunks: [],
        truncated: false,
        matchCount: 0,
        totalTokens: 0,
        terms: parsed.terms,
        unitRefs: parsed.unitRefs,
      };
    }

    const { selected, totalTokens, truncated } = applyTokenCeiling(candidates, ceiling);

    const chunks = await Promise.all(
      selected.map(async (candidate): Promise<RetrievedChunk> => {
        const filePath = candidate.entry.file_path;
        const content = await this.cache.getOrLoad(filePath, () => this.chunkStore.readContent(filePath));
        throwIfAborted(signal);
        return {
          chunkId: candidate.entry.id,
          documentId: candidate.documentId,
          content,
          metadata: candidate.entry,
          score: candidate.matchedTerms.length,
          matchedTerms: candidate.matchedTerms,
          directReference: candidate.directReference,
        };
      })
    );
    throwIfAborted(signal);

    this.logger.debug('Retrieved', {
      query,
      candidates: candidates.length,
      returned: chunks.length,
      totalTokens,
      truncated,
    });

    return {
      status: RetrievalStatus.MATCHED,
      chunks,
      truncated,
      matchCount: candidates.length,
      totalTokens,
      terms: parsed.terms,
      unitRefs: parsed.unitRefs,
    };
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RetrievalAbortedError();
  }
}

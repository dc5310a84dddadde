/**
 * Index Builder
 *
 * Derives the main, keyword and article indices from one canonical chunk
 * list in a single pass, and checks that persisted indices still agree with
 * each other and with the chunk store.
 */

import type { Chunk, LogicalUnit } from '../chunking/types.js';
import { IndexConsistencyError } from '../errors.js';
import type { ArticleIndex, IndexSet, KeywordIndex, MainIndex, MainIndexEntry } from './types.js';

export interface BuildIndicesInput {
  chunks: readonly Chunk[];
  /** Every parsed unit of the document, in order */
  units: readonly LogicalUnit[];
  /** Document version the indices describe */
  version: string;
  createdAt: string;
}

// =============================================================================
// Building
// =============================================================================

export function toMainIndexEntry(chunk: Chunk): MainIndexEntry {
  return {
    id: chunk.chunkId,
    title: chunk.title,
    file_path: chunk.filePath,
    tokens: chunk.tokenCount,
    articles: chunk.unitIds,
    keywords: chunk.keywords,
    section: chunk.section,
    pages: chunk.pages,
    source_pdf: chunk.sourcePdf,
  };
}

/**
 * Build all three indices from one chunk list
 *
 * @throws {IndexConsistencyError} when chunk ids repeat, a unit lands in more
 *         than one chunk, or units and chunks do not partition each other
 */
export function buildIndices(input: BuildIndicesInput): IndexSet {
  const { chunks, units, version, createdAt } = input;
  const problems: string[] = [];

  const unitsById = new Map(units.map((unit) => [unit.id, unit]));
  const chunkIds = new Set<string>();
  const unitOwner = new Map<string, string>();
  const keywordChunks = new Map<string, string[]>();
  const articleEntries: Array<[string, ArticleIndex['index'][string]]> = [];

  for (const chunk of chunks) {
    if (chunkIds.has(chunk.chunkId)) {
      problems.push(`Chunk id "${chunk.chunkId}" is used more than once`);
    }
    chunkIds.add(chunk.chunkId);

    for (const unitId of chunk.unitIds) {
      const owner = unitOwner.get(unitId);
      if (owner !== undefined) {
        problems.push(`Unit "${unitId}" appears in chunks "${owner}" and "${chunk.chunkId}"`);
        continue;
      }
      unitOwner.set(unitId, chunk.chunkId);

      const unit = unitsById.get(unitId);
      if (!unit) {
        problems.push(`Chunk "${chunk.chunkId}" references unknown unit "${unitId}"`);
        continue;
      }
      articleEntries.push([unitId, { title: unit.title, chunk_id: chunk.chunkId, pages: unit.pages }]);
    }

    for (const keyword of chunk.keywords) {
      const list = keywordChunks.get(keyword) ?? [];
      if (list[list.length - 1] !== chunk.chunkId) {
        list.push(chunk.chunkId);
      }
      keywordChunks.set(keyword, list);
    }
  }

  for (const unit of units) {
    if (!unitOwner.has(unit.id)) {
      problems.push(`Unit "${unit.id}" is not assigned to any chunk`);
    }
  }

  if (problems.length > 0) {
    throw new IndexConsistencyError(`Cannot build indices for version ${version}`, problems, { version });
  }

  const main: MainIndex = {
    version,
    created_at: createdAt,
    total_chunks: chunks.length,
    documents: chunks.map(toMainIndexEntry),
  };

  const keywords: KeywordIndex = {
    version,
    index: Object.fromEntries(
      [...keywordChunks.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([keyword, chunkList]) => [keyword, { chunks: chunkList }])
    ),
  };

  const articles: ArticleIndex = {
    version,
    index: Object.fromEntries(articleEntries),
  };

  return { main, keywords, articles };
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Every disagreement between the indices, and between the main index and
 * the chunk ids found in the store (when given). Empty when consistent.
 */
export function findIndexProblems(indices: IndexSet, storedChunkIds?: readonly string[]): string[] {
  const { main, keywords, articles } = indices;
  const problems: string[] = [];

  if (keywords.version !== main.version || articles.version !== main.version) {
    problems.push(
      `Index versions disagree: main=${main.version} keyword=${keywords.version} article=${articles.version}`
    );
  }
  if (main.total_chunks !== main.documents.length) {
    problems.push(`Main index declares ${main.total_chunks} chunks but lists ${main.documents.length}`);
  }

  const entries = new Map<string, MainIndexEntry>();
  for (const entry of main.documents) {
    if (entries.has(entry.id)) {
      problems.push(`Chunk id "${entry.id}" is listed more than once in the main index`);
    }
    entries.set(entry.id, entry);
  }

  const seenUnits = new Map<string, string>();
  for (const entry of main.documents) {
    for (const unitId of entry.articles) {
      const owner = seenUnits.get(unitId);
      if (owner !== undefined) {
        problems.push(`Unit "${unitId}" appears in chunks "${owner}" and "${entry.id}"`);
      }
      seenUnits.set(unitId, entry.id);

      const article = articles.index[unitId];
      if (!article) {
        problems.push(`Unit "${unitId}" of chunk "${entry.id}" is missing from the article index`);
      } else if (article.chunk_id !== entry.id) {
        problems.push(`Article index maps "${unitId}" to "${article.chunk_id}" but chunk "${entry.id}" holds it`);
      }
    }
  }

  for (const [unitId, article] of Object.entries(articles.index)) {
    if (!entries.has(article.chunk_id)) {
      problems.push(`Article "${unitId}" references chunk "${article.chunk_id}" absent from the main index`);
    }
  }

  for (const [keyword, { chunks }] of Object.entries(keywords.index)) {
    for (const chunkId of chunks) {
      const entry = entries.get(chunkId);
      if (!entry) {
        problems.push(`Keyword "${keyword}" references chunk "${chunkId}" absent from the main index`);
      } else if (!entry.keywords.includes(keyword)) {
        problems.push(`Keyword "${keyword}" is indexed for chunk "${chunkId}" which does not carry it`);
      }
    }
  }

  if (storedChunkIds) {
    const stored = new Set(storedChunkIds);
    for (const entry of main.documents) {
      if (!stored.has(entry.id)) {
        problems.push(`Chunk "${entry.id}" has no file in the chunk store`);
      }
    }
    for (const chunkId of stored) {
      if (!entries.has(chunkId)) {
        problems.push(`Chunk file "${chunkId}" is not referenced by the main index`);
      }
    }
  }

  return problems;
}

/**
 * @throws {IndexConsistencyError} listing every problem found
 */
export function validateIndexConsistency(indices: IndexSet, storedChunkIds?: readonly string[]): void {
  const problems = findIndexProblems(indices, storedChunkIds);
  if (problems.length > 0) {
    throw new IndexConsistencyError(
      `Index version ${indices.main.version} is inconsistent (${problems.length} problem${problems.length === 1 ? '' : 's'})`,
      problems,
      { version: indices.main.version }
    );
  }
}

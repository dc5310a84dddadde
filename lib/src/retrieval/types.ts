/**
 * Retrieval Types and Schemas
 */

import { z } from 'zod';
import type { MainIndexEntry } from '../indexing/types.js';

// =============================================================================
// Query
// =============================================================================

export interface ParsedQuery {
  /** Normalized keyword terms, deduplicated, in query order */
  terms: string[];
  /** Canonical unit ids referenced directly ("Art. 8", "Regla 3") */
  unitRefs: string[];
}

// =============================================================================
// Retrieval Result
// =============================================================================

export const RetrievalStatus = {
  MATCHED: 'MATCHED',
  /** No chunk matched any term or reference; not an error */
  NO_MATCH_FOUND: 'NO_MATCH_FOUND',
} as const;

export type RetrievalStatus = (typeof RetrievalStatus)[keyof typeof RetrievalStatus];

export interface RetrievedChunk {
  chunkId: string;
  documentId: string;
  content: string;
  metadata: MainIndexEntry;
  /** Number of distinct query terms and references the chunk matches */
  score: number;
  matchedTerms: string[];
  /** The query named one of the chunk's units */
  directReference: boolean;
}

export interface RetrievalResult {
  status: RetrievalStatus;
  chunks: RetrievedChunk[];
  /** Some ranked candidates were left out to stay under the ceiling */
  truncated: boolean;
  /** Candidates found before the ceiling was applied */
  matchCount: number;
  totalTokens: number;
  terms: string[];
  unitRefs: string[];
}

export interface RetrieveOptions {
  /** Context ceiling C for this call */
  tokenCeiling?: number;
  /** Restrict retrieval to these documents */
  documentIds?: string[];
  signal?: AbortSignal;
}

// =============================================================================
// Content Cache
// =============================================================================

export const ContentCacheConfigSchema = z.object({
  /** Maximum number of cached chunk contents */
  maxEntries: z.number().int().positive().default(64),
  /** Maximum aggregate UTF-8 bytes of cached content */
  maxBytes: z.number().int().positive().default(32 * 1024 * 1024),
  /**
   * Callback for cache updates (monitoring/logging)
   */
  onUpdate: z
    .function()
    .args(
      z.object({
        type: z.enum(['hit', 'miss', 'set', 'evict', 'skip', 'clear']),
        key: z.string().optional(),
        bytes: z.number().optional(),
      })
    )
    .returns(z.void())
    .optional(),
});

export type ContentCacheConfig = z.infer<typeof ContentCacheConfigSchema>;

export interface CacheEntry {
  content: string;
  bytes: number;
  lastAccessAt: number;
  accessCount: number;
}

export interface ContentCacheStats {
  size: number;
  bytes: number;
  maxEntries: number;
  maxBytes: number;
  hits: number;
  misses: number;
  /** Loader invocations; concurrent misses of one key share a load */
  loads: number;
  hitRate: number;
  evictions: number;
  /** Bumped by every clear() */
  generation: number;
}

/**
 * Retrieval Module
 *
 * Query parsing, candidate ranking under a token ceiling, and the content
 * cache in front of the chunk store.
 */

export { RetrievalStatus, ContentCacheConfigSchema } from './types.js';
export type {
  ParsedQuery,
  RetrievedChunk,
  RetrievalResult,
  RetrieveOptions,
  ContentCacheConfig,
  CacheEntry,
  ContentCacheStats,
} from './types.js';

export { parseQuery, extractUnitReferences, canonicalUnitId } from './query.js';

export { ContentCache } from './content-cache.js';

export {
  RetrievalEngine,
  rankCandidates,
  applyTokenCeiling,
  DEFAULT_TOKEN_CEILING,
} from './retrieval-engine.js';
export type { RetrievalEngineOptions, Candidate } from './retrieval-engine.js';

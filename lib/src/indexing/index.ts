/**
 * Indexing Module
 *
 * Index documents derived from a chunk list, their persistence, and the
 * publisher that swaps in a new snapshot once a build is complete.
 */

export {
  DocumentVersionSchema,
  MainIndexEntrySchema,
  MainIndexSchema,
  KeywordIndexSchema,
  ArticleIndexEntrySchema,
  ArticleIndexSchema,
  CurrentPointerSchema,
  INDEX_FILES,
  CURRENT_POINTER_FILE,
} from './types.js';

export type {
  DocumentVersion,
  DocumentVersionInput,
  MainIndexEntry,
  MainIndex,
  KeywordIndex,
  ArticleIndexEntry,
  ArticleIndex,
  IndexSet,
  CurrentPointer,
  IndexSnapshot,
  BuildReport,
} from './types.js';

export { buildIndices, toMainIndexEntry, findIndexProblems, validateIndexConsistency } from './index-builder.js';
export type { BuildIndicesInput } from './index-builder.js';

export { IndexStore, serializeIndexDocument } from './index-store.js';
export type { IndexStoreOptions } from './index-store.js';

export { IndexPublisher } from './publisher.js';
export type { PublisherOptions, PublishResult } from './publisher.js';

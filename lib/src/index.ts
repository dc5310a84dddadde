/**
 * Rulebook Knowledge Base - Shared Library
 *
 * Segmentation and retrieval index engine for normative rules documents.
 */

// Configuration
export * from './config/index.js';

// Errors
export * from './errors.js';

// Logging
export * from './logging/index.js';

// Chunking (Structure Parsing & Token-Bounded Chunks)
export * from './chunking/index.js';

// Chunk Store
export * from './store/index.js';

// Indexing (Index Builder, Index Store, Publisher)
export * from './indexing/index.js';

// Retrieval (Query Parsing, Content Cache, Ranking)
export * from './retrieval/index.js';

// Document Catalog & Version Manifest
export * from './catalog/index.js';

// Utilities
export * from './utils/retry.js';
export { calculateChecksum } from './utils/checksum.js';

// Knowledge Base Facade
export * from './knowledge-base.js';

/**
 * Catalog Module
 */

export {
  CatalogEntrySchema,
  CatalogSchema,
  CATALOG_FILE,
  ManifestHistoryEntrySchema,
  ManifestDocumentSchema,
  ManifestSchema,
  MANIFEST_FILE,
  MANIFEST_HISTORY_LIMIT,
  ChangeReason,
} from './types.js';

export type { CatalogEntry, ManifestHistoryEntry, ManifestDocument, Manifest } from './types.js';

export { CatalogStore, createEmptyManifest, recordBuild, detectChange } from './manifest.js';
export type { CatalogStoreOptions } from './manifest.js';

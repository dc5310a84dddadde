/**
 * Catalog and Manifest Types
 *
 * `raw/documents.json` lists the source documents; `indices/manifest.json`
 * records what was last indexed for each of them.
 */

import { z } from 'zod';

// =============================================================================
// Document Catalog
// =============================================================================

export const CatalogEntrySchema = z.object({
  id: z.string().min(1),
  version: z.string().min(1),
  title: z.string().default(''),
  source_pdf: z.string().default(''),
  /** Structured text file, relative to the raw directory */
  file: z.string().min(1),
  created_at: z.string().datetime().optional(),
});

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

export const CatalogSchema = z
  .array(CatalogEntrySchema)
  .refine((entries) => new Set(entries.map((e) => e.id)).size === entries.length, {
    message: 'Document ids in the catalog must be unique',
  });

export const CATALOG_FILE = 'documents.json';

// =============================================================================
// Version Manifest
// =============================================================================

export const ManifestHistoryEntrySchema = z.object({
  version: z.string(),
  checksum: z.string(),
  build_id: z.string(),
  indexed_at: z.string(),
});

export type ManifestHistoryEntry = z.infer<typeof ManifestHistoryEntrySchema>;

export const ManifestDocumentSchema = z.object({
  version: z.string(),
  /** SHA-256 of the source text */
  checksum: z.string(),
  build_id: z.string(),
  units: z.number().int().nonnegative(),
  chunks: z.number().int().nonnegative(),
  indexed_at: z.string(),
  /** Earlier indexed versions, most recent first */
  history: z.array(ManifestHistoryEntrySchema).default([]),
});

export type ManifestDocument = z.infer<typeof ManifestDocumentSchema>;

export const ManifestSchema = z.object({
  updated_at: z.string().nullable(),
  documents: z.record(ManifestDocumentSchema),
});

export type Manifest = z.infer<typeof ManifestSchema>;

export const MANIFEST_FILE = 'manifest.json';

/** History entries kept per document */
export const MANIFEST_HISTORY_LIMIT = 20;

/**
 * Why a catalogued document needs indexing
 */
export const ChangeReason = {
  NEW: 'new',
  VERSION_CHANGED: 'version_changed',
  CHECKSUM_CHANGED: 'checksum_changed',
  INDEX_MISSING: 'index_missing',
} as const;

export type ChangeReason = (typeof ChangeReason)[keyof typeof ChangeReason];

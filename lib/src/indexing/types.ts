/**
 * Index Types and Schemas
 *
 * Persisted index documents keep snake_case field names; everything in
 * memory is camelCase.
 */

import { z } from 'zod';

// =============================================================================
// Document Input
// =============================================================================

/**
 * One version of a source document, as delivered by the OCR step
 */
export const DocumentVersionSchema = z.object({
  documentId: z
    .string()
    .min(1)
    .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'Document ids may only use letters, digits, ".", "_" and "-"'),
  version: z.string().min(1),
  title: z.string().default(''),
  sourcePdf: z.string().default(''),
  text: z.string(),
  /** Fixes every timestamp of the build; defaults to the publisher clock */
  createdAt: z.string().datetime().optional(),
});

export type DocumentVersion = z.infer<typeof DocumentVersionSchema>;
export type DocumentVersionInput = z.input<typeof DocumentVersionSchema>;

// =============================================================================
// Main Index
// =============================================================================

export const MainIndexEntrySchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  file_path: z.string().min(1),
  tokens: z.number().int().nonnegative(),
  articles: z.array(z.string().min(1)).min(1),
  keywords: z.array(z.string()),
  section: z.string().nullable(),
  pages: z.array(z.number().int().positive()),
  source_pdf: z.string(),
});

export type MainIndexEntry = z.infer<typeof MainIndexEntrySchema>;

export const MainIndexSchema = z.object({
  version: z.string().min(1),
  created_at: z.string(),
  total_chunks: z.number().int().nonnegative(),
  /** Chunk entries in document order */
  documents: z.array(MainIndexEntrySchema),
});

export type MainIndex = z.infer<typeof MainIndexSchema>;

// =============================================================================
// Keyword Index
// =============================================================================

export const KeywordIndexSchema = z.object({
  version: z.string().min(1),
  index: z.record(z.object({ chunks: z.array(z.string().min(1)) })),
});

export type KeywordIndex = z.infer<typeof KeywordIndexSchema>;

// =============================================================================
// Article Index
// =============================================================================

export const ArticleIndexEntrySchema = z.object({
  title: z.string(),
  chunk_id: z.string().min(1),
  pages: z.array(z.number().int().positive()),
});

export type ArticleIndexEntry = z.infer<typeof ArticleIndexEntrySchema>;

export const ArticleIndexSchema = z.object({
  version: z.string().min(1),
  index: z.record(ArticleIndexEntrySchema),
});

export type ArticleIndex = z.infer<typeof ArticleIndexSchema>;

// =============================================================================
// Snapshots
// =============================================================================

/**
 * The three indices of one document version, all views of one chunk list
 */
export interface IndexSet {
  main: MainIndex;
  keywords: KeywordIndex;
  articles: ArticleIndex;
}

/**
 * Pointer to the published build of a document (indices/<doc>/current.json)
 */
export const CurrentPointerSchema = z.object({
  document_id: z.string().min(1),
  version: z.string().min(1),
  build_id: z.string().min(1),
  previous_build_id: z.string().nullable(),
  published_at: z.string(),
});

export type CurrentPointer = z.infer<typeof CurrentPointerSchema>;

/**
 * A published, immutable index snapshot held by readers
 */
export interface IndexSnapshot {
  documentId: string;
  version: string;
  buildId: string;
  publishedAt: string;
  indices: IndexSet;
}

/**
 * Outcome of one successful build
 */
export interface BuildReport {
  documentId: string;
  version: string;
  buildId: string;
  units: number;
  chunks: number;
  totalTokens: number;
  /** One warning per oversized chunk */
  oversized: string[];
  previousBuildId: string | null;
  /** The build reproduced the published snapshot byte for byte */
  unchanged: boolean;
  publishedAt: string;
}

export const INDEX_FILES = {
  main: 'main_index.json',
  keywords: 'keyword_index.json',
  articles: 'article_index.json',
} as const;

export const CURRENT_POINTER_FILE = 'current.json';

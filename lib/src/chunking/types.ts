/**
 * Chunking Types and Schemas
 *
 * Logical units (articles/rules) extracted from a structured rules document
 * and the token-bounded chunks they are grouped into.
 */

import { z } from 'zod';

// =============================================================================
// Logical Units
// =============================================================================

/**
 * Kind of heading that opened a logical unit
 */
export const UnitKind = {
  /** "ARTICLE 8", "Artículo 8", "Art. 8" */
  ARTICLE: 'article',
  /** "REGLA 8", "Rule 8" */
  RULE: 'rule',
  /** Synthetic unit for front matter before the first heading */
  PREAMBLE: 'preamble',
} as const;

export type UnitKind = (typeof UnitKind)[keyof typeof UnitKind];

export const UnitKindSchema = z.enum(['article', 'rule', 'preamble']);

/** Identifier of the synthetic front-matter unit */
export const PREAMBLE_UNIT_ID = 'Preamble';

/**
 * An indivisible rule segment. Never split across chunks.
 */
export const LogicalUnitSchema = z.object({
  /** Stable identifier, e.g. "Art. 8" or "Regla 8" */
  id: z.string().min(1),
  kind: UnitKindSchema,
  /** Number as written in the heading ("8", "8bis", "8.2"); null for the preamble */
  number: z.string().nullable(),
  title: z.string(),
  /** Heading line through the end of the unit, page markers preserved */
  content: z.string(),
  /** Pages the unit spans, in encounter order */
  pages: z.array(z.number().int().positive()),
  /** Enclosing section label ("TÍTULO I", "CHAPTER 2") if any */
  section: z.string().nullable(),
  /** Character span in the source text */
  span: z.object({
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
  }),
});

export type LogicalUnit = z.infer<typeof LogicalUnitSchema>;

// =============================================================================
// Chunking Configuration
// =============================================================================

export const ChunkingConfigSchema = z.object({
  /**
   * Token budget B per chunk. A single unit larger than this becomes an
   * oversized chunk of its own.
   */
  maxTokens: z.number().int().positive().default(14000),

  /** Keywords kept per chunk */
  keywordsPerChunk: z.number().int().positive().default(15),

  /** Text placed between consecutive units in a chunk's content */
  unitSeparator: z.string().default('\n\n'),
});

export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;

export function createDefaultChunkingConfig(overrides?: Partial<ChunkingConfig>): ChunkingConfig {
  return ChunkingConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Chunk Types
// =============================================================================

/**
 * A contiguous group of logical units plus generated metadata
 */
export const ChunkSchema = z.object({
  /** Slug of {documentId}_{firstUnitId}_{lastUnitId} */
  chunkId: z.string().min(1),
  documentId: z.string().min(1),
  title: z.string(),
  /** Sum of the member units' token counts */
  tokenCount: z.number().int().nonnegative(),
  /** Member unit ids in document order */
  unitIds: z.array(z.string().min(1)).min(1),
  /** Union of member pages, sorted ascending */
  pages: z.array(z.number().int().positive()),
  keywords: z.array(z.string()),
  section: z.string().nullable(),
  sourcePdf: z.string(),
  /** ISO timestamp of the build */
  createdAt: z.string(),
  /** Location of the persisted content, relative to the data directory */
  filePath: z.string(),
  /** Single unit whose own count exceeds the budget */
  oversized: z.boolean(),
  content: z.string(),
});

export type Chunk = z.infer<typeof ChunkSchema>;

/**
 * Chunk metadata without its content, as held by the main index
 */
export type ChunkMetadata = Omit<Chunk, 'content'>;

// =============================================================================
// Chunking Result Types
// =============================================================================

export const ChunkingResultSchema = z.object({
  documentId: z.string().min(1),
  chunks: z.array(ChunkSchema),
  /** Parsed units in document order */
  units: z.array(LogicalUnitSchema),
  totalChunks: z.number().int().nonnegative(),
  totalUnits: z.number().int().nonnegative(),
  stats: z.object({
    totalTokens: z.number().int().nonnegative(),
    avgChunkTokenCount: z.number().nonnegative(),
    minChunkTokenCount: z.number().int().nonnegative(),
    maxChunkTokenCount: z.number().int().nonnegative(),
    oversizedChunks: z.number().int().nonnegative(),
  }),
  config: ChunkingConfigSchema,
  /** One warning per oversized chunk */
  warnings: z.array(z.string()),
});

export type ChunkingResult = z.infer<typeof ChunkingResultSchema>;

// =============================================================================
// Token Counting Types
// =============================================================================

export const TokenCountResultSchema = z.object({
  count: z.number().int().nonnegative(),
  /** Whether the count is estimated (true) or exact (false) */
  estimated: z.boolean(),
  method: z.enum(['tokenizer', 'estimation', 'cached']),
});

export type TokenCountResult = z.infer<typeof TokenCountResultSchema>;

export const TokenCountOptionsSchema = z.object({
  useCache: z.boolean().default(true),
  forceRecount: z.boolean().default(false),
});

export type TokenCountOptions = z.infer<typeof TokenCountOptionsSchema>;

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Lower-case ASCII slug: diacritics stripped, every run of other characters
 * collapsed to "_".
 *
 * @example slugify('rj-2025_Art. 1_Art. 3') // 'rj_2025_art_1_art_3'
 */
export function slugify(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Deterministic chunk id from the document id and the unit range
 */
export function generateChunkId(documentId: string, firstUnitId: string, lastUnitId: string): string {
  return slugify(`${documentId}_${firstUnitId}_${lastUnitId}`);
}

/**
 * Human title for a run of units
 */
export function createChunkTitle(units: ReadonlyArray<Pick<LogicalUnit, 'id' | 'title'>>): string {
  const first = units[0];
  const last = units[units.length - 1];
  if (!first || !last) {
    return '';
  }
  if (units.length === 1) {
    return first.title && first.title !== first.id ? `${first.id}: ${first.title}` : first.id;
  }
  return `${first.id} to ${last.id}`;
}

/**
 * Sorted, deduplicated union of the units' pages
 */
export function mergePages(units: ReadonlyArray<Pick<LogicalUnit, 'pages'>>): number[] {
  const pages = new Set<number>();
  for (const unit of units) {
    for (const page of unit.pages) {
      pages.add(page);
    }
  }
  return [...pages].sort((a, b) => a - b);
}

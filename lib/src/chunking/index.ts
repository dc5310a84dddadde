/**
 * Chunking Module
 *
 * Structure parsing, token counting, keyword extraction and greedy
 * token-bounded chunking for rules documents.
 *
 * @example
 * ```typescript
 * import { chunkDocument, TokenCounter } from '@rulebook-kb/lib';
 *
 * const result = chunkDocument({
 *   documentId: 'rfebm-2024',
 *   sourcePdf: 'reglamento.pdf',
 *   createdAt: '2024-09-01T00:00:00.000Z',
 *   text: ocrText,
 *   config: { maxTokens: 14000 },
 *   counter: new TokenCounter({ charsPerToken: 4 }),
 * });
 *
 * for (const chunk of result.chunks) {
 *   console.log(`${chunk.chunkId}: ${chunk.unitIds.join(', ')} (${chunk.tokenCount} tokens)`);
 * }
 * ```
 */

// Types and Schemas
export {
  UnitKind,
  UnitKindSchema,
  PREAMBLE_UNIT_ID,
  LogicalUnitSchema,
  ChunkingConfigSchema,
  createDefaultChunkingConfig,
  ChunkSchema,
  ChunkingResultSchema,
  TokenCountResultSchema,
  TokenCountOptionsSchema,
  slugify,
  generateChunkId,
  createChunkTitle,
  mergePages,
} from './types.js';

export type {
  LogicalUnit,
  ChunkingConfig,
  Chunk,
  ChunkMetadata,
  ChunkingResult,
  TokenCountResult,
  TokenCountOptions,
} from './types.js';

// Structure Parsing
export {
  parseLogicalUnits,
  detectUnitHeadings,
  detectPageMarkers,
  detectSectionHeadings,
  hasUnitHeadings,
} from './structure-parser.js';

// Keywords
export {
  getStopwords,
  foldTerm,
  normalizeTerms,
  extractKeywords,
  MIN_TERM_LENGTH,
} from './keywords.js';

// Token Counting
export {
  TokenCounter,
  getGlobalTokenCounter,
  resetGlobalTokenCounter,
  countTokens,
  estimateTokens,
} from './token-counter.js';

export type { TokenizerInterface, TokenCounterConfig } from './token-counter.js';

// Chunking
export { chunkUnits, chunkDocument, groupUnits } from './chunker.js';

export type { ChunkUnitsOptions, ChunkDocumentInput, UnitGroup } from './chunker.js';

/**
 * Rules Document Chunker
 *
 * Groups the logical units of one document version into token-bounded
 * chunks. The grouping is a greedy interval partition: units are appended to
 * the open chunk while the running total stays within the budget, and a unit
 * is never split. A unit that alone exceeds the budget becomes an oversized
 * chunk of its own.
 */

import {
  ChunkingResultSchema,
  createChunkTitle,
  createDefaultChunkingConfig,
  generateChunkId,
  mergePages,
  type Chunk,
  type ChunkingConfig,
  type ChunkingResult,
  type LogicalUnit,
} from './types.js';
import { parseLogicalUnits } from './structure-parser.js';
import { extractKeywords } from './keywords.js';
import { getGlobalTokenCounter, type TokenCounter } from './token-counter.js';

// =============================================================================
// Types
// =============================================================================

export interface ChunkUnitsOptions {
  documentId: string;
  sourcePdf: string;
  /** ISO timestamp stamped on every chunk */
  createdAt: string;
  /** Location of a chunk's persisted content; defaults to chunks/<doc>/<chunkId>.md */
  resolvePath?: (chunkId: string) => string;
  config?: Partial<ChunkingConfig>;
  /** Counter used for unit token counts (default: global counter) */
  counter?: TokenCounter;
}

/**
 * Input for chunking a whole document text
 */
export interface ChunkDocumentInput extends ChunkUnitsOptions {
  text: string;
}

/**
 * Units grouped into one chunk, before metadata is attached
 */
export interface UnitGroup {
  units: LogicalUnit[];
  tokens: number;
  oversized: boolean;
}

interface GroupAccumulator {
  closed: UnitGroup[];
  open: UnitGroup | null;
}

// =============================================================================
// Main Chunking Functions
// =============================================================================

/**
 * Partition units into chunks under the token budget
 *
 * @example
 * ```typescript
 * const result = chunkUnits(units, {
 *   documentId: 'rfebm-2024',
 *   sourcePdf: 'reglamento.pdf',
 *   createdAt: '2024-09-01T00:00:00.000Z',
 * });
 * result.chunks.map((c) => c.unitIds);
 * ```
 */
export function chunkUnits(units: readonly LogicalUnit[], options: ChunkUnitsOptions): ChunkingResult {
  const config = createDefaultChunkingConfig(options.config);
  const counter = options.counter ?? getGlobalTokenCounter();
  const resolvePath =
    options.resolvePath ?? ((chunkId: string) => `chunks/${options.documentId}/${chunkId}.md`);
  const warnings: string[] = [];

  const groups = groupUnits(units, config.maxTokens, (unit) => counter.count(unit.content).count);

  const usedIds = new Set<string>();
  const chunks = groups.map((group): Chunk => {
    const first = group.units[0];
    const last = group.units[group.units.length - 1];
    if (!first || !last) {
      throw new Error('Chunk group without units');
    }

    const baseId = generateChunkId(options.documentId, first.id, last.id);
    let chunkId = baseId;
    // Suffixed ids count as used; a later natural slug may equal one
    for (let n = 2; usedIds.has(chunkId); n++) {
      chunkId = `${baseId}_${n}`;
    }
    usedIds.add(chunkId);

    if (group.oversized) {
      warnings.push(
        `Unit "${first.id}" has ${group.tokens} tokens, above the ${config.maxTokens}-token budget; emitted as oversized chunk ${chunkId}`
      );
    }

    const content = group.units.map((unit) => unit.content).join(config.unitSeparator);

    return {
      chunkId,
      documentId: options.documentId,
      title: createChunkTitle(group.units),
      tokenCount: group.tokens,
      unitIds: group.units.map((unit) => unit.id),
      pages: mergePages(group.units),
      keywords: extractKeywords(content, config.keywordsPerChunk),
      section: first.section,
      sourcePdf: options.sourcePdf,
      createdAt: options.createdAt,
      filePath: resolvePath(chunkId),
      oversized: group.oversized,
      content,
    };
  });

  const result: ChunkingResult = {
    documentId: options.documentId,
    chunks,
    units: [...units],
    totalChunks: chunks.length,
    totalUnits: units.length,
    stats: calculateStats(chunks),
    config,
    warnings,
  };

  return ChunkingResultSchema.parse(result);
}

/**
 * Parse a document text and chunk its units
 *
 * @throws {MalformedInputError} when the text has no recognisable structure
 */
export function chunkDocument(input: ChunkDocumentInput): ChunkingResult {
  const { text, ...options } = input;
  return chunkUnits(parseLogicalUnits(text), options);
}

// =============================================================================
// Internal Functions
// =============================================================================

/**
 * Greedy grouping: append while running + next <= budget, otherwise close
 * the open group. Units over the budget are closed alone.
 */
export function groupUnits(
  units: readonly LogicalUnit[],
  budget: number,
  countUnit: (unit: LogicalUnit) => number
): UnitGroup[] {
  const final = units.reduce<GroupAccumulator>(
    ({ closed, open }, unit) => {
      const tokens = countUnit(unit);

      if (tokens > budget) {
        const done = open ? [...closed, open] : closed;
        return { closed: [...done, { units: [unit], tokens, oversized: true }], open: null };
      }

      if (open && open.tokens + tokens <= budget) {
        return { closed, open: { ...open, units: [...open.units, unit], tokens: open.tokens + tokens } };
      }

      return {
        closed: open ? [...closed, open] : closed,
        open: { units: [unit], tokens, oversized: false },
      };
    },
    { closed: [], open: null }
  );

  return final.open ? [...final.closed, final.open] : final.closed;
}

function calculateStats(chunks: Chunk[]): ChunkingResult['stats'] {
  const tokenCounts = chunks.map((c) => c.tokenCount);
  const totalTokens = tokenCounts.reduce((a, b) => a + b, 0);

  return {
    totalTokens,
    avgChunkTokenCount: chunks.length > 0 ? totalTokens / chunks.length : 0,
    minChunkTokenCount: chunks.length > 0 ? Math.min(...tokenCounts) : 0,
    maxChunkTokenCount: chunks.length > 0 ? Math.max(...tokenCounts) : 0,
    oversizedChunks: chunks.filter((c) => c.oversized).length,
  };
}

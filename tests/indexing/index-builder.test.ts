/**
 * Tests for index building and consistency checks
 */

import { describe, it, expect } from 'vitest';
import { chunkUnits } from '../../lib/src/chunking/index.js';
import {
  buildIndices,
  findIndexProblems,
  validateIndexConsistency,
  type IndexSet,
} from '../../lib/src/indexing/index.js';
import { IndexConsistencyError } from '../../lib/src/errors.js';
import { createWordCounter, makeUnit, FIXED_DATE } from '../helpers/fixtures.js';

const UNITS = [
  makeUnit('Art. 1', 'Artículo 1. Objeto\nLas sanciones del reglamento.', { title: 'Objeto', pages: [1] }),
  makeUnit('Art. 2', 'Artículo 2. Faltas\nLas faltas leves.', { title: 'Faltas', pages: [2] }),
  makeUnit('Art. 3', 'Artículo 3. Recursos\nRecursos contra sanciones.', { title: 'Recursos', pages: [2, 3] }),
];

function chunkFixture(maxTokens: number) {
  return chunkUnits(UNITS, {
    documentId: 'rj',
    sourcePdf: 'rj.pdf',
    createdAt: FIXED_DATE,
    counter: createWordCounter(),
    config: { maxTokens },
  });
}

function buildFixture(): IndexSet {
  const { chunks, units } = chunkFixture(13);
  return buildIndices({ chunks, units, version: '2025.1', createdAt: FIXED_DATE });
}

function captureProblems(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof IndexConsistencyError) {
      return error.problems;
    }
    throw error;
  }
  return [];
}

// =============================================================================
// buildIndices
// =============================================================================

describe('buildIndices', () => {
  it('should list chunks in the main index in document order', () => {
    const { main } = buildFixture();

    expect(main.version).toBe('2025.1');
    expect(main.created_at).toBe(FIXED_DATE);
    expect(main.total_chunks).toBe(2);
    expect(main.documents.map((d) => d.id)).toEqual(['rj_art_1_art_2', 'rj_art_3_art_3']);
    expect(main.documents[0]).toEqual({
      id: 'rj_art_1_art_2',
      title: 'Art. 1 to Art. 2',
      file_path: 'chunks/rj/rj_art_1_art_2.md',
      tokens: 13,
      articles: ['Art. 1', 'Art. 2'],
      keywords: ['faltas', 'leves', 'objeto', 'reglamento', 'sanciones'],
      section: null,
      pages: [1, 2],
      source_pdf: 'rj.pdf',
    });
  });

  it('should map every unit to its chunk in the article index', () => {
    const { articles } = buildFixture();

    expect(articles.index).toEqual({
      'Art. 1': { title: 'Objeto', chunk_id: 'rj_art_1_art_2', pages: [1] },
      'Art. 2': { title: 'Faltas', chunk_id: 'rj_art_1_art_2', pages: [2] },
      'Art. 3': { title: 'Recursos', chunk_id: 'rj_art_3_art_3', pages: [2, 3] },
    });
  });

  it('should invert keywords with sorted keys', () => {
    const { keywords } = buildFixture();

    expect(Object.keys(keywords.index)).toEqual(['faltas', 'leves', 'objeto', 'recursos', 'reglamento', 'sanciones']);
    expect(keywords.index['sanciones']).toEqual({ chunks: ['rj_art_1_art_2', 'rj_art_3_art_3'] });
    expect(keywords.index['recursos']).toEqual({ chunks: ['rj_art_3_art_3'] });
  });

  it('should reject a unit placed in two chunks', () => {
    const { chunks, units } = chunkFixture(13);
    const [first, second] = chunks;
    if (!first || !second) throw new Error('fixture should produce two chunks');
    const overlapping = [first, { ...second, unitIds: ['Art. 2', 'Art. 3'] }];

    const problems = captureProblems(() =>
      buildIndices({ chunks: overlapping, units, version: '1', createdAt: FIXED_DATE })
    );
    expect(problems).toEqual(['Unit "Art. 2" appears in chunks "rj_art_1_art_2" and "rj_art_3_art_3"']);
  });

  it('should reject repeated chunk ids', () => {
    const { chunks, units } = chunkFixture(100);
    const [only] = chunks;
    if (!only) throw new Error('fixture should produce one chunk');

    const problems = captureProblems(() =>
      buildIndices({ chunks: [only, { ...only, unitIds: [] }], units, version: '1', createdAt: FIXED_DATE })
    );
    expect(problems).toEqual(['Chunk id "rj_art_1_art_3" is used more than once']);
  });

  it('should reject units left out of every chunk and unknown units', () => {
    const { chunks } = chunkFixture(100);
    const units = [...UNITS.filter((u) => u.id !== 'Art. 3'), makeUnit('Art. 9', 'Artículo 9')];

    const problems = captureProblems(() => buildIndices({ chunks, units, version: '1', createdAt: FIXED_DATE }));
    expect(problems).toEqual([
      'Chunk "rj_art_1_art_3" references unknown unit "Art. 3"',
      'Unit "Art. 9" is not assigned to any chunk',
    ]);
  });
});

// =============================================================================
// Consistency checks
// =============================================================================

describe('findIndexProblems', () => {
  it('should find nothing in freshly built indices', () => {
    const indices = buildFixture();
    expect(findIndexProblems(indices, ['rj_art_1_art_2', 'rj_art_3_art_3'])).toEqual([]);
  });

  it('should report an article index entry pointing at the wrong chunk', () => {
    const indices = buildFixture();
    indices.articles.index['Art. 1'] = { title: 'Objeto', chunk_id: 'missing', pages: [1] };

    expect(findIndexProblems(indices)).toEqual([
      'Article index maps "Art. 1" to "missing" but chunk "rj_art_1_art_2" holds it',
      'Article "Art. 1" references chunk "missing" absent from the main index',
    ]);
  });

  it('should report keyword entries for chunks that lack the keyword', () => {
    const indices = buildFixture();
    indices.keywords.index['recursos'] = { chunks: ['rj_art_1_art_2'] };

    expect(findIndexProblems(indices)).toEqual([
      'Keyword "recursos" is indexed for chunk "rj_art_1_art_2" which does not carry it',
    ]);
  });

  it('should compare the main index with the stored chunk files', () => {
    const indices = buildFixture();

    expect(findIndexProblems(indices, ['rj_art_1_art_2', 'rj_orphan'])).toEqual([
      'Chunk "rj_art_3_art_3" has no file in the chunk store',
      'Chunk file "rj_orphan" is not referenced by the main index',
    ]);
  });

  it('should report version and count mismatches', () => {
    const indices = buildFixture();
    indices.keywords.version = '2024.9';
    indices.main.total_chunks = 3;

    expect(findIndexProblems(indices)).toEqual([
      'Index versions disagree: main=2025.1 keyword=2024.9 article=2025.1',
      'Main index declares 3 chunks but lists 2',
    ]);
  });
});

describe('validateIndexConsistency', () => {
  it('should throw with every problem listed', () => {
    const indices = buildFixture();
    indices.main.total_chunks = 5;

    expect(() => validateIndexConsistency(indices)).toThrow(IndexConsistencyError);
    expect(captureProblems(() => validateIndexConsistency(indices))).toEqual([
      'Main index declares 5 chunks but lists 2',
    ]);
  });

  it('should pass consistent indices', () => {
    expect(() => validateIndexConsistency(buildFixture())).not.toThrow();
  });
});

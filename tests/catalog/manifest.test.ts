/**
 * Tests for the document catalog and version manifest
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CatalogStore,
  ChangeReason,
  MANIFEST_HISTORY_LIMIT,
  createEmptyManifest,
  detectChange,
  recordBuild,
  type CatalogEntry,
  type Manifest,
} from '../../lib/src/catalog/index.js';
import type { BuildReport } from '../../lib/src/indexing/index.js';
import { MalformedInputError } from '../../lib/src/errors.js';
import { createSilentLogger } from '../helpers/fixtures.js';

function report(buildId: string, overrides?: Partial<BuildReport>): BuildReport {
  return {
    documentId: 'rj',
    version: '2025.1',
    buildId,
    units: 12,
    chunks: 3,
    totalTokens: 900,
    oversized: [],
    previousBuildId: null,
    unchanged: false,
    publishedAt: '2025-03-01T00:00:00.000Z',
    ...overrides,
  };
}

const ENTRY: CatalogEntry = {
  id: 'rj',
  version: '2025.1',
  title: 'Reglamento de juego',
  source_pdf: 'rj.pdf',
  file: 'rj.md',
};

// =============================================================================
// recordBuild
// =============================================================================

describe('recordBuild', () => {
  it('should add a document without history', () => {
    const manifest = recordBuild(createEmptyManifest(), report('b1'), 'sum1');

    expect(manifest).toEqual({
      updated_at: '2025-03-01T00:00:00.000Z',
      documents: {
        rj: {
          version: '2025.1',
          checksum: 'sum1',
          build_id: 'b1',
          units: 12,
          chunks: 3,
          indexed_at: '2025-03-01T00:00:00.000Z',
          history: [],
        },
      },
    });
  });

  it('should move the replaced build to the front of the history', () => {
    let manifest = recordBuild(createEmptyManifest(), report('b1'), 'sum1');
    manifest = recordBuild(manifest, report('b2', { version: '2025.2' }), 'sum2');
    manifest = recordBuild(manifest, report('b3', { version: '2025.3' }), 'sum3');

    expect(manifest.documents['rj']?.history.map((h) => h.build_id)).toEqual(['b2', 'b1']);
    expect(manifest.documents['rj']?.history[0]).toEqual({
      version: '2025.2',
      checksum: 'sum2',
      build_id: 'b2',
      indexed_at: '2025-03-01T00:00:00.000Z',
    });
  });

  it('should not grow the history when the same build is recorded again', () => {
    const first = recordBuild(createEmptyManifest(), report('b1'), 'sum1');
    const second = recordBuild(first, report('b1', { unchanged: true }), 'sum1');

    expect(second.documents['rj']?.history).toEqual([]);
  });

  it('should bound the history', () => {
    let manifest = createEmptyManifest();
    for (let i = 0; i < MANIFEST_HISTORY_LIMIT + 5; i++) {
      manifest = recordBuild(manifest, report(`b${i}`), `sum${i}`);
    }
    expect(manifest.documents['rj']?.history).toHaveLength(MANIFEST_HISTORY_LIMIT);
  });

  it('should leave other documents untouched', () => {
    const base = recordBuild(createEmptyManifest(), report('b1', { documentId: 'other' }), 'x');
    const manifest = recordBuild(base, report('b2'), 'y');

    expect(Object.keys(manifest.documents).sort()).toEqual(['other', 'rj']);
    expect(manifest.documents['other']).toEqual(base.documents['other']);
  });
});

// =============================================================================
// detectChange
// =============================================================================

describe('detectChange', () => {
  const indexed: Manifest = recordBuild(createEmptyManifest(), report('b1'), 'sum1');

  it('should report an unknown document as new', () => {
    expect(detectChange(createEmptyManifest(), ENTRY, 'sum1', false)).toBe(ChangeReason.NEW);
  });

  it('should report a version bump', () => {
    expect(detectChange(indexed, { ...ENTRY, version: '2025.2' }, 'sum1', true)).toBe(
      ChangeReason.VERSION_CHANGED
    );
  });

  it('should report edited text under the same version', () => {
    expect(detectChange(indexed, ENTRY, 'sum2', true)).toBe(ChangeReason.CHECKSUM_CHANGED);
  });

  it('should report a missing published index', () => {
    expect(detectChange(indexed, ENTRY, 'sum1', false)).toBe(ChangeReason.INDEX_MISSING);
  });

  it('should return null when nothing changed', () => {
    expect(detectChange(indexed, ENTRY, 'sum1', true)).toBeNull();
  });
});

// =============================================================================
// CatalogStore
// =============================================================================

describe('CatalogStore', () => {
  let dataDir: string;
  let rawDir: string;
  let indicesDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'kb-catalog-'));
    rawDir = join(dataDir, 'raw');
    indicesDir = join(dataDir, 'indices');
    await mkdir(rawDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  function createStore(): CatalogStore {
    return new CatalogStore({ rawDir, indicesDir, retry: { maxRetries: 0 }, logger: createSilentLogger() });
  }

  it('should return an empty catalog when none exists', async () => {
    expect(await createStore().loadCatalog()).toEqual([]);
  });

  it('should load catalog entries with defaults', async () => {
    await writeFile(join(rawDir, 'documents.json'), JSON.stringify([{ id: 'rj', version: '1', file: 'rj.md' }]));

    expect(await createStore().loadCatalog()).toEqual([
      { id: 'rj', version: '1', title: '', source_pdf: '', file: 'rj.md' },
    ]);
  });

  it('should reject duplicate document ids', async () => {
    const entry = { id: 'rj', version: '1', file: 'rj.md' };
    await writeFile(join(rawDir, 'documents.json'), JSON.stringify([entry, entry]));

    const error = await createStore()
      .loadCatalog()
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(MalformedInputError);
    expect(error).toMatchObject({ code: 'MALFORMED_INPUT' });
  });

  it('should reject a catalog that is not JSON', async () => {
    await writeFile(join(rawDir, 'documents.json'), '[{');
    await expect(createStore().loadCatalog()).rejects.toThrow('is not valid JSON');
  });

  it('should read a source text relative to the raw directory', async () => {
    await writeFile(join(rawDir, 'rj.md'), 'Artículo 1. Objeto');
    expect(await createStore().readSource(ENTRY)).toBe('Artículo 1. Objeto');
  });

  it('should start from an empty manifest', async () => {
    expect(await createStore().loadManifest()).toEqual(createEmptyManifest());
  });

  it('should save and load the manifest', async () => {
    const store = createStore();
    const manifest = recordBuild(createEmptyManifest(), report('b1'), 'sum1');

    await store.saveManifest(manifest);

    expect(await store.loadManifest()).toEqual(manifest);
    expect(await readFile(join(indicesDir, 'manifest.json'), 'utf-8')).toBe(
      `${JSON.stringify(manifest, null, 2)}\n`
    );
  });
});

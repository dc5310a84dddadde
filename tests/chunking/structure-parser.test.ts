/**
 * Tests for the rules document structure parser
 */

import { describe, it, expect } from 'vitest';
import {
  parseLogicalUnits,
  detectUnitHeadings,
  detectPageMarkers,
  detectSectionHeadings,
  hasUnitHeadings,
  PREAMBLE_UNIT_ID,
} from '../../lib/src/chunking/index.js';
import { MalformedInputError } from '../../lib/src/errors.js';

const SAMPLE = [
  '<!-- PAGE 1 -->',
  'REGLAMENTO DE PARTIDOS',
  '',
  '# TÍTULO I - Disposiciones generales',
  '',
  '**Artículo 1.** Objeto',
  'El presente reglamento regula los partidos.',
  '',
  '<!-- PAGE 2 -->',
  'Artículo 2: Ámbito',
  'Se aplica a todas las competiciones.',
  '',
  'ARTÍCULO 3',
  'Las sanciones se impondrán por el comité.',
  '<!-- PAGE 3 -->',
  'continúa el texto.',
].join('\n');

describe('parseLogicalUnits', () => {
  it('should return one unit per heading plus the preamble', () => {
    const units = parseLogicalUnits(SAMPLE);

    expect(units.map((u) => u.id)).toEqual([PREAMBLE_UNIT_ID, 'Art. 1', 'Art. 2', 'Art. 3']);
    expect(units.map((u) => u.kind)).toEqual(['preamble', 'article', 'article', 'article']);
    expect(units.map((u) => u.number)).toEqual([null, '1', '2', '3']);
  });

  it('should take titles from the heading line', () => {
    const units = parseLogicalUnits(SAMPLE);

    expect(units.map((u) => u.title)).toEqual([PREAMBLE_UNIT_ID, 'Objeto', 'Ámbito', 'Art. 3']);
  });

  it('should assign pages, including markers inside a unit', () => {
    const units = parseLogicalUnits(SAMPLE);

    expect(units.map((u) => u.pages)).toEqual([[1], [1, 2], [2], [2, 3]]);
  });

  it('should attach the enclosing section', () => {
    const units = parseLogicalUnits(SAMPLE);

    expect(units[0]?.section).toBeNull();
    expect(units[1]?.section).toBe('TÍTULO I - Disposiciones generales');
    expect(units[3]?.section).toBe('TÍTULO I - Disposiciones generales');
  });

  it('should keep content from the heading line to the next heading', () => {
    const units = parseLogicalUnits(SAMPLE);

    expect(units[2]?.content).toBe('Artículo 2: Ámbito\nSe aplica a todas las competiciones.');
    expect(units[3]?.content).toBe(
      'ARTÍCULO 3\nLas sanciones se impondrán por el comité.\n<!-- PAGE 3 -->\ncontinúa el texto.'
    );
  });

  it('should record spans that start at the heading', () => {
    const units = parseLogicalUnits(SAMPLE);
    const unit = units[2];

    expect(unit).toBeDefined();
    if (unit) {
      expect(SAMPLE.slice(unit.span.start, unit.span.end).startsWith('Artículo 2: Ámbito')).toBe(true);
      expect(unit.span.end).toBe(units[3]?.span.start);
    }
  });

  it('should return frozen units', () => {
    const units = parseLogicalUnits(SAMPLE);
    expect(units.every((u) => Object.isFrozen(u))).toBe(true);
  });

  it('should return no units for empty or blank text', () => {
    expect(parseLogicalUnits('')).toEqual([]);
    expect(parseLogicalUnits('  \n\n ')).toEqual([]);
  });

  it('should reject non-empty text without unit headings', () => {
    expect(() => parseLogicalUnits('<!-- PAGE 1 -->\nTexto sin estructura alguna.')).toThrow(
      MalformedInputError
    );
  });

  it('should skip the preamble when only page markers precede the first heading', () => {
    const units = parseLogicalUnits('<!-- PAGE 1 -->\n\nRegla 1: El terreno\nTexto.');

    expect(units.map((u) => u.id)).toEqual(['Regla 1']);
    expect(units[0]?.pages).toEqual([1]);
  });

  it('should trim the preamble and start its span at the first text', () => {
    const units = parseLogicalUnits('\n\nIntroducción\nRegla 1: Juego\nTexto.');

    expect(units[0]?.id).toBe(PREAMBLE_UNIT_ID);
    expect(units[0]?.content).toBe('Introducción');
    expect(units[0]?.span.start).toBe(2);
    expect(units[0]?.pages).toEqual([]);
  });

  it('should suffix repeated unit ids with their occurrence', () => {
    const units = parseLogicalUnits('Regla 1: Primera\nTexto.\nRegla 1: Segunda\nOtro texto.');

    expect(units.map((u) => u.id)).toEqual(['Regla 1', 'Regla 1 (2)']);
    expect(units[1]?.title).toBe('Segunda');
  });

  it('should not treat body text that begins with a unit name as a heading', () => {
    const units = parseLogicalUnits('Regla 1: Juego\nTexto.\nRegla 5 establece que el balón es esférico.');

    expect(units.map((u) => u.id)).toEqual(['Regla 1']);
    expect(units[0]?.content).toContain('Regla 5 establece');
  });

  it('should accept capitalised titles without a separator', () => {
    const units = parseLogicalUnits('REGLA 1 EL TERRENO DE JUEGO\nTexto.');

    expect(units[0]?.id).toBe('Regla 1');
    expect(units[0]?.title).toBe('EL TERRENO DE JUEGO');
  });

  it('should read ordinal headings', () => {
    const units = parseLogicalUnits(
      [
        '<!-- PAGE 1 -->',
        'ARTÍCULO 1º.- Objeto',
        'El presente reglamento regula las competiciones.',
        'ARTÍCULO 2.º - Ámbito',
        'Se aplica a todas las categorías.',
        'Artículo 3ª: Licencias',
        'Texto.',
      ].join('\n')
    );

    expect(units.map((u) => u.id)).toEqual(['Art. 1', 'Art. 2', 'Art. 3']);
    expect(units.map((u) => u.title)).toEqual(['Objeto', 'Ámbito', 'Licencias']);
  });

  it('should reject page numbers that decrease', () => {
    expect(() => parseLogicalUnits('<!-- PAGE 2 -->\nArtículo 1\nTexto.\n<!-- PAGE 1 -->')).toThrow(
      MalformedInputError
    );
  });
});

describe('detectUnitHeadings', () => {
  it('should normalise number variants', () => {
    const headings = detectUnitHeadings(
      ['Artículo 8 bis. Recursos', 'Art. 8.2 - Plazos', '## Rule 3: Fouls', 'ARTICLE 4a'].join('\n')
    );

    expect(headings.map((h) => h.id)).toEqual(['Art. 8bis', 'Art. 8.2', 'Regla 3', 'Art. 4a']);
    expect(headings.map((h) => h.title)).toEqual(['Recursos', 'Plazos', 'Fouls', 'Art. 4a']);
  });

  it('should read suffixes written without a space', () => {
    const headings = detectUnitHeadings('ARTÍCULO 8bis: Suplentes\nArtículo 9 TER\nREGLA 10 TERRENO');

    expect(headings.map((h) => h.id)).toEqual(['Art. 8bis', 'Art. 9ter', 'Regla 10']);
    expect(headings.map((h) => h.title)).toEqual(['Suplentes', 'Art. 9ter', 'TERRENO']);
  });

  it('should return headings in document order across kinds', () => {
    const headings = detectUnitHeadings('Regla 1: A\nArtículo 2: B\nRegla 3: C');

    expect(headings.map((h) => h.kind)).toEqual(['rule', 'article', 'rule']);
    expect(headings.map((h) => h.position)).toEqual([0, 11, 25]);
  });
});

describe('detectPageMarkers', () => {
  it('should return markers with positions', () => {
    const markers = detectPageMarkers('<!-- PAGE 1 -->\nuno\n<!-- PAGE 1 -->\n<!--PAGE 3-->');

    expect(markers).toEqual([
      { page: 1, position: 0 },
      { page: 1, position: 20 },
      { page: 3, position: 36 },
    ]);
  });

  it('should reject page zero', () => {
    expect(() => detectPageMarkers('<!-- PAGE 0 -->')).toThrow(MalformedInputError);
  });
});

describe('detectSectionHeadings', () => {
  it('should label sections with and without titles', () => {
    const sections = detectSectionHeadings('CAPÍTULO 2\nTexto\n### Sección III: Árbitros\n');

    expect(sections.map((s) => s.label)).toEqual(['CAPÍTULO 2', 'SECCIÓN III - Árbitros']);
  });
});

describe('hasUnitHeadings', () => {
  it('should detect whether any unit heading exists', () => {
    expect(hasUnitHeadings('Artículo 1: Objeto')).toBe(true);
    expect(hasUnitHeadings('El artículo 1 dice algo')).toBe(false);
  });
});

/**
 * Structure Parser for Rules Documents
 *
 * Walks OCR-structured text and yields the ordered sequence of logical units
 * (articles / rules). Recognises:
 * - page markers: `<!-- PAGE N -->`
 * - unit headings: ARTICLE / ARTÍCULO / ART. / REGLA / RULE followed by a number
 * - section headings: TÍTULO / CAPÍTULO / SECCIÓN / PART / CHAPTER / SECTION
 *
 * Headings may carry a markdown `#` prefix and bold markers.
 */

import { MalformedInputError } from '../errors.js';
import { PREAMBLE_UNIT_ID, UnitKind, type LogicalUnit } from './types.js';

// =============================================================================
// Patterns
// =============================================================================

interface HeadingPattern {
  kind: typeof UnitKind.ARTICLE | typeof UnitKind.RULE;
  /** Prefix of the canonical unit id */
  idPrefix: string;
  pattern: RegExp;
}

/**
 * Number as written in a heading: 8, 8a, 8.2, 8 bis, 8bis, 1º, 1.º.
 * The ordinal mark is not part of the captured number.
 */
const UNIT_NUMBER =
  '(\\d+(?:[ \\t]?(?:bis|ter|quater)(?![a-z])|[a-z](?![a-z]))?(?:\\.\\d+)*)(?:\\.?[º°ª])?(?![a-z0-9])';

/**
 * Rest of a heading line after the number
 */
const HEADING_REST = '([^\\n]*)$';

const LINE_PREFIX = '^[ \\t]*(?:#{1,6}[ \\t]*)?(?:\\*\\*)?';

const UNIT_PATTERNS: HeadingPattern[] = [
  {
    kind: UnitKind.ARTICLE,
    idPrefix: 'Art.',
    pattern: new RegExp(`${LINE_PREFIX}(?:art[íi]culo|article|art\\.)[ \\t]+${UNIT_NUMBER}${HEADING_REST}`, 'gimu'),
  },
  {
    kind: UnitKind.RULE,
    idPrefix: 'Regla',
    pattern: new RegExp(`${LINE_PREFIX}(?:regla|rule)[ \\t]+${UNIT_NUMBER}${HEADING_REST}`, 'gimu'),
  },
];

const SECTION_PATTERN = new RegExp(
  `${LINE_PREFIX}((?:t[íi]tulo|cap[íi]tulo|secci[óo]n|part|chapter|section)[ \\t]+(?:[ivxlcdm]+|\\d+))\\b${HEADING_REST}`,
  'gimu'
);

const PAGE_MARKER_PATTERN = /<!--\s*PAGE\s+(\d+)\s*-->/gi;

/**
 * Separators allowed between a heading number and its title
 */
const TITLE_SEPARATOR = /^[ \t]*[:.\-–—]+[ \t]*/u;

// =============================================================================
// Types
// =============================================================================

interface UnitHeading {
  kind: typeof UnitKind.ARTICLE | typeof UnitKind.RULE;
  id: string;
  number: string;
  title: string;
  position: number;
}

interface PageMarker {
  page: number;
  position: number;
}

interface SectionHeading {
  label: string;
  position: number;
}

// =============================================================================
// Heading Detection
// =============================================================================

/**
 * Title part of a heading line, or null when the line reads like body text
 * ("Regla 5 establece que...") rather than a heading.
 */
function parseHeadingRest(rest: string): string | null {
  const cleaned = rest.replace(/\*\*/g, '').replace(/\r$/, '').trim();
  if (cleaned.length === 0) {
    return '';
  }
  const separator = TITLE_SEPARATOR.exec(cleaned);
  if (separator) {
    return cleaned.slice(separator[0].length).trim();
  }
  // Unseparated titles are accepted only in capitals ("REGLA 1 EL TERRENO DE JUEGO")
  return cleaned === cleaned.toUpperCase() ? cleaned : null;
}

function normalizeUnitNumber(raw: string): string {
  return raw.toLowerCase().replace(/[ \t]+/g, '');
}

/**
 * Find every unit heading, in document order
 */
export function detectUnitHeadings(text: string): UnitHeading[] {
  const headings: UnitHeading[] = [];

  for (const { kind, idPrefix, pattern } of UNIT_PATTERNS) {
    pattern.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(text)) !== null) {
      const [, rawNumber = '', rest = ''] = match;
      const title = parseHeadingRest(rest);
      if (title === null) {
        continue;
      }
      const number = normalizeUnitNumber(rawNumber);
      const id = `${idPrefix} ${number}`;
      headings.push({ kind, id, number, title: title || id, position: match.index });
    }
  }

  return headings.sort((a, b) => a.position - b.position);
}

/**
 * Find every page marker, validating that numbers are positive and never decrease
 *
 * @throws {MalformedInputError} on a zero or decreasing page number
 */
export function detectPageMarkers(text: string): PageMarker[] {
  const markers: PageMarker[] = [];
  PAGE_MARKER_PATTERN.lastIndex = 0;

  let match: RegExpExecArray | null;
  let previous = 0;
  while ((match = PAGE_MARKER_PATTERN.exec(text)) !== null) {
    const page = parseInt(match[1] ?? '', 10);
    if (!Number.isInteger(page) || page <= 0) {
      throw new MalformedInputError(`Page marker "${match[0]}" must carry a positive page number`, {
        position: match.index,
      });
    }
    if (page < previous) {
      throw new MalformedInputError(`Page ${page} follows page ${previous}; page numbers must not decrease`, {
        position: match.index,
        page,
        previousPage: previous,
      });
    }
    markers.push({ page, position: match.index });
    previous = page;
  }

  return markers;
}

export function detectSectionHeadings(text: string): SectionHeading[] {
  const sections: SectionHeading[] = [];
  SECTION_PATTERN.lastIndex = 0;

  let match: RegExpExecArray | null;
  while ((match = SECTION_PATTERN.exec(text)) !== null) {
    const [, label = '', rest = ''] = match;
    const title = parseHeadingRest(rest);
    if (title === null) {
      continue;
    }
    const normalizedLabel = label.replace(/[ \t]+/g, ' ').toUpperCase();
    sections.push({
      label: title ? `${normalizedLabel} - ${title}` : normalizedLabel,
      position: match.index,
    });
  }

  return sections;
}

// =============================================================================
// Unit Parsing
// =============================================================================

/**
 * Page current at `position` plus every marker in [position, end), deduplicated
 */
function pagesForSpan(markers: PageMarker[], start: number, end: number): number[] {
  const pages: number[] = [];
  let current: number | null = null;

  for (const marker of markers) {
    if (marker.position < start) {
      current = marker.page;
    } else if (marker.position < end) {
      if (current !== null && pages.length === 0) pages.push(current);
      current = null;
      if (!pages.includes(marker.page)) pages.push(marker.page);
    } else {
      break;
    }
  }

  if (current !== null && pages.length === 0) {
    pages.push(current);
  }
  return pages;
}

function sectionAt(sections: SectionHeading[], position: number): string | null {
  let label: string | null = null;
  for (const section of sections) {
    if (section.position >= position) break;
    label = section.label;
  }
  return label;
}

/**
 * Parse structured text into logical units.
 *
 * Every heading starts exactly one unit; the unit runs up to the next heading
 * or the end of the document. Leading text that is more than page markers
 * becomes a synthetic "Preamble" unit. Repeated unit ids get an occurrence
 * suffix ("Art. 8 (2)").
 *
 * @throws {MalformedInputError} when a non-empty document has no unit
 *         heading, or page markers are out of order
 *
 * @example
 * ```typescript
 * const units = parseLogicalUnits('<!-- PAGE 1 -->\nREGLA 1: El terreno\n...');
 * units[0].id; // 'Regla 1'
 * ```
 */
export function parseLogicalUnits(text: string): LogicalUnit[] {
  if (text.trim().length === 0) {
    return [];
  }

  const markers = detectPageMarkers(text);
  const headings = detectUnitHeadings(text);
  const sections = detectSectionHeadings(text);

  const first = headings[0];
  if (!first) {
    throw new MalformedInputError('No unit headings (ARTICLE / REGLA N) found in a non-empty document', {
      length: text.length,
      pageMarkers: markers.length,
    });
  }

  const units: LogicalUnit[] = [];

  const leading = text.slice(0, first.position);
  if (leading.replace(PAGE_MARKER_PATTERN, '').trim().length > 0) {
    const start = leading.length - leading.trimStart().length;
    units.push(
      Object.freeze({
        id: PREAMBLE_UNIT_ID,
        kind: UnitKind.PREAMBLE,
        number: null,
        title: PREAMBLE_UNIT_ID,
        content: leading.trim(),
        pages: pagesForSpan(markers, start, first.position),
        section: null,
        span: { start, end: first.position },
      })
    );
  }

  const occurrences = new Map<string, number>();

  headings.forEach((heading, index) => {
    const end = headings[index + 1]?.position ?? text.length;
    const seen = (occurrences.get(heading.id) ?? 0) + 1;
    occurrences.set(heading.id, seen);
    const id = seen > 1 ? `${heading.id} (${seen})` : heading.id;

    units.push(
      Object.freeze({
        id,
        kind: heading.kind,
        number: heading.number,
        title: heading.title === heading.id ? id : heading.title,
        content: text.slice(heading.position, end).trimEnd(),
        pages: pagesForSpan(markers, heading.position, end),
        section: sectionAt(sections, heading.position),
        span: { start: heading.position, end },
      })
    );
  });

  return units;
}

/**
 * Quick check whether a text has any unit heading
 */
export function hasUnitHeadings(text: string): boolean {
  return detectUnitHeadings(text).length > 0;
}

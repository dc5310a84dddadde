/**
 * Query Parsing
 *
 * Splits a natural-language query into keyword terms (same normalization as
 * chunk keywords) and direct unit references such as "Art. 8" or "regla 3".
 */

import { normalizeTerms } from '../chunking/keywords.js';
import type { ParsedQuery } from './types.js';

const UNIT_REFERENCE_PATTERN =
  /\b(art[íi]culos?|articles?|art\.?|reglas?|rules?)\s*(\d+(?:\s?(?:bis|ter|quater)(?![a-z])|[a-z](?![a-z]))?(?:\.\d+)*)(?:\.?[º°ª])?(?![a-z0-9])/giu;

/**
 * Canonical unit id for a reference keyword and number, matching the ids
 * the structure parser assigns
 */
export function canonicalUnitId(keyword: string, number: string): string {
  const normalizedNumber = number.toLowerCase().replace(/\s+/g, '');
  return /^(regla|rule)/i.test(keyword) ? `Regla ${normalizedNumber}` : `Art. ${normalizedNumber}`;
}

export function extractUnitReferences(query: string): string[] {
  const refs: string[] = [];
  UNIT_REFERENCE_PATTERN.lastIndex = 0;

  let match: RegExpExecArray | null;
  while ((match = UNIT_REFERENCE_PATTERN.exec(query)) !== null) {
    const [, keyword = '', number = ''] = match;
    const id = canonicalUnitId(keyword, number);
    if (!refs.includes(id)) {
      refs.push(id);
    }
  }
  return refs;
}

export function parseQuery(query: string): ParsedQuery {
  return {
    terms: [...new Set(normalizeTerms(query))],
    unitRefs: extractUnitReferences(query),
  };
}

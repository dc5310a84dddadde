/**
 * Keyword Extraction
 *
 * Exact-term matcher shared by chunk keyword extraction and query parsing.
 * Both sides go through `normalizeTerms`, so a query term matches a chunk
 * keyword only when the normalized forms are identical. No stemming.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const StopwordFileSchema = z.object({
  description: z.string().optional(),
  words: z.array(z.string()),
});

const STOPWORDS_URL = new URL('../../data/stopwords.json', import.meta.url);

let stopwords: ReadonlySet<string> | null = null;

/**
 * Stopword set, loaded once from lib/data/stopwords.json
 */
export function getStopwords(): ReadonlySet<string> {
  if (!stopwords) {
    const file = StopwordFileSchema.parse(JSON.parse(readFileSync(STOPWORDS_URL, 'utf-8')));
    stopwords = new Set(file.words.map(foldTerm));
  }
  return stopwords;
}

/** Shortest term kept */
export const MIN_TERM_LENGTH = 3;

const PAGE_MARKER_PATTERN = /<!--\s*PAGE\s+\d+\s*-->/gi;

/**
 * Lower case with diacritics removed ("Sanción" → "sancion")
 */
export function foldTerm(term: string): string {
  return term
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase();
}

/**
 * Split text into normalized terms, in order, duplicates kept.
 * Page markers, stopwords, numbers and terms shorter than
 * MIN_TERM_LENGTH are dropped.
 */
export function normalizeTerms(text: string): string[] {
  const stop = getStopwords();
  return foldTerm(text.replace(PAGE_MARKER_PATTERN, ' '))
    .split(/[^a-z0-9]+/)
    .filter(
      (term) => term.length >= MIN_TERM_LENGTH && !/^\d+$/.test(term) && !stop.has(term)
    );
}

/**
 * Most frequent terms of a text; ties ordered alphabetically
 */
export function extractKeywords(text: string, limit: number): string[] {
  const frequencies = new Map<string, number>();
  for (const term of normalizeTerms(text)) {
    frequencies.set(term, (frequencies.get(term) ?? 0) + 1);
  }

  return [...frequencies.entries()]
    .sort(([termA, countA], [termB, countB]) => countB - countA || compareTerms(termA, termB))
    .slice(0, limit)
    .map(([term]) => term);
}

function compareTerms(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

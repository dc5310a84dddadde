/**
 * Shared fixtures: hand-built logical units, a word-count tokenizer and a
 * silent logger.
 */

import { TokenCounter, UnitKind, type LogicalUnit } from '../../lib/src/chunking/index.js';
import { Logger, LogLevel } from '../../lib/src/logging/index.js';

/**
 * Counter where each whitespace-separated word is one token
 */
export function createWordCounter(): TokenCounter {
  const counter = new TokenCounter();
  counter.setTokenizer({
    encode: (text) => text.split(/\s+/).filter((word) => word.length > 0).map((_, index) => index),
  });
  return counter;
}

/**
 * `count` repetitions of a word, space separated
 */
export function words(count: number, word = 'texto'): string {
  return Array.from({ length: count }, () => word).join(' ');
}

export function makeUnit(id: string, content: string, overrides?: Partial<LogicalUnit>): LogicalUnit {
  return {
    id,
    kind: id.startsWith('Regla') ? UnitKind.RULE : UnitKind.ARTICLE,
    number: id.replace(/^\D+/, '') || null,
    title: id,
    content,
    pages: [1],
    section: null,
    span: { start: 0, end: content.length },
    ...overrides,
  };
}

export function createSilentLogger(): Logger {
  return new Logger({ level: LogLevel.ERROR, console: false });
}

export const FIXED_DATE = '2025-01-15T10:00:00.000Z';

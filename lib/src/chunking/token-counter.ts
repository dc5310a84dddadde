/**
 * Token Counting Utilities
 *
 * Fixed counting scheme shared by the chunker (budget B) and the retrieval
 * engine (ceiling C). Counts are estimated from characters unless a
 * tokenizer is injected; either way a given text always yields the same
 * count for a given counter configuration.
 */

import { TokenCountOptionsSchema, type TokenCountResult, type TokenCountOptions } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Exact tokenizer, for callers that have one
 */
export interface TokenizerInterface {
  /** Tokenize text and return its token ids */
  encode(text: string): ArrayLike<number>;
}

export interface TokenCounterConfig {
  /** Characters per token for estimation (Latin-script prose is close to 4) */
  charsPerToken: number;
  /** Maximum cache size (number of entries) */
  maxCacheSize: number;
}

// =============================================================================
// Token Counter Class
// =============================================================================

/**
 * Token counter with optional tokenizer support and caching
 *
 * 1. Estimation mode (default): ceil(characters / charsPerToken)
 * 2. Tokenizer mode: length of the injected tokenizer's encoding
 */
export class TokenCounter {
  private readonly config: TokenCounterConfig;
  private tokenizer: TokenizerInterface | null = null;
  private cache: Map<string, TokenCountResult> = new Map();
  private hits = 0;
  private misses = 0;

  constructor(config?: Partial<TokenCounterConfig>) {
    this.config = {
      charsPerToken: config?.charsPerToken ?? 4,
      maxCacheSize: config?.maxCacheSize ?? 10000,
    };
    if (this.config.charsPerToken <= 0) {
      throw new RangeError(`charsPerToken must be positive, got ${this.config.charsPerToken}`);
    }
  }

  /**
   * Switch to exact counting. Clears cached estimates.
   */
  setTokenizer(tokenizer: TokenizerInterface): void {
    this.tokenizer = tokenizer;
    this.cache.clear();
  }

  count(text: string, options?: Partial<TokenCountOptions>): TokenCountResult {
    const opts = TokenCountOptionsSchema.parse(options ?? {});

    if (opts.useCache && !opts.forceRecount) {
      const cached = this.cache.get(text);
      if (cached) {
        this.hits++;
        // Refresh recency
        this.cache.delete(text);
        this.cache.set(text, cached);
        return { ...cached, method: 'cached' };
      }
    }
    this.misses++;

    const result = this.tokenizer
      ? this.countWithTokenizer(this.tokenizer, text)
      : this.countWithEstimation(text);

    if (opts.useCache) {
      this.addToCache(text, result);
    }
    return result;
  }

  private countWithTokenizer(tokenizer: TokenizerInterface, text: string): TokenCountResult {
    return {
      count: tokenizer.encode(text).length,
      estimated: false,
      method: 'tokenizer',
    };
  }

  private countWithEstimation(text: string): TokenCountResult {
    return {
      count: Math.ceil(text.length / this.config.charsPerToken),
      estimated: true,
      method: 'estimation',
    };
  }

  countTotal(texts: string[], options?: Partial<TokenCountOptions>): number {
    return texts.reduce((sum, text) => sum + this.count(text, options).count, 0);
  }

  exceedsLimit(text: string, limit: number, options?: Partial<TokenCountOptions>): boolean {
    return this.count(text, options).count > limit;
  }

  private addToCache(text: string, result: TokenCountResult): void {
    if (this.cache.size >= this.config.maxCacheSize) {
      const oldest = this.cache.keys().next().value;
      if (oldest !== undefined) {
        this.cache.delete(oldest);
      }
    }
    this.cache.set(text, result);
  }

  clearCache(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getCacheStats(): { size: number; maxSize: number; hitRate: number } {
    const total = this.hits + this.misses;
    return {
      size: this.cache.size,
      maxSize: this.config.maxCacheSize,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  hasTokenizer(): boolean {
    return this.tokenizer !== null;
  }

  getCharsPerToken(): number {
    return this.config.charsPerToken;
  }
}

// =============================================================================
// Global Instance & Utilities
// =============================================================================

let globalTokenCounter: TokenCounter | null = null;

/**
 * Get or create the global token counter instance
 */
export function getGlobalTokenCounter(config?: Partial<TokenCounterConfig>): TokenCounter {
  if (!globalTokenCounter) {
    globalTokenCounter = new TokenCounter(config);
  }
  return globalTokenCounter;
}

/**
 * Reset the global token counter (useful for testing)
 */
export function resetGlobalTokenCounter(): void {
  globalTokenCounter = null;
}

/**
 * Quick token count using the global counter
 */
export function countTokens(text: string, options?: Partial<TokenCountOptions>): TokenCountResult {
  return getGlobalTokenCounter().count(text, options);
}

/**
 * Estimation-only token count, no counter instance involved
 */
export function estimateTokens(text: string, charsPerToken: number = 4): number {
  return Math.ceil(text.length / charsPerToken);
}

/**
 * Retry Utilities
 *
 * Exponential backoff with jitter for the chunk store, the only suspend
 * point of a build or a query. Retries are bounded; once the bound is hit
 * the last error surfaces unchanged.
 */

import { z } from 'zod';

// ============================================================================
// Types
// ============================================================================

export const RetryConfigSchema = z.object({
  /** Retries after the first attempt */
  maxRetries: z.number().int().nonnegative().default(3),
  /** Delay before the first retry */
  initialDelayMs: z.number().nonnegative().default(100),
  /** Upper bound for any single delay */
  maxDelayMs: z.number().nonnegative().default(2000),
  backoffMultiplier: z.number().min(1).default(2),
  jitter: z.boolean().default(true),
  /** Fraction of the delay used as jitter range */
  jitterFactor: z.number().min(0).max(1).default(0.2),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const DEFAULT_RETRY_CONFIG: RetryConfig = RetryConfigSchema.parse({});

/**
 * Event emitted on each retry state change
 */
export interface RetryEvent {
  type: 'attempt_start' | 'attempt_failed' | 'retrying' | 'attempt_succeeded' | 'max_retries_exceeded';
  attemptNumber: number;
  maxRetries: number;
  error?: unknown;
  nextDelayMs?: number;
  timestamp: Date;
}

export type RetryEventHandler = (event: RetryEvent) => void;

// ============================================================================
// Retry Utilities
// ============================================================================

/**
 * Delay before the next attempt: initialDelayMs * multiplier^(attempt - 1),
 * capped at maxDelayMs, with optional symmetric jitter.
 *
 * @param attemptNumber - The attempt that just failed (1-based)
 */
export function calculateRetryDelay(attemptNumber: number, config: RetryConfig): number {
  const exponentialDelay =
    config.initialDelayMs * Math.pow(config.backoffMultiplier, attemptNumber - 1);

  let delay = Math.min(exponentialDelay, config.maxDelayMs);

  if (config.jitter) {
    const jitterRange = delay * config.jitterFactor;
    delay += (Math.random() - 0.5) * jitterRange;
    delay = Math.max(0, delay);
  }

  return Math.round(delay);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function mergeRetryConfig(config?: Partial<RetryConfig>): RetryConfig {
  return RetryConfigSchema.parse({ ...DEFAULT_RETRY_CONFIG, ...config });
}

function createRetryEvent(
  type: RetryEvent['type'],
  attemptNumber: number,
  maxRetries: number,
  error?: unknown,
  nextDelayMs?: number
): RetryEvent {
  const event: RetryEvent = { type, attemptNumber, maxRetries, timestamp: new Date() };
  if (error !== undefined) event.error = error;
  if (nextDelayMs !== undefined) event.nextDelayMs = nextDelayMs;
  return event;
}

// ============================================================================
// withRetry Function
// ============================================================================

export interface WithRetryOptions {
  config?: Partial<RetryConfig> | undefined;
  /** Decides whether a thrown value is transient; non-retryable errors surface at once */
  isRetryable: (error: unknown) => boolean;
  onRetryEvent?: RetryEventHandler | undefined;
}

/**
 * Run an async operation, retrying transient failures with backoff.
 *
 * @throws The last error once retries are exhausted, or the first
 *         non-retryable error
 *
 * @example
 * ```typescript
 * const content = await withRetry(() => readFile(path, 'utf-8'), {
 *   config: { maxRetries: 3 },
 *   isRetryable: isTransientIOError,
 * });
 * ```
 */
export async function withRetry<T>(fn: () => Promise<T>, options: WithRetryOptions): Promise<T> {
  const config = mergeRetryConfig(options.config);
  const { onRetryEvent, isRetryable } = options;

  for (let attempt = 1; ; attempt++) {
    onRetryEvent?.(createRetryEvent('attempt_start', attempt, config.maxRetries));

    try {
      const result = await fn();
      onRetryEvent?.(createRetryEvent('attempt_succeeded', attempt, config.maxRetries));
      return result;
    } catch (error) {
      onRetryEvent?.(createRetryEvent('attempt_failed', attempt, config.maxRetries, error));

      const isLastAttempt = attempt > config.maxRetries;
      if (isLastAttempt || !isRetryable(error)) {
        if (isLastAttempt) {
          onRetryEvent?.(
            createRetryEvent('max_retries_exceeded', attempt, config.maxRetries, error)
          );
        }
        throw error;
      }

      const delayMs = calculateRetryDelay(attempt, config);
      onRetryEvent?.(createRetryEvent('retrying', attempt, config.maxRetries, error, delayMs));
      await sleep(delayMs);
    }
  }
}

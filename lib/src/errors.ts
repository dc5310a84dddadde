/**
 * Knowledge Base Error Types
 *
 * Error taxonomy shared by the parser, chunker, index builder, chunk store
 * and retrieval engine. Every error carries a stable code so the boundary
 * (knowledge base facade, CLI) can report an explicit status.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for knowledge base operations
 */
export const KnowledgeBaseErrorCode = {
  /** Structured text could not be parsed into logical units */
  MALFORMED_INPUT: 'MALFORMED_INPUT',
  /** Derived indices disagree (unit in several chunks, dangling chunk id) */
  INDEX_CONSISTENCY: 'INDEX_CONSISTENCY',
  /** Another build for the same document is running */
  BUILD_IN_PROGRESS: 'BUILD_IN_PROGRESS',
  /** Chunk or index file could not be read or written */
  CHUNK_STORE_IO: 'CHUNK_STORE_IO',
  /** Retrieval abandoned by its caller */
  ABORTED: 'ABORTED',
  /** Document is not in the catalog or has no published index */
  NOT_FOUND: 'NOT_FOUND',
  /** Unknown error */
  UNKNOWN: 'UNKNOWN',
} as const;

export type KnowledgeBaseErrorCode =
  (typeof KnowledgeBaseErrorCode)[keyof typeof KnowledgeBaseErrorCode];

/**
 * Options accepted by every knowledge base error
 */
export interface KnowledgeBaseErrorOptions {
  cause?: Error;
  metadata?: Record<string, unknown>;
  retryable?: boolean;
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for knowledge base operations
 */
export class KnowledgeBaseError extends Error {
  readonly code: KnowledgeBaseErrorCode;
  override readonly cause: Error | undefined;
  readonly metadata: Record<string, unknown> | undefined;
  readonly retryable: boolean;

  constructor(message: string, code: KnowledgeBaseErrorCode, options?: KnowledgeBaseErrorOptions) {
    super(message);
    this.name = 'KnowledgeBaseError';
    this.code = code;
    this.cause = options?.cause;
    this.metadata = options?.metadata;
    this.retryable = options?.retryable ?? false;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, KnowledgeBaseError);
    }
  }

  /**
   * Wrap an unknown thrown value
   */
  static fromError(
    error: unknown,
    code?: KnowledgeBaseErrorCode,
    metadata?: Record<string, unknown>
  ): KnowledgeBaseError {
    if (error instanceof KnowledgeBaseError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const options: KnowledgeBaseErrorOptions = {};
    if (error instanceof Error) {
      options.cause = error;
    }
    if (metadata !== undefined) {
      options.metadata = metadata;
    }

    return new KnowledgeBaseError(message, code ?? KnowledgeBaseErrorCode.UNKNOWN, options);
  }

  /**
   * Plain diagnostic record for boundary responses and logs
   */
  toDetail(): ErrorDetail {
    return {
      code: this.code,
      message: this.message,
      details: this.metadata ?? {},
    };
  }
}

/**
 * Serializable error description returned across the boundary
 */
export interface ErrorDetail {
  code: KnowledgeBaseErrorCode;
  message: string;
  details: Record<string, unknown>;
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * The structured text has no recognisable unit structure, or its page
 * markers are out of order.
 */
export class MalformedInputError extends KnowledgeBaseError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, KnowledgeBaseErrorCode.MALFORMED_INPUT, metadata ? { metadata } : undefined);
    this.name = 'MalformedInputError';
  }
}

/**
 * A logical unit resolves to more than one chunk, or an index references a
 * chunk that does not exist. Signals a chunker bug or a corrupt index.
 */
export class IndexConsistencyError extends KnowledgeBaseError {
  /** Every problem found, not only the first */
  readonly problems: string[];

  constructor(message: string, problems: string[], metadata?: Record<string, unknown>) {
    super(message, KnowledgeBaseErrorCode.INDEX_CONSISTENCY, {
      metadata: { ...metadata, problems },
    });
    this.name = 'IndexConsistencyError';
    this.problems = problems;
  }
}

/**
 * A build for the same document id is already running.
 */
export class BuildInProgressError extends KnowledgeBaseError {
  readonly documentId: string;

  constructor(documentId: string) {
    super(`A build for document "${documentId}" is already in progress`, KnowledgeBaseErrorCode.BUILD_IN_PROGRESS, {
      metadata: { documentId },
      retryable: true,
    });
    this.name = 'BuildInProgressError';
    this.documentId = documentId;
  }
}

/**
 * Chunk store or index file I/O failure.
 *
 * `retryable` is true for transient conditions (busy, too many open files,
 * timeouts); `withRetry` keeps retrying those up to its bound.
 */
export class ChunkStoreIOError extends KnowledgeBaseError {
  readonly path: string;
  readonly operation: 'read' | 'write' | 'list' | 'remove' | 'rename';

  constructor(
    message: string,
    path: string,
    operation: ChunkStoreIOError['operation'],
    options?: { cause?: Error; retryable?: boolean }
  ) {
    const errorOptions: KnowledgeBaseErrorOptions = {
      metadata: { path, operation },
      retryable: options?.retryable ?? false,
    };
    if (options?.cause) {
      errorOptions.cause = options.cause;
    }
    super(message, KnowledgeBaseErrorCode.CHUNK_STORE_IO, errorOptions);
    this.name = 'ChunkStoreIOError';
    this.path = path;
    this.operation = operation;
  }
}

/**
 * The caller aborted a retrieval through its AbortSignal.
 */
export class RetrievalAbortedError extends KnowledgeBaseError {
  constructor() {
    super('Retrieval aborted by caller', KnowledgeBaseErrorCode.ABORTED);
    this.name = 'RetrievalAbortedError';
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isKnowledgeBaseError(error: unknown): error is KnowledgeBaseError {
  return error instanceof KnowledgeBaseError;
}

/**
 * Node error codes treated as transient for file system operations
 */
export const TRANSIENT_IO_CODES: readonly string[] = ['EAGAIN', 'EBUSY', 'EMFILE', 'ENFILE', 'ETIMEDOUT', 'EIO'];

/**
 * Check whether a thrown file system error is worth retrying
 */
export function isTransientIOError(error: unknown): boolean {
  if (error instanceof ChunkStoreIOError) {
    return error.retryable;
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return TRANSIENT_IO_CODES.includes(error.code);
  }
  return false;
}

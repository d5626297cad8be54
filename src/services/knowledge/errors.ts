export enum ErrorCode {
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',
  EMBEDDING_FAILED = 'EMBEDDING_FAILED',
  TIMEOUT = 'TIMEOUT',
  NOT_FOUND = 'NOT_FOUND',
  RETRIEVAL_FAILED = 'RETRIEVAL_FAILED',
  INVALID_INPUT = 'INVALID_INPUT',
}

/**
 * Base class for errors raised by the indexing and retrieval services.
 */
export class KnowledgeError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = 'KnowledgeError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/** No usable text could be recovered from the source content. */
export class ExtractionError extends KnowledgeError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.EXTRACTION_FAILED, message, cause);
    this.name = 'ExtractionError';
  }
}

export class EmbeddingError extends KnowledgeError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.EMBEDDING_FAILED, message, cause);
    this.name = 'EmbeddingError';
  }
}

export class TimeoutError extends KnowledgeError {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(ErrorCode.TIMEOUT, message);
    this.name = 'TimeoutError';
  }
}

export class NotFoundError extends KnowledgeError {
  constructor(message: string) {
    super(ErrorCode.NOT_FOUND, message);
    this.name = 'NotFoundError';
  }
}

/** Query-time failure. Always recovered into an empty context by the retrieval engine. */
export class RetrievalError extends KnowledgeError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.RETRIEVAL_FAILED, message, cause);
    this.name = 'RetrievalError';
  }
}

export class ValidationError extends KnowledgeError {
  constructor(
    message: string,
    public readonly issues: Record<string, string[] | undefined> = {}
  ) {
    super(ErrorCode.INVALID_INPUT, message);
    this.name = 'ValidationError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

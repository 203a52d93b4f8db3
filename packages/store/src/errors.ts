/**
 * Error classes for the store.
 *
 * Write paths raise; existence checks and searches degrade to `false` / `[]`
 * for genuine not-found cases only.
 */

export enum ErrorCode {
  // Collections (1xxx)
  COLLECTION_NOT_FOUND = 'E1000',
  INVALID_COLLECTION_NAME = 'E1001',

  // Queries (2xxx)
  MISSING_QUERY_PARAMETER = 'E2000',

  // Embeddings (3xxx)
  EMBEDDING_UNAVAILABLE = 'E3000',
  EMBEDDING_FAILED = 'E3001',
  VECTOR_DIMENSION_MISMATCH = 'E3002',

  // Engine (4xxx)
  ENGINE_ERROR = 'E4000',
  STORE_CLOSED = 'E4001',

  // General (9xxx)
  INVALID_DATA_POINT = 'E9000',
  CONFIGURATION_ERROR = 'E9001',
}

export class StoreError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export class CollectionNotFoundError extends StoreError {
  readonly collection: string;

  constructor(collection: string) {
    super(`Collection not found: ${collection}`, ErrorCode.COLLECTION_NOT_FOUND, { collection });
    this.name = 'CollectionNotFoundError';
    this.collection = collection;
  }
}

export class InvalidCollectionNameError extends StoreError {
  constructor(name: string, reason: string) {
    super(`Invalid collection name "${name}": ${reason}`, ErrorCode.INVALID_COLLECTION_NAME, { name });
    this.name = 'InvalidCollectionNameError';
  }
}

export class MissingQueryParameterError extends StoreError {
  constructor() {
    super('Either queryText or queryVector must be provided', ErrorCode.MISSING_QUERY_PARAMETER);
    this.name = 'MissingQueryParameterError';
  }
}

export class EmbeddingUnavailableError extends StoreError {
  constructor() {
    super('Embedding engine not configured', ErrorCode.EMBEDDING_UNAVAILABLE);
    this.name = 'EmbeddingUnavailableError';
  }
}

export class EmbeddingFailedError extends StoreError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, ErrorCode.EMBEDDING_FAILED, context, { cause });
    this.name = 'EmbeddingFailedError';
  }
}

export class VectorDimensionMismatchError extends StoreError {
  constructor(id: string, expected: number, actual: number) {
    super(
      `Vector for data point ${id} has ${actual} dimensions, expected ${expected}`,
      ErrorCode.VECTOR_DIMENSION_MISMATCH,
      { id, expected, actual },
    );
    this.name = 'VectorDimensionMismatchError';
  }
}

/** Wraps a failure raised by the SQLite engine; the original error is kept as `cause`. */
export class EngineError extends StoreError {
  constructor(message: string, sql: string, cause: unknown) {
    super(message, ErrorCode.ENGINE_ERROR, { sql }, { cause });
    this.name = 'EngineError';
  }
}

export class StoreClosedError extends StoreError {
  constructor() {
    super('Store connection is closed', ErrorCode.STORE_CLOSED);
    this.name = 'StoreClosedError';
  }
}

export class InvalidDataPointError extends StoreError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.INVALID_DATA_POINT, context);
    this.name = 'InvalidDataPointError';
  }
}

export class ConfigurationError extends StoreError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, ErrorCode.CONFIGURATION_ERROR, { issues });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

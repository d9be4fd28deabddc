/**
 * Custom error classes for the ingestion pipeline and the API
 */

/**
 * Error thrown when an environment variable is missing or invalid
 */
export class ConfigurationError extends Error {
  constructor(message: string, public key?: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Error thrown when a source document cannot be discovered, read or parsed
 */
export class DocumentError extends Error {
  constructor(message: string, public path?: string, public originalError?: Error) {
    super(message);
    this.name = 'DocumentError';
    Object.setPrototypeOf(this, DocumentError.prototype);
  }
}

/**
 * Error thrown when chunking parameters are invalid
 */
export class ChunkingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChunkingError';
    Object.setPrototypeOf(this, ChunkingError.prototype);
  }
}

/**
 * Error thrown when embedding generation fails
 */
export class EmbeddingError extends Error {
  constructor(message: string, public originalError?: Error, public status?: number) {
    super(message);
    this.name = 'EmbeddingError';
    Object.setPrototypeOf(this, EmbeddingError.prototype);
  }
}

/**
 * Error thrown when the model runtime rejects a generation request
 */
export class GenerationError extends Error {
  constructor(message: string, public originalError?: Error, public status?: number) {
    super(message);
    this.name = 'GenerationError';
    Object.setPrototypeOf(this, GenerationError.prototype);
  }
}

/**
 * Error thrown when the model runtime cannot be reached
 */
export class ServiceUnavailableError extends Error {
  constructor(message: string, public service: string, public originalError?: Error) {
    super(message);
    this.name = 'ServiceUnavailableError';
    Object.setPrototypeOf(this, ServiceUnavailableError.prototype);
  }
}

/**
 * Error thrown when vector index operations fail or persisted data is inconsistent
 */
export class VectorIndexError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'VectorIndexError';
    Object.setPrototypeOf(this, VectorIndexError.prototype);
  }
}

/**
 * Error thrown when a query arrives before any index has been published
 */
export class IndexNotReadyError extends Error {
  constructor(message = 'Vector index not found. Run ingestion first.') {
    super(message);
    this.name = 'IndexNotReadyError';
    Object.setPrototypeOf(this, IndexNotReadyError.prototype);
  }
}

/**
 * Error thrown when an ingestion run is requested while another is active
 */
export class IngestionInProgressError extends Error {
  constructor(message = 'An ingestion run is already in progress') {
    super(message);
    this.name = 'IngestionInProgressError';
    Object.setPrototypeOf(this, IngestionInProgressError.prototype);
  }
}

/**
 * Error thrown when an HTTP request body is malformed
 */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isDocumentError(error: unknown): error is DocumentError {
  return error instanceof DocumentError;
}

export function isChunkingError(error: unknown): error is ChunkingError {
  return error instanceof ChunkingError;
}

export function isEmbeddingError(error: unknown): error is EmbeddingError {
  return error instanceof EmbeddingError;
}

export function isGenerationError(error: unknown): error is GenerationError {
  return error instanceof GenerationError;
}

export function isServiceUnavailableError(
  error: unknown
): error is ServiceUnavailableError {
  return error instanceof ServiceUnavailableError;
}

export function isVectorIndexError(error: unknown): error is VectorIndexError {
  return error instanceof VectorIndexError;
}

export function isIndexNotReadyError(error: unknown): error is IndexNotReadyError {
  return error instanceof IndexNotReadyError;
}

export function isIngestionInProgressError(
  error: unknown
): error is IngestionInProgressError {
  return error instanceof IngestionInProgressError;
}

export function isInvalidRequestError(error: unknown): error is InvalidRequestError {
  return error instanceof InvalidRequestError;
}

/**
 * Normalizes an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

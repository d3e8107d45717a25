/**
 * Error types for the retrieval engine.
 *
 * Every error extends GraphRagError, which carries a programmatic `code` and
 * an optional `cause`. The tool layer maps these onto the result statuses the
 * agent loop reasons over:
 *
 * - CapabilityUnavailableError → `capability_unavailable`
 * - InvalidInputError → `error` / INVALID_INPUT
 * - StoreUnavailableError → `error` / STORE_UNAVAILABLE
 *
 * ```typescript
 * import { StoreUnavailableError } from './errors.js';
 *
 * try {
 *   db.prepare(sql).all();
 * } catch (err) {
 *   throw new StoreUnavailableError('Document query failed', 'DOCUMENT_QUERY_FAILED', err);
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all engine errors.
 */
export class GraphRagError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including the cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof GraphRagError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Capability errors
// ─────────────────────────────────────────────────────────────────────────────

/** Optional subsystems whose absence is reported rather than fatal. */
export type Capability =
  | 'knowledge_graph'
  | 'embedding'
  | 'image_embedding'
  | 'image_store'
  | 'language_model';

/**
 * A backing subsystem was never provisioned or cannot be reached.
 *
 * Distinct from an empty result: "the graph has no match" and "there is no
 * graph" need different remediation.
 */
export class CapabilityUnavailableError extends GraphRagError {
  readonly capability: Capability;

  constructor(capability: Capability, message: string, cause?: unknown) {
    super(message, 'CAPABILITY_UNAVAILABLE', cause);
    this.capability = capability;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Input errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Malformed request: out-of-range hop count, non-positive limit, bad dates.
 * Raised before any I/O.
 *
 * Common codes:
 * - `INVALID_INPUT`: generic validation failure
 * - `EMPTY_QUERY`: query text missing or blank
 * - `OUT_OF_RANGE`: numeric argument outside its allowed range
 */
export class InvalidInputError extends GraphRagError {
  /** Offending field, when known */
  readonly field?: string;

  constructor(message: string, field?: string, code: string = 'INVALID_INPUT') {
    super(message, code);
    this.field = field;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Storage errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The store is provisioned but failing. Transient failures are retried with
 * backoff before this surfaces.
 *
 * Common codes:
 * - `DB_CONNECTION_FAILED`: cannot open the database
 * - `DOCUMENT_QUERY_FAILED`, `GRAPH_QUERY_FAILED`, `IMAGE_QUERY_FAILED`,
 *   `MEMORY_QUERY_FAILED`: query execution failed
 */
export class StoreUnavailableError extends GraphRagError {
  constructor(message: string, code: string = 'STORE_UNAVAILABLE', cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Embedding errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The embedding endpoint answered, but not with a usable vector.
 *
 * Common codes:
 * - `EMBED_FAILED`: request failed
 * - `DIMENSION_MISMATCH`: vector length differs from the model's
 * - `DEGENERATE_EMBEDDING`: vector magnitude is effectively zero
 */
export class EmbeddingError extends GraphRagError {
  constructor(message: string, code: string = 'EMBED_FAILED', cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Common codes:
 * - `CONFIG_PARSE_FAILED`: file is not valid JSON
 * - `CONFIG_INVALID`: validation failed
 */
export class ConfigError extends GraphRagError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Ingestion errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Common codes:
 * - `RESOURCE_INVALID`: input is not a usable DocumentReference
 * - `PAYLOAD_DECODE_FAILED`: attachment data is neither hex nor base64
 * - `FILE_READ_FAILED`: input file could not be read
 */
export class IngestionError extends GraphRagError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof GraphRagError && error.code === code;
}

export function isCapabilityUnavailable(error: unknown): error is CapabilityUnavailableError {
  return error instanceof CapabilityUnavailableError;
}

export function isInvalidInput(error: unknown): error is InvalidInputError {
  return error instanceof InvalidInputError;
}

export function isStoreUnavailable(error: unknown): error is StoreUnavailableError {
  return error instanceof StoreUnavailableError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error in a GraphRagError.
 *
 * GraphRagErrors pass through unchanged; anything else gets code UNKNOWN.
 */
export function wrapError(error: unknown, message?: string): GraphRagError {
  if (error instanceof GraphRagError) {
    return error;
  }

  return new GraphRagError(message ?? errorMessage(error), 'UNKNOWN', error);
}

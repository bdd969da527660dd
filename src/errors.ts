/**
 * Collection Errors
 * Typed failures raised by the collection, retrieval and RAG layers.
 */

export type CollectionsErrorCode =
  | 'UNKNOWN_COLLECTION'
  | 'STORE_UNAVAILABLE'
  | 'RETRIEVAL_FAILED'
  | 'MISSING_CREDENTIAL'
  | 'INVALID_CONFIGURATION'
  | 'GENERATION_FAILED';

/**
 * Base class for every error the core raises on purpose.
 * `operation` names the call that failed so transports can report it.
 */
export abstract class CollectionsError extends Error {
  abstract readonly code: CollectionsErrorCode;

  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      operation: this.operation,
      message: this.message,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

export class UnknownCollectionError extends CollectionsError {
  readonly code = 'UNKNOWN_COLLECTION' as const;

  constructor(
    public readonly collectionName: string,
    public readonly knownNames: string[] = []
  ) {
    const known = knownNames.length > 0 ? ` Known collections: ${knownNames.join(', ')}` : '';
    super(`resolve: collection "${collectionName}" is not registered.${known}`, 'resolve');
  }
}

export class StoreUnavailableError extends CollectionsError {
  readonly code = 'STORE_UNAVAILABLE' as const;

  constructor(
    public readonly rootPath: string,
    reason: string,
    cause?: unknown
  ) {
    super(`open: vector store at "${rootPath}" is unavailable (${reason})`, 'open', cause);
  }
}

export class RetrievalFailedError extends CollectionsError {
  readonly code = 'RETRIEVAL_FAILED' as const;

  constructor(
    public readonly collectionName: string,
    cause?: unknown
  ) {
    super(
      `similaritySearch: search on collection "${collectionName}" failed: ${describeCause(cause)}`,
      'similaritySearch',
      cause
    );
  }
}

export class MissingCredentialError extends CollectionsError {
  readonly code = 'MISSING_CREDENTIAL' as const;

  constructor(
    public readonly credential: string,
    operation: string = 'build',
    purpose: string = 'the RAG chain needs it to call the language model'
  ) {
    super(`${operation}: ${credential} is not set; ${purpose}`, operation);
  }
}

export class InvalidConfigurationError extends CollectionsError {
  readonly code = 'INVALID_CONFIGURATION' as const;

  constructor(
    public readonly field: string,
    reason: string,
    operation: string = 'configure',
    cause?: unknown
  ) {
    super(`${operation}: invalid ${field}: ${reason}`, operation, cause);
  }
}

export class GenerationFailedError extends CollectionsError {
  readonly code = 'GENERATION_FAILED' as const;

  constructor(
    public readonly model: string,
    cause?: unknown
  ) {
    super(`ask: model "${model}" failed to answer: ${describeCause(cause)}`, 'ask', cause);
  }
}

/**
 * Type guard to check if error is a CollectionsError
 */
export function isCollectionsError(error: unknown): error is CollectionsError {
  return error instanceof CollectionsError;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}

export type RadarErrorCode =
  | 'MODEL_UNAVAILABLE'
  | 'CONFIGURATION_EMPTY'
  | 'CONFIGURATION_INVALID'
  | 'STORE_UNAVAILABLE'
  | 'DIMENSION_MISMATCH'
  | 'EMPTY_INPUT'
  | 'INVALID_TRANSITION';

export abstract class RadarError extends Error {
  abstract readonly code: RadarErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Embedding or LLM backend unreachable, rate limited or returning malformed output. */
export class ModelUnavailableError extends RadarError {
  readonly code = 'MODEL_UNAVAILABLE';

  constructor(
    message: string,
    readonly attempts: number,
  ) {
    super(message);
  }
}

/** No technologies configured: there is nothing to filter against. */
export class ConfigurationEmptyError extends RadarError {
  readonly code = 'CONFIGURATION_EMPTY';
}

export class ConfigurationError extends RadarError {
  readonly code = 'CONFIGURATION_INVALID';
}

export class KnowledgeStoreUnavailableError extends RadarError {
  readonly code = 'STORE_UNAVAILABLE';
}

export class EmbeddingDimensionError extends RadarError {
  readonly code = 'DIMENSION_MISMATCH';

  constructor(
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`embedding has ${actual} dimensions, store expects ${expected}`);
  }
}

export class EmptyInputError extends RadarError {
  readonly code = 'EMPTY_INPUT';
}

export class InvalidTransitionError extends RadarError {
  readonly code = 'INVALID_TRANSITION';
}

/** Failures that abort a whole run rather than a single article. */
export function isRunFatal(error: unknown): boolean {
  return (
    error instanceof ConfigurationEmptyError ||
    error instanceof ConfigurationError ||
    error instanceof KnowledgeStoreUnavailableError
  );
}

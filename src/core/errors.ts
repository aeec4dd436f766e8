// ============================================================================
// Error Types - stable codes and HTTP status for every failure the engine
// and its collaborators surface
// ============================================================================

export abstract class PostureError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;
  readonly recoverable: boolean;

  constructor(message: string, recoverable: boolean) {
    super(message);
    this.name = new.target.name;
    this.recoverable = recoverable;
  }
}

/** Required endpoint configuration is absent; no partial result is produced. */
export class MissingDataError extends PostureError {
  readonly code = 'MISSING_DATA';
  readonly status = 404;

  constructor(message: string) {
    super(message, false);
  }
}

/** Caller input rejected before any data acquisition. */
export class ValidationError extends PostureError {
  readonly code = 'VALIDATION_FAILED';
  readonly status = 400;

  constructor(message: string) {
    super(message, false);
  }
}

/** Startup misconfiguration (weights, settings). Fatal. */
export class ConfigurationError extends PostureError {
  readonly code = 'CONFIGURATION_INVALID';
  readonly status = 500;

  constructor(message: string) {
    super(message, false);
  }
}

export class KeywordSetLoadError extends PostureError {
  readonly code = 'KEYWORD_SET_UNAVAILABLE';
  readonly status = 503;

  constructor(message: string, readonly source: string) {
    super(message, true);
  }
}

/** A config/log store query failed after retries. */
export class SourceError extends PostureError {
  readonly code = 'SOURCE_UNAVAILABLE';
  readonly status = 502;

  constructor(message: string, readonly operation: string) {
    super(message, true);
  }
}

export function isPostureError(error: unknown): error is PostureError {
  return error instanceof PostureError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error taxonomy for the core.
 *
 * Infrastructure faults are thrown as AskDbError subclasses. Query faults
 * (a reply with no SQL, a statement the engine rejects) are plain values
 * that drive the repair loop instead.
 */

export type AskDbErrorCode =
  | 'DB_OPEN_FAILED'
  | 'SCHEMA_UNAVAILABLE'
  | 'GENERATION_UNAVAILABLE'
  | 'GENERATION_EMPTY'
  | 'INVALID_CONFIG';

export class AskDbError extends Error {
  readonly code: AskDbErrorCode;
  readonly details?: unknown;

  constructor(code: AskDbErrorCode, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** The database file could not be opened read-only. */
export class DatabaseOpenError extends AskDbError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DB_OPEN_FAILED', message, undefined, options);
  }
}

/** Introspection failed or found nothing to describe. Fatal to the session. */
export class SchemaUnavailableError extends AskDbError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SCHEMA_UNAVAILABLE', message, undefined, options);
  }
}

export type GenerationFailureReason = 'auth' | 'quota' | 'network' | 'provider';

export class GenerationUnavailableError extends AskDbError {
  readonly reason: GenerationFailureReason;
  readonly status?: number;

  constructor(
    reason: GenerationFailureReason,
    message: string,
    opts: { status?: number; cause?: unknown } = {},
  ) {
    super('GENERATION_UNAVAILABLE', message, { reason, status: opts.status }, { cause: opts.cause });
    this.reason = reason;
    this.status = opts.status;
  }
}

export class GenerationEmptyError extends AskDbError {
  constructor(message = 'The model returned an empty response.') {
    super('GENERATION_EMPTY', message);
  }
}

export class ConfigError extends AskDbError {
  constructor(message: string, details?: unknown) {
    super('INVALID_CONFIG', message, details);
  }
}

export type GenerationError = GenerationUnavailableError | GenerationEmptyError;

export function isGenerationError(error: unknown): error is GenerationError {
  return error instanceof GenerationUnavailableError || error instanceof GenerationEmptyError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

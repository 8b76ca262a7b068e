import {
  AskDbError,
  ConfigError,
  DatabaseOpenError,
  SchemaUnavailableError,
  isGenerationError,
} from '@askdb/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_EXHAUSTED = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'INVALID_CONFIG'
  | 'DB_OPEN_FAILED'
  | 'SCHEMA_UNAVAILABLE'
  | 'GENERATION_FAILED'
  | 'REVISIONS_EXHAUSTED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'query';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'INTERNAL_ERROR', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function exhaustedError(message: string, details?: unknown): CliError {
  return new CliError('query', 'REVISIONS_EXHAUSTED', message, details);
}

/**
 * Wrap a core error in the CLI taxonomy. Anything else passes through.
 */
export function fromCoreError(error: unknown): unknown {
  if (!(error instanceof AskDbError)) return error;
  const coreError: AskDbError = error;
  if (error instanceof ConfigError) {
    return usageError(error.message, 'INVALID_CONFIG', error.details);
  }
  if (error instanceof DatabaseOpenError) {
    return runtimeError(error.message, 'DB_OPEN_FAILED');
  }
  if (error instanceof SchemaUnavailableError) {
    return runtimeError(error.message, 'SCHEMA_UNAVAILABLE');
  }
  if (isGenerationError(error)) {
    return runtimeError(error.message, 'GENERATION_FAILED', error.details ?? { code: error.code });
  }
  return runtimeError(coreError.message, 'INTERNAL_ERROR', { code: coreError.code });
}

export function toExitCode(error: unknown): number {
  const mapped = fromCoreError(error);
  if (mapped instanceof CliError) {
    if (mapped.kind === 'usage') return EXIT_CODE_USAGE;
    if (mapped.kind === 'query') return EXIT_CODE_EXHAUSTED;
    return EXIT_CODE_RUNTIME;
  }
  return EXIT_CODE_RUNTIME;
}

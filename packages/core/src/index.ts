/**
 * @askdb/core barrel export
 *
 * Schema summary, prompts, SQL extraction, the repair loop and the
 * read-only SQLite execution it drives.
 */

// Database types
export type {
  SchemaSnapshot,
  TableInfo,
  ColumnInfo,
  ForeignKeyInfo,
  ResultSet,
  ExecutionOutcome,
  ExecuteLimits,
} from './db/types.js';

// Session defaults
export { SAFE_DEFAULTS } from './db/defaults.js';

// SQLite adapter + execution
export { openReadOnly, introspectSchema } from './db/adapters/sqlite.js';
export type { SqliteHandle } from './db/adapters/sqlite.js';
export { executeCandidate, createExecutor } from './db/execute.js';
export type { QueryExecutor } from './db/execute.js';

// LLM module
export * from './llm/index.js';

// Repair loop
export { runIntent, validateMaxRevisions } from './repair-loop.js';
export type {
  RunIntentOptions,
  LoopResult,
  LoopState,
  LoopEvent,
  Attempt,
  AttemptOutcome,
  AbortReason,
  ConfirmCallback,
  ConfirmDecision,
  ConfirmRequest,
} from './repair-loop.js';

// Session
export { QuerySession } from './session.js';
export type { SessionOpts, AskOptions } from './session.js';

// Settings
export { resolveSettings, DEFAULT_MODEL_CONFIG } from './config.js';
export type { AskDbSettings, SettingsOverrides } from './config.js';

// Errors
export {
  AskDbError,
  DatabaseOpenError,
  SchemaUnavailableError,
  GenerationUnavailableError,
  GenerationEmptyError,
  ConfigError,
  isGenerationError,
  errorMessage,
} from './errors.js';
export type { AskDbErrorCode, GenerationError, GenerationFailureReason } from './errors.js';

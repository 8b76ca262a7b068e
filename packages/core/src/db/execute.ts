/**
 * Execution adapter used by the repair loop.
 * A thin pass-through to the SQLite adapter over the session's read-only handle.
 */

import * as sqlite from './adapters/sqlite.js';
import type { SqliteHandle } from './adapters/sqlite.js';
import type { ExecuteLimits, ExecutionOutcome } from './types.js';

export type QueryExecutor = (sql: string) => Promise<ExecutionOutcome>;

export async function executeCandidate(
  handle: SqliteHandle,
  sql: string,
  limits: ExecuteLimits = {},
): Promise<ExecutionOutcome> {
  return sqlite.execute(handle, sql, limits);
}

export function createExecutor(handle: SqliteHandle, limits: ExecuteLimits = {}): QueryExecutor {
  return (sql) => executeCandidate(handle, sql, limits);
}

/**
 * SQLite adapter.
 * The file is opened once per session with a read-only handle; that handle,
 * not any inspection of query text, is what keeps candidate SQL from writing.
 */

import Database from 'better-sqlite3';
import { SAFE_DEFAULTS } from '../defaults.js';
import { DatabaseOpenError, SchemaUnavailableError, errorMessage } from '../../errors.js';
import type { ExecuteLimits, ExecutionOutcome, SchemaSnapshot, TableInfo } from '../types.js';

export type SqliteHandle = Database.Database;

export function openReadOnly(path: string): SqliteHandle {
  if (!path?.trim()) {
    throw new DatabaseOpenError('SQLite database path is required.');
  }
  try {
    return new Database(path, { readonly: true, fileMustExist: true });
  } catch (err: unknown) {
    throw new DatabaseOpenError(`Cannot open "${path}" read-only: ${errorMessage(err)}`, { cause: err });
  }
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRow(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

function readRecords(db: SqliteHandle, sql: string): Record<string, unknown>[] {
  return db.prepare(sql).all().filter(isRecord);
}

function readTable(db: SqliteHandle, name: string, ddl: string | null): TableInfo {
  const columns = readRecords(db, `PRAGMA table_info(${quoteIdent(name)})`).map((column) => {
    const isPrimaryKey = Number(column.pk ?? 0) > 0;
    return {
      name: String(column.name),
      dataType: typeof column.type === 'string' ? column.type : '',
      // primary key columns are reported NOT NULL
      nullable: Number(column.notnull ?? 0) === 0 && !isPrimaryKey,
      isPrimaryKey,
    };
  });

  const foreignKeys = readRecords(db, `PRAGMA foreign_key_list(${quoteIdent(name)})`)
    .sort((a, b) => Number(a.id) - Number(b.id) || Number(a.seq) - Number(b.seq))
    .map((fk) => ({
      fromColumn: String(fk.from),
      toTable: String(fk.table),
      toColumn: typeof fk.to === 'string' ? fk.to : null,
    }));

  return { name, columns, foreignKeys, ddl: ddl ?? undefined };
}

/**
 * Snapshot tables, columns and foreign keys. Reads catalog data only.
 */
export async function introspectSchema(db: SqliteHandle): Promise<SchemaSnapshot> {
  let tables: TableInfo[];
  try {
    tables = readRecords(
      db,
      `
        SELECT name, sql
        FROM sqlite_master
        WHERE type = 'table'
          AND name NOT LIKE 'sqlite_%'
        ORDER BY name
      `,
    ).map((row) => readTable(db, String(row.name), typeof row.sql === 'string' ? row.sql : null));
  } catch (err: unknown) {
    throw new SchemaUnavailableError(`Cannot read database schema: ${errorMessage(err)}`, { cause: err });
  }

  if (tables.length === 0) {
    throw new SchemaUnavailableError('The database has no tables.');
  }

  return { tables, capturedAt: new Date() };
}

/**
 * Run one statement. Engine errors come back verbatim as a failed outcome;
 * zero rows is a success.
 */
export async function execute(
  db: SqliteHandle,
  sql: string,
  limits: ExecuteLimits = {},
): Promise<ExecutionOutcome> {
  if (!db.open) {
    throw new DatabaseOpenError('The database handle is closed.');
  }
  const maxRows = limits.maxRows ?? SAFE_DEFAULTS.maxRows;
  const start = performance.now();
  try {
    const stmt = db.prepare(sql);
    if (!stmt.reader) {
      stmt.run();
      return {
        ok: true,
        result: { columns: [], rows: [], rowCount: 0, truncated: false, execMs: Math.round(performance.now() - start) },
      };
    }

    const columns = stmt.columns().map((column) => column.name);
    const rows: unknown[][] = [];
    let rowCount = 0;
    for (const row of stmt.raw(true).iterate()) {
      rowCount++;
      if (rows.length < maxRows && isRow(row)) {
        rows.push(row);
      }
    }
    return {
      ok: true,
      result: {
        columns,
        rows,
        rowCount,
        truncated: rowCount > rows.length,
        execMs: Math.round(performance.now() - start),
      },
    };
  } catch (err: unknown) {
    return { ok: false, errorMessage: errorMessage(err) };
  }
}

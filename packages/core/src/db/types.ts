/**
 * Database types for askdb.
 * Only structure is modelled here; row data never enters a SchemaSnapshot.
 */

export interface SchemaSnapshot {
  tables: TableInfo[];
  capturedAt: Date;
}

export interface TableInfo {
  name: string;
  columns: ColumnInfo[];
  foreignKeys: ForeignKeyInfo[];
  /** The CREATE TABLE statement as stored by the engine */
  ddl?: string;
}

export interface ColumnInfo {
  name: string;
  /** Declared type, empty when the column was declared without one */
  dataType: string;
  nullable: boolean;
  isPrimaryKey: boolean;
}

export interface ForeignKeyInfo {
  fromColumn: string;
  toTable: string;
  /** Null when the reference names the parent's primary key implicitly */
  toColumn: string | null;
}

export interface ResultSet {
  columns: string[];
  /** Positional rows, one value per entry of `columns` */
  rows: unknown[][];
  /** Rows produced by the statement, before truncation */
  rowCount: number;
  truncated: boolean;
  execMs: number;
}

export type ExecutionOutcome =
  | { ok: true; result: ResultSet }
  | { ok: false; errorMessage: string };

export interface ExecuteLimits {
  /** Hard cap on returned rows regardless of the query's own LIMIT */
  maxRows?: number;
}

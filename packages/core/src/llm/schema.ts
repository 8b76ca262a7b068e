/**
 * Schema summary for LLM prompts.
 * Renders every table of a snapshot as compact, deterministic text.
 * Built from catalog metadata only, so no row values can appear in it.
 */

import { SchemaUnavailableError } from '../errors.js';
import type { SchemaSnapshot, TableInfo } from '../db/types.js';

export type SchemaStyle = 'compact' | 'ddl';

export interface SchemaDescription {
  readonly text: string;
  readonly style: SchemaStyle;
  readonly tableCount: number;
}

export interface SummarizeOpts {
  /** compact: one line per column (default). ddl: the stored CREATE TABLE text */
  style?: SchemaStyle;
}

function compactBlock(table: TableInfo): string {
  const lines: string[] = [`TABLE ${table.name}`];

  for (const col of table.columns) {
    const type = col.dataType.trim() || 'ANY';
    const nullable = col.nullable ? ' NULL' : ' NOT NULL';
    const pk = col.isPrimaryKey ? ' PK' : '';
    lines.push(`  ${col.name} ${type}${nullable}${pk}`);
  }

  for (const fk of table.foreignKeys) {
    const target = fk.toColumn ? `${fk.toTable}(${fk.toColumn})` : fk.toTable;
    lines.push(`  FK ${fk.fromColumn} -> ${target}`);
  }

  return lines.join('\n');
}

function ddlBlock(table: TableInfo): string {
  if (!table.ddl?.trim()) return compactBlock(table);
  return table.ddl
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

/**
 * Build the schema description sent with every prompt of a session.
 */
export function summarizeSchema(snapshot: SchemaSnapshot, opts: SummarizeOpts = {}): SchemaDescription {
  const style = opts.style ?? 'compact';
  if (snapshot.tables.length === 0) {
    throw new SchemaUnavailableError('The database has no tables.');
  }

  const tables = [...snapshot.tables].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const render = style === 'ddl' ? ddlBlock : compactBlock;

  return Object.freeze({
    text: tables.map(render).join('\n\n'),
    style,
    tableCount: tables.length,
  });
}

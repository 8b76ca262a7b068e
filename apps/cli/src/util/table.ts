/**
 * Minimal table formatter for CLI output.
 * Rows are positional, so duplicate column names keep their own cells.
 */

const MAX_WIDTH = 60;

export function formatTable(columns: string[], rows: unknown[][]): string {
  if (columns.length === 0) return '(no columns)';
  const cells = rows.map((row) => columns.map((_, i) => formatValue(row[i])));

  // Calculate column widths
  const widths = columns.map((col) => Math.min(col.length, MAX_WIDTH));
  for (const row of cells) {
    row.forEach((val, i) => {
      widths[i] = Math.min(Math.max(widths[i], val.length), MAX_WIDTH);
    });
  }

  const fit = (val: string, width: number): string =>
    val.length > width ? val.slice(0, width - 1) + '…' : val.padEnd(width);

  const lines: string[] = [];
  lines.push(columns.map((col, i) => fit(col, widths[i])).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));
  for (const row of cells) {
    lines.push(row.map((val, i) => fit(val, widths[i])).join(' | '));
  }
  if (rows.length === 0) lines.push('(0 rows)');

  return lines.map((line) => line.trimEnd()).join('\n');
}

export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (Buffer.isBuffer(val)) return `<blob ${val.length} bytes>`;
  if (typeof val === 'bigint') return val.toString();
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val).replace(/\r?\n/g, ' ');
}

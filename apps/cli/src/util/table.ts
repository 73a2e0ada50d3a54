/**
 * Minimal table formatter for CLI output.
 * Prints a simple ASCII table with column headers and rows.
 */

const MAX_WIDTH = 60;

export function formatTable(columns: readonly string[], rows: readonly (readonly unknown[])[]): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const cells = rows.map((row) => columns.map((_, i) => formatValue(row[i])));

  // Calculate column widths
  const widths = columns.map((col) => Math.min(col.length, MAX_WIDTH));
  for (const row of cells) {
    row.forEach((val, i) => {
      widths[i] = Math.min(Math.max(widths[i], val.length), MAX_WIDTH);
    });
  }

  const lines: string[] = [];
  lines.push(columns.map((col, i) => fit(col, widths[i])).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));
  for (const row of cells) {
    lines.push(row.map((val, i) => fit(val, widths[i])).join(' | '));
  }

  return lines.join('\n');
}

function fit(val: string, width: number): string {
  return val.length > width ? val.slice(0, width - 1) + '…' : val.padEnd(width);
}

export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (val instanceof Uint8Array) return `<blob ${val.length} bytes>`;
  if (typeof val === 'number') return Number.isInteger(val) ? String(val) : String(Number(val.toFixed(4)));
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}

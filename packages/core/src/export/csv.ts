/**
 * CSV export of a query result. Fields are quoted only when they contain
 * a comma, quote or line break; null becomes an empty field.
 */

import type { QueryResult } from '../db/types.js';

function stringify(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Uint8Array) return Buffer.from(value).toString('hex');
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(result: QueryResult): string {
  const lines = [result.columns.map((c) => escapeCsvField(c.name)).join(',')];
  for (const row of result.rows) {
    lines.push(row.map((value) => escapeCsvField(stringify(value))).join(','));
  }
  return lines.join('\n') + '\n';
}

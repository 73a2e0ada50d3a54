/**
 * Renders the schema descriptor as the compact textual contract embedded
 * in every generation prompt.
 */

import type { ColumnSpec, SchemaDescriptor, TableSpec } from '../db/types.js';

export interface SchemaRenderOpts {
  /** Question used to rank tables when maxTables is set */
  question?: string;
  /** Keep only the N most relevant tables; default keeps all */
  maxTables?: number;
  maxColumnsPerTable?: number;
}

/**
 * Tokenize a string: lowercase, split on non-alphanumeric (keeping underscores).
 */
function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9_]+/)
    .filter((t) => t.length > 1);
}

/**
 * Score how well a name matches the question tokens.
 * Supports matching against underscore-separated parts too.
 */
function scoreMatch(name: string, tokens: string[]): number {
  const lower = name.toLowerCase();
  const parts = lower.split('_').filter((p) => p.length > 0);
  let score = 0;
  for (const token of tokens) {
    if (lower === token) {
      score += 10;
    } else if (parts.some((p) => p === token)) {
      score += 7;
    } else if (lower.includes(token) || token.includes(lower)) {
      score += 5;
    } else if (parts.some((p) => p.includes(token) || token.includes(p))) {
      score += 3;
    }
  }
  return score;
}

function scoreTable(table: TableSpec, tokens: string[]): number {
  const colBoost = table.columns
    .map((col) => scoreMatch(col.name, tokens))
    .sort((a, b) => b - a)
    .slice(0, 3)
    .reduce((sum, s) => sum + s, 0);
  return scoreMatch(table.name, tokens) + colBoost;
}

function selectTables(schema: SchemaDescriptor, opts: SchemaRenderOpts): readonly TableSpec[] {
  if (opts.maxTables === undefined || opts.maxTables >= schema.tables.length) {
    return schema.tables;
  }
  const tokens = tokenize(opts.question ?? '');
  return schema.tables
    .map((table, index) => ({ table, index, score: scoreTable(table, tokens) }))
    // stable: ties keep descriptor order
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, Math.max(opts.maxTables, 1))
    .sort((a, b) => a.index - b.index)
    .map((entry) => entry.table);
}

function renderColumn(col: ColumnSpec): string {
  const notNull = col.nullable === false ? ' NOT NULL' : '';
  const pk = col.isPrimaryKey ? ' PK' : '';
  return `  ${col.name} ${col.declaredType}${notNull}${pk}`;
}

export function renderSchema(schema: SchemaDescriptor, opts: SchemaRenderOpts = {}): string {
  const maxCols = opts.maxColumnsPerTable ?? Number.POSITIVE_INFINITY;
  const lines: string[] = ['-- Database schema'];

  for (const table of selectTables(schema, opts)) {
    lines.push('', `TABLE ${table.name}`);
    for (const col of table.columns.slice(0, maxCols)) {
      lines.push(renderColumn(col));
    }
  }

  return lines.join('\n');
}

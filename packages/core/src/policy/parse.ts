/**
 * AST parsing for the validator's confirmation step.
 * Uses node-sql-parser; the text rules stay the primary gate and this
 * layer only ever adds rejections.
 */

import pkg from 'node-sql-parser';
const { Parser } = pkg;

const parser = new Parser();

export interface TableRef {
  /** Statement type that touches the table (select, insert, ...) */
  access: string;
  table: string;
}

export interface ParseResult {
  /** Classified type of the first statement, lowercased */
  kind: string;
  statementCount: number;
  tables: TableRef[];
}

export type ParseOutcome = ({ ok: true } & ParseResult) | { ok: false; error: string };

function kindOf(stmt: unknown): string {
  if (typeof stmt === 'object' && stmt !== null && 'type' in stmt && typeof stmt.type === 'string') {
    return stmt.type.toLowerCase();
  }
  return 'unknown';
}

/** node-sql-parser reports tables as "<access>::<db>::<table>" */
function toTableRef(entry: string): TableRef {
  const [access = 'unknown', , table = ''] = entry.split('::');
  return { access: access.toLowerCase(), table };
}

/**
 * Parse a single SQL string. Trailing semicolons are dropped first.
 */
export function parseSql(sql: string, dialect = 'sqlite'): ParseOutcome {
  const normalizedSql = sql.trim().replace(/;+\s*$/, '');
  if (!normalizedSql) {
    return { ok: false, error: 'Empty SQL statement' };
  }

  try {
    const { ast, tableList } = parser.parse(normalizedSql, { database: dialect });
    const statements: unknown[] = Array.isArray(ast) ? ast : [ast];
    if (statements.length === 0) {
      return { ok: false, error: 'No statements found' };
    }
    return {
      ok: true,
      kind: kindOf(statements[0]),
      statementCount: statements.length,
      tables: tableList.map(toTableRef),
    };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `SQL parse error: ${msg}` };
  }
}

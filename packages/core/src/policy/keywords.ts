/**
 * Keyword tables used by statement extraction and the validator's
 * denylist scan. All entries are matched case-insensitively and only as
 * whole words.
 */

import type { DenyCategory } from './types.js';

/** Keywords that can open a SQL statement */
export const STATEMENT_KEYWORDS = [
  'SELECT',
  'WITH',
  'VALUES',
  'INSERT',
  'UPDATE',
  'DELETE',
  'REPLACE',
  'UPSERT',
  'MERGE',
  'DROP',
  'CREATE',
  'ALTER',
  'TRUNCATE',
  'RENAME',
  'GRANT',
  'REVOKE',
  'ATTACH',
  'DETACH',
  'PRAGMA',
  'VACUUM',
  'REINDEX',
  'ANALYZE',
  'BEGIN',
  'COMMIT',
  'ROLLBACK',
  'SAVEPOINT',
  'RELEASE',
  'EXPLAIN',
  'EXEC',
  'EXECUTE',
  'CALL',
  'COPY',
  'LOCK',
  'SET',
  'USE',
  'LOAD',
] as const;

/**
 * Keywords that mark the start of a statement inside free-form model
 * output. Narrower than STATEMENT_KEYWORDS so ordinary prose lines
 * ("Use the query below", "Set ...") are not mistaken for SQL.
 */
export const LEADING_KEYWORDS = [
  'SELECT',
  'WITH',
  'INSERT',
  'UPDATE',
  'DELETE',
  'REPLACE',
  'UPSERT',
  'MERGE',
  'DROP',
  'CREATE',
  'ALTER',
  'TRUNCATE',
  'GRANT',
  'REVOKE',
  'ATTACH',
  'DETACH',
  'PRAGMA',
  'VACUUM',
  'REINDEX',
] as const;

/** The single keyword an admissible statement may start with */
export const READ_ONLY_KEYWORD = 'SELECT';

export interface DenyEntry {
  keyword: string;
  category: DenyCategory;
}

function entries(category: DenyCategory, keywords: string[]): DenyEntry[] {
  return keywords.map((keyword) => ({ keyword, category }));
}

/**
 * Words that disqualify a statement wherever they appear, including
 * inside subqueries, comments and string literals. Order is the order in
 * which the scan reports the first hit.
 */
export const DENYLIST: readonly DenyEntry[] = [
  ...entries('dataModification', [
    'INSERT',
    'UPDATE',
    'DELETE',
    'UPSERT',
    'MERGE',
    'TRUNCATE',
    // SELECT ... INTO, INSERT INTO, REPLACE INTO, INTO OUTFILE
    'INTO',
  ]),
  ...entries('schemaChange', ['DROP', 'CREATE', 'ALTER', 'RENAME']),
  ...entries('privilege', ['GRANT', 'REVOKE']),
  ...entries('fileAccess', [
    'LOAD_EXTENSION',
    'READFILE',
    'WRITEFILE',
    'EDIT',
    'FTS3_TOKENIZER',
    'COPY',
    'LOAD',
    'PG_READ_FILE',
    'PG_READ_BINARY_FILE',
    'PG_WRITE_FILE',
    'PG_LS_DIR',
    'PG_STAT_FILE',
    'LO_IMPORT',
    'LO_EXPORT',
    'DBLINK',
  ]),
  ...entries('administrative', [
    'PRAGMA',
    'ATTACH',
    'DETACH',
    'VACUUM',
    'REINDEX',
    'ANALYZE',
    'RECURSIVE',
    'BEGIN',
    'COMMIT',
    'ROLLBACK',
    'SAVEPOINT',
    'RELEASE',
    'EXEC',
    'EXECUTE',
    'CALL',
    'LOCK',
    'SHUTDOWN',
    'PG_SLEEP',
    'PG_TERMINATE_BACKEND',
    'PG_CANCEL_BACKEND',
  ]),
];

/** Characters that may appear inside an identifier */
export const IDENT_CHAR = 'A-Za-z0-9_$';

export function wordPattern(keyword: string, flags = 'i'): RegExp {
  return new RegExp(`(?<![${IDENT_CHAR}])${keyword}(?![${IDENT_CHAR}])`, flags);
}

/** A statement separator immediately followed by another statement */
export const CHAINED_STATEMENT_RE = new RegExp(
  `;\\s*(${STATEMENT_KEYWORDS.join('|')})(?![${IDENT_CHAR}])`,
  'i',
);

/**
 * Text normalization for the validator. The model's output is untrusted
 * text, not a parsed tree, so every check runs on explicit views of it.
 */

const COMMENT_RE = /--[^\n]*|\/\*[\s\S]*?(?:\*\/|$)/g;
const LEADING_TRIVIA_RE = /^(?:\s+|--[^\n]*(?:\n|$)|\/\*[\s\S]*?(?:\*\/|$))*/;

export function collapseWhitespace(sql: string): string {
  return sql.replace(/\s+/g, ' ').trim();
}

/** Comments replaced by a space, whitespace collapsed */
export function normalizeSql(sql: string): string {
  return collapseWhitespace(sql.replace(COMMENT_RE, ' '));
}

/** Comments removed outright, so `DR/**\/OP` reads as `DROP` */
export function spliceComments(sql: string): string {
  return collapseWhitespace(sql.replace(COMMENT_RE, ''));
}

/**
 * The views the denylist is scanned over: normalized, spliced, and the
 * raw text (which still holds comment bodies).
 */
export function scanViews(sql: string): string[] {
  return [normalizeSql(sql), spliceComments(sql), collapseWhitespace(sql)];
}

/** Drop leading whitespace and comments */
export function stripLeadingTrivia(sql: string): string {
  return sql.replace(LEADING_TRIVIA_RE, '');
}

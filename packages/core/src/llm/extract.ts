/**
 * Deterministic extraction of a single SQL statement from free-form
 * model output.
 */

import { IDENT_CHAR, LEADING_KEYWORDS, STATEMENT_KEYWORDS } from '../policy/keywords.js';

const FENCE_RE = /```[A-Za-z]*[ \t]*\r?\n?([\s\S]*?)(?:```|$)/;

/** A line that opens a statement, optionally after a "SQL:" style label */
const STATEMENT_START_RE = new RegExp(
  `^[ \\t]*(?:(?:sql(?:[ \\t]+query)?|query)[ \\t]*:[ \\t]*)?((?:${LEADING_KEYWORDS.join('|')})(?![${IDENT_CHAR}]))`,
  'im',
);

const CONTINUES_WITH_STATEMENT_RE = new RegExp(
  `^\\s*(?:${STATEMENT_KEYWORDS.join('|')})(?![${IDENT_CHAR}])`,
  'i',
);

/** Index of the first `;` outside quoted strings and identifiers, or -1 */
function findTerminator(text: string): number {
  let quote: string | null = null;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote !== null) {
      // a doubled quote closes and reopens, which leaves the state unchanged
      if (ch === quote) quote = null;
    } else if (ch === "'" || ch === '"' || ch === '`') {
      quote = ch;
    } else if (ch === ';') {
      return i;
    }
  }
  return -1;
}

function searchArea(text: string): string {
  const fence = FENCE_RE.exec(text);
  return fence ? fence[1] : text;
}

/**
 * Locate the first statement that opens with a SQL keyword and end it at
 * its terminator or the end of the text.
 *
 * Text after the terminator is dropped unless it opens another statement;
 * chained statements are kept so the validator sees them.
 */
export function extractStatement(text: string): string | null {
  const area = searchArea(text);
  const start = STATEMENT_START_RE.exec(area);
  if (!start) return null;

  const from = start.index + start[0].length - start[1].length;
  const rest = area.slice(from);

  const terminator = findTerminator(rest);
  let statement = rest;
  if (terminator !== -1) {
    const tail = rest.slice(terminator + 1);
    statement = CONTINUES_WITH_STATEMENT_RE.test(tail) ? rest : rest.slice(0, terminator + 1);
  }

  const trimmed = statement.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Validation rules. Each rule inspects the candidate text and returns a
 * hit describing the rejection, or null to pass the candidate on.
 */

import {
  CHAINED_STATEMENT_RE,
  DENYLIST,
  IDENT_CHAR,
  READ_ONLY_KEYWORD,
  wordPattern,
  type DenyEntry,
} from './keywords.js';
import { normalizeSql, scanViews, stripLeadingTrivia } from './normalize.js';
import { parseSql } from './parse.js';
import type { DenyCategory, ReasonCode, ValidationPolicy } from './types.js';

export interface RuleHit {
  reasonCode: Exclude<ReasonCode, 'Admitted'>;
  matchedPattern: string | null;
  category: DenyCategory | null;
  message: string;
}

const DENY_PATTERNS: ReadonlyArray<DenyEntry & { re: RegExp }> = DENYLIST.map((entry) => ({
  ...entry,
  re: wordPattern(entry.keyword),
}));

const READ_ONLY_START_RE = new RegExp(`^${READ_ONLY_KEYWORD}(?![${IDENT_CHAR}])`, 'i');

function hit(
  reasonCode: RuleHit['reasonCode'],
  message: string,
  matchedPattern: string | null = null,
  category: DenyCategory | null = null,
): RuleHit {
  return { reasonCode, matchedPattern, category, message };
}

// Rule 1
export const NO_STATEMENT: RuleHit = hit(
  'NoStatementFound',
  'No SQL statement was found in the model output.',
);

export function hasStatement(sql: string | null): sql is string {
  return sql !== null && sql.trim() !== '';
}

// Rule 2
export function checkReadOnlyStart(sql: string): RuleHit | null {
  const body = stripLeadingTrivia(sql);
  if (READ_ONLY_START_RE.test(body)) return null;
  const firstWord = /^\S+/.exec(body)?.[0].toUpperCase() ?? null;
  return hit(
    'NotReadOnly',
    `Statement must start with ${READ_ONLY_KEYWORD}` + (firstWord ? ` (found "${firstWord}").` : '.'),
    firstWord,
  );
}

// Rule 3
export function checkDenylist(sql: string): RuleHit | null {
  const views = scanViews(sql);

  for (const entry of DENY_PATTERNS) {
    if (views.some((view) => entry.re.test(view))) {
      return hit(
        'DeniedKeyword',
        `Statement contains forbidden keyword ${entry.keyword} (${entry.category}).`,
        entry.keyword,
        entry.category,
      );
    }
  }

  for (const view of views) {
    const chained = CHAINED_STATEMENT_RE.exec(view);
    if (chained) {
      const pattern = `; ${chained[1].toUpperCase()}`;
      return hit(
        'DeniedKeyword',
        `Statement separator followed by a second statement ("${pattern}").`,
        pattern,
        'statementChaining',
      );
    }
  }

  return null;
}

// Rule 4
export function checkSingleStatement(sql: string): RuleHit | null {
  const normalized = normalizeSql(sql);
  const separators = normalized.split(';').length - 1;
  if (separators === 0) return null;

  const afterFirst = normalized.slice(normalized.indexOf(';') + 1).trim();
  if (separators > 1 || afterFirst !== '') {
    return hit('MultiStatement', 'Only a single statement is allowed.', ';');
  }
  return null;
}

// Rule 5
export function checkAst(
  sql: string,
  policy: ValidationPolicy,
): { hit: RuleHit | null; warnings: string[] } {
  const parsed = parseSql(normalizeSql(sql), policy.dialect);

  if (!parsed.ok) {
    if (policy.requireParse) {
      return {
        hit: hit('Unparseable', `Statement could not be parsed: ${parsed.error}`),
        warnings: [],
      };
    }
    return { hit: null, warnings: [`AST check skipped: ${parsed.error}`] };
  }

  if (parsed.statementCount > 1) {
    return {
      hit: hit(
        'MultiStatement',
        `Parser found ${parsed.statementCount} statements. Only a single statement is allowed.`,
      ),
      warnings: [],
    };
  }

  if (parsed.kind !== 'select') {
    const kind = parsed.kind.toUpperCase();
    return {
      hit: hit('NotReadOnly', `Parsed statement type is ${kind}, not SELECT.`, kind),
      warnings: [],
    };
  }

  const writeRef = parsed.tables.find((ref) => ref.access !== 'select');
  if (writeRef) {
    const pattern = `${writeRef.access.toUpperCase()} ${writeRef.table}`;
    return {
      hit: hit('NotReadOnly', `Statement writes to table "${writeRef.table}".`, pattern),
      warnings: [],
    };
  }

  const blocked = new Set(policy.blockedTables.map((t) => t.toLowerCase()));
  const blockedRef = parsed.tables.find((ref) => blocked.has(ref.table.toLowerCase()));
  if (blockedRef) {
    return {
      hit: hit('BlockedTable', `Table "${blockedRef.table}" is blocked by policy.`, blockedRef.table),
      warnings: [],
    };
  }

  return { hit: null, warnings: [] };
}

/**
 * Column type inference for query results.
 *
 * SQLite reports a declared type only for columns that come straight from
 * a table; expressions (SUM(...), strftime(...)) have none, so those are
 * typed from the values they return.
 */

import type { InferredType } from './types.js';

/** YYYY-MM, YYYY-MM-DD, optionally followed by a time and zone */
const ISO_DATE_RE =
  /^\d{4}-\d{2}(?:-\d{2}(?:[ T]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?)?$/;

export function looksLikeDate(value: string): boolean {
  return ISO_DATE_RE.test(value);
}

/**
 * Map a declared column type to an inferred type using SQLite's affinity
 * substrings. Returns null when the declaration says nothing useful.
 */
export function typeFromDeclared(declared: string | null | undefined): InferredType | null {
  if (!declared) return null;
  const t = declared.toUpperCase();
  if (t.includes('BOOL')) return 'boolean';
  if (t.includes('DATE') || t.includes('TIME')) return 'datetime';
  if (t.includes('INT')) return 'number';
  if (t.includes('CHAR') || t.includes('CLOB') || t.includes('TEXT')) return 'text';
  if (t.includes('BLOB')) return 'blob';
  if (
    t.includes('REAL') ||
    t.includes('FLOA') ||
    t.includes('DOUB') ||
    t.includes('NUM') ||
    t.includes('DEC')
  ) {
    return 'number';
  }
  return null;
}

function typeOfValue(value: unknown): InferredType | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'bigint') return 'number';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'string') return looksLikeDate(value) ? 'datetime' : 'text';
  if (value instanceof Uint8Array) return 'blob';
  return 'text';
}

export function typeFromValues(values: Iterable<unknown>): InferredType {
  let seen: InferredType | null = null;
  for (const value of values) {
    const t = typeOfValue(value);
    if (t === null) continue;
    if (seen === null) {
      seen = t;
    } else if (seen !== t) {
      // Mixed values (dates mixed with free text, numbers with strings) read as text
      return 'text';
    }
  }
  return seen ?? 'unknown';
}

export function inferColumnType(
  declared: string | null | undefined,
  values: Iterable<unknown>,
): InferredType {
  const fromDeclared = typeFromDeclared(declared);
  if (fromDeclared === 'text') {
    // Dates are usually stored as TEXT in SQLite
    return typeFromValues(values) === 'datetime' ? 'datetime' : 'text';
  }
  return fromDeclared ?? typeFromValues(values);
}

/**
 * Query validator — the deterministic safety gate between the generator
 * and the store.
 *
 * Rules run in a fixed order and the first hit wins:
 *   1. no statement            → NoStatementFound
 *   2. does not start SELECT   → NotReadOnly
 *   3. denylisted keyword      → DeniedKeyword
 *   4. more than one statement → MultiStatement
 *   5. AST confirmation        → MultiStatement | NotReadOnly | BlockedTable | Unparseable
 *
 * Pure: no I/O, no state between calls.
 */

import type { CandidateQuery } from '../llm/types.js';
import {
  checkAst,
  checkDenylist,
  checkReadOnlyStart,
  checkSingleStatement,
  hasStatement,
  NO_STATEMENT,
  type RuleHit,
} from './rules.js';
import { defaultValidationPolicy, type ValidationPolicy, type ValidationVerdict } from './types.js';

function reject(ruleHit: RuleHit): ValidationVerdict {
  return Object.freeze({
    admitted: false,
    reasonCode: ruleHit.reasonCode,
    matchedPattern: ruleHit.matchedPattern,
    category: ruleHit.category,
    message: ruleHit.message,
    warnings: Object.freeze([]),
  });
}

export function validate(
  candidate: Pick<CandidateQuery, 'extractedSql'>,
  policy: Partial<ValidationPolicy> = {},
): ValidationVerdict {
  const effective: ValidationPolicy = { ...defaultValidationPolicy(), ...policy };
  const sql = candidate.extractedSql;

  if (!hasStatement(sql)) return reject(NO_STATEMENT);

  const textHit = checkReadOnlyStart(sql) ?? checkDenylist(sql) ?? checkSingleStatement(sql);
  if (textHit) return reject(textHit);

  const warnings: string[] = [];
  if (effective.useAst) {
    const ast = checkAst(sql, effective);
    if (ast.hit) return reject(ast.hit);
    warnings.push(...ast.warnings);
  }

  return Object.freeze({
    admitted: true,
    reasonCode: 'Admitted',
    matchedPattern: null,
    category: null,
    message: 'Statement admitted.',
    warnings: Object.freeze(warnings),
  });
}

/** Convenience for validating raw SQL text outside the generator flow */
export function validateSql(sql: string, policy: Partial<ValidationPolicy> = {}): ValidationVerdict {
  return validate({ extractedSql: sql }, policy);
}

/**
 * Validator tests.
 * Covers rule order, the denylist views, statement counting and the AST step.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { validate, validateSql } from '../engine.js';
import { parseSql } from '../parse.js';
import { screenQuestion } from '../intent.js';

// ── Rule 1: no statement ────────────────────────────────────────────

describe('validate: missing statement', () => {
  it('rejects a null extraction', () => {
    const verdict = validate({ extractedSql: null });
    assert.equal(verdict.admitted, false);
    assert.equal(verdict.reasonCode, 'NoStatementFound');
    assert.equal(verdict.matchedPattern, null);
  });

  it('rejects blank text', () => {
    assert.equal(validateSql('   \n\t').reasonCode, 'NoStatementFound');
  });
});

// ── Rule 2: read-only start ─────────────────────────────────────────

describe('validate: read-only start', () => {
  it('rejects DROP TABLE at the start regardless of case and whitespace', () => {
    for (const sql of ['DROP TABLE customers', 'drop table customers', '  \n\tDrOp   TABLE customers']) {
      const verdict = validateSql(sql);
      assert.equal(verdict.admitted, false, sql);
      assert.equal(verdict.reasonCode, 'NotReadOnly', sql);
      assert.equal(verdict.matchedPattern, 'DROP', sql);
    }
  });

  it('rejects a write even when a SELECT appears later', () => {
    const verdict = validateSql('DELETE FROM loans WHERE loan_id IN (SELECT loan_id FROM loans)');
    assert.equal(verdict.reasonCode, 'NotReadOnly');
    assert.equal(verdict.message, 'Statement must start with SELECT (found "DELETE").');
  });

  it('rejects common table expressions', () => {
    const verdict = validateSql('WITH x AS (SELECT 1) SELECT * FROM x');
    assert.equal(verdict.reasonCode, 'NotReadOnly');
    assert.equal(verdict.matchedPattern, 'WITH');
  });

  it('skips leading comments before the first keyword', () => {
    const verdict = validateSql('-- monthly report\n/* v2 */ SELECT 1');
    assert.equal(verdict.admitted, true);
    assert.equal(verdict.reasonCode, 'Admitted');
  });

  it('accepts lowercase select', () => {
    assert.equal(validateSql('select 1').admitted, true);
  });
});

// ── Rule 3: denylist ────────────────────────────────────────────────

describe('validate: denylist', () => {
  it('rejects a chained DROP after a SELECT', () => {
    const verdict = validateSql('SELECT * FROM customers; dRoP table customers');
    assert.equal(verdict.reasonCode, 'DeniedKeyword');
    assert.equal(verdict.matchedPattern, 'DROP');
    assert.equal(verdict.category, 'schemaChange');
  });

  it('finds a keyword split by an inline comment', () => {
    const verdict = validateSql('SELECT * FROM customers /* x */; DR/**/OP TABLE customers');
    assert.equal(verdict.reasonCode, 'DeniedKeyword');
    assert.equal(verdict.matchedPattern, 'DROP');
  });

  it('finds a keyword hidden inside a comment', () => {
    const verdict = validateSql('SELECT name FROM customers -- DROP TABLE customers');
    assert.equal(verdict.reasonCode, 'DeniedKeyword');
    assert.equal(verdict.matchedPattern, 'DROP');
  });

  it('does not match keywords inside identifiers', () => {
    const verdict = validateSql('SELECT dropout_rate, created_at FROM students');
    assert.equal(verdict.admitted, true);
    assert.equal(verdict.reasonCode, 'Admitted');
    assert.deepEqual(verdict.warnings, []);
  });

  it('rejects a denylisted word inside a string literal', () => {
    const verdict = validateSql("SELECT * FROM notes WHERE body = 'please delete me'");
    assert.equal(verdict.reasonCode, 'DeniedKeyword');
    assert.equal(verdict.matchedPattern, 'DELETE');
    assert.equal(verdict.category, 'dataModification');
  });

  it('rejects SELECT INTO', () => {
    const verdict = validateSql('SELECT * INTO backup FROM customers');
    assert.equal(verdict.matchedPattern, 'INTO');
  });

  it('rejects PRAGMA inside a read', () => {
    const verdict = validateSql('SELECT * FROM pragma_table_info(customers) UNION SELECT 1; PRAGMA x');
    assert.equal(verdict.reasonCode, 'DeniedKeyword');
    assert.equal(verdict.matchedPattern, 'PRAGMA');
    assert.equal(verdict.category, 'administrative');
  });

  it('reports statement chaining for a second SELECT', () => {
    const verdict = validateSql('SELECT 1; SELECT 2');
    assert.equal(verdict.reasonCode, 'DeniedKeyword');
    assert.equal(verdict.matchedPattern, '; SELECT');
    assert.equal(verdict.category, 'statementChaining');
  });
});

// ── Rule 4: single statement ────────────────────────────────────────

describe('validate: statement count', () => {
  it('admits a single trailing semicolon', () => {
    assert.equal(validateSql('SELECT 1;').admitted, true);
  });

  it('rejects repeated separators', () => {
    const verdict = validateSql('SELECT 1;;');
    assert.equal(verdict.reasonCode, 'MultiStatement');
    assert.equal(verdict.matchedPattern, ';');
  });

  it('rejects text after the separator', () => {
    assert.equal(validateSql('SELECT 1; garbage').reasonCode, 'MultiStatement');
  });

  it('treats a semicolon inside a literal as a boundary', () => {
    assert.equal(validateSql("SELECT 'a;b' AS pair").reasonCode, 'MultiStatement');
  });
});

// ── Rule 5: AST confirmation ────────────────────────────────────────

describe('validate: AST step', () => {
  it('rejects a blocked table', () => {
    const verdict = validateSql('SELECT * FROM audit_log', { blockedTables: ['AUDIT_LOG'] });
    assert.equal(verdict.reasonCode, 'BlockedTable');
    assert.equal(verdict.matchedPattern, 'audit_log');
  });

  it('records a parse failure as a warning by default', () => {
    const verdict = validateSql('SELECT ((( FROM');
    assert.equal(verdict.admitted, true);
    assert.equal(verdict.warnings.length, 1);
    assert.match(verdict.warnings[0], /^AST check skipped: SQL parse error:/);
  });

  it('rejects an unparseable statement when parsing is required', () => {
    const verdict = validateSql('SELECT ((( FROM', { requireParse: true });
    assert.equal(verdict.reasonCode, 'Unparseable');
  });

  it('skips the parse when useAst is off', () => {
    const verdict = validateSql('SELECT ((( FROM', { useAst: false, requireParse: true });
    assert.equal(verdict.admitted, true);
    assert.deepEqual(verdict.warnings, []);
  });
});

// ── Properties ──────────────────────────────────────────────────────

describe('validate: determinism', () => {
  it('returns identical verdicts for identical input', () => {
    const inputs = ['SELECT 1', 'DROP TABLE x', 'SELECT 1; SELECT 2', 'SELECT * FROM t WHERE a = 1'];
    for (const sql of inputs) {
      assert.deepEqual(validateSql(sql), validateSql(sql));
    }
  });

  it('returns frozen verdicts', () => {
    const verdict = validateSql('SELECT 1');
    assert.ok(Object.isFrozen(verdict));
    assert.ok(Object.isFrozen(verdict.warnings));
  });
});

// ── parseSql ────────────────────────────────────────────────────────

describe('parseSql', () => {
  it('classifies a SELECT and lists its tables', () => {
    const result = parseSql('SELECT c.name FROM customers c JOIN loans l ON l.customer_id = c.customer_id');
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.equal(result.kind, 'select');
      assert.equal(result.statementCount, 1);
      assert.deepEqual(
        result.tables.map((t) => t.table).sort(),
        ['customers', 'loans'],
      );
    }
  });

  it('classifies DELETE as delete', () => {
    const result = parseSql('DELETE FROM loans WHERE loan_id = 1');
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.equal(result.kind, 'delete');
    }
  });

  it('reports an empty statement', () => {
    assert.deepEqual(parseSql(' ; '), { ok: false, error: 'Empty SQL statement' });
  });
});

// ── Intent screen ───────────────────────────────────────────────────

describe('screenQuestion', () => {
  it('returns the first modification verb', () => {
    assert.equal(screenQuestion('Delete all loan records'), 'delete');
    assert.equal(screenQuestion('please UPDATE my balance'), 'update');
  });

  it('ignores verbs embedded in other words', () => {
    assert.equal(screenQuestion('Show accounts created last month'), null);
    assert.equal(screenQuestion('What is the dropout rate?'), null);
  });
});

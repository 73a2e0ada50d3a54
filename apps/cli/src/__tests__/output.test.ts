import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { QueryResult } from '@querygate/core';
import {
  describeChart,
  describeGeneration,
  describeRows,
  formatColumns,
  formatSummary,
} from '../output.js';

function result(overrides: Partial<QueryResult> = {}): QueryResult {
  return {
    columns: [
      { name: 'account_type', inferredType: 'text' },
      { name: 'balance', inferredType: 'number' },
    ],
    rows: [
      ['checking', 100],
      ['savings', 300],
    ],
    rowCount: 2,
    truncated: false,
    execMs: 12,
    ...overrides,
  };
}

describe('describeChart', () => {
  it('names the axes of a bar chart', () => {
    const line = describeChart({
      kind: 'bar',
      xField: 'account_type',
      yFields: ['balance'],
      rationale: 'balance by account_type.',
    });
    assert.equal(line, 'Chart: bar x=account_type y=balance (balance by account_type.)');
  });

  it('omits axes for a table', () => {
    const line = describeChart({ kind: 'table', xField: null, yFields: [], rationale: 'Single value.' });
    assert.equal(line, 'Chart: table (Single value.)');
  });
});

describe('describeRows', () => {
  it('uses the singular for one row', () => {
    assert.equal(describeRows(result({ rowCount: 1, execMs: 3 })), '1 row in 3ms');
  });

  it('notes truncation', () => {
    assert.equal(describeRows(result({ truncated: true })), '2 rows in 12ms, truncated at 2');
  });
});

describe('describeGeneration', () => {
  it('mentions extra attempts only when there were some', () => {
    assert.equal(describeGeneration({ model: 'fake-model', attempts: 1 }), 'Generated SQL (model: fake-model):');
    assert.equal(
      describeGeneration({ model: 'fake-model', attempts: 2 }),
      'Generated SQL (model: fake-model, 2 attempts):',
    );
  });
});

describe('formatColumns', () => {
  it('lists nullability and primary keys', () => {
    const text = formatColumns({
      name: 'loans',
      columns: [
        { name: 'loan_id', declaredType: 'INTEGER', nullable: false, isPrimaryKey: true },
        { name: 'amount', declaredType: 'REAL' },
      ],
    });
    assert.deepEqual(text.split('\n'), [
      'column  | type    | nullable | pk ',
      '--------+---------+----------+----',
      'loan_id | INTEGER | no       | yes',
      'amount  | REAL    | yes      |    ',
    ]);
  });
});

describe('formatSummary', () => {
  it('summarizes number columns', () => {
    assert.deepEqual(formatSummary(result())?.split('\n'), [
      'column  | mean | median | min | max | sum',
      '--------+------+--------+-----+-----+----',
      'balance | 200  | 200    | 100 | 300 | 400',
    ]);
  });

  it('returns null for a single row', () => {
    assert.equal(formatSummary(result({ rows: [['checking', 100]], rowCount: 1 })), null);
  });

  it('returns null without number columns', () => {
    const text = result({
      columns: [{ name: 'account_type', inferredType: 'text' }],
      rows: [['checking'], ['savings']],
    });
    assert.equal(formatSummary(text), null);
  });
});

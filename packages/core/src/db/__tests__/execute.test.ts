import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import Database from 'better-sqlite3';
import {
  ExecutionTimeoutError,
  PipelineCancelledError,
  QueryExecutionError,
} from '../../errors.js';
import { SqliteStore } from '../execute.js';
import { inferColumnType, looksLikeDate } from '../infer.js';
import { createBankingDb, type FixtureDb } from './fixture-db.js';

const limits = { maxRows: 100, timeoutMs: 5_000 };

describe('SqliteStore.execute', () => {
  let fixture: FixtureDb;
  let store: SqliteStore;

  before(() => {
    fixture = createBankingDb();
    store = new SqliteStore(fixture.path);
  });

  after(() => fixture.cleanup());

  it('returns rows in column order with inferred types', async () => {
    const result = await store.execute(
      'SELECT name, created_at FROM customers ORDER BY customer_id',
      limits,
    );
    assert.deepEqual(result.columns, [
      { name: 'name', inferredType: 'text' },
      { name: 'created_at', inferredType: 'datetime' },
    ]);
    assert.deepEqual(result.rows, [
      ['Ada Park', '2023-01-15'],
      ['Ben Ortiz', '2023-03-02'],
      ['Cleo Hart', '2023-07-20'],
    ]);
    assert.equal(result.rowCount, 3);
    assert.equal(result.truncated, false);
    assert.ok(result.execMs >= 0);
  });

  it('types expressions and ISO text dates from their values', async () => {
    const result = await store.execute(
      'SELECT transaction_date, SUM(amount) AS total FROM transactions GROUP BY transaction_date ORDER BY transaction_date',
      limits,
    );
    assert.deepEqual(result.columns, [
      { name: 'transaction_date', inferredType: 'datetime' },
      { name: 'total', inferredType: 'number' },
    ]);
    assert.equal(result.rowCount, 5);
  });

  it('truncates at maxRows', async () => {
    const result = await store.execute('SELECT name FROM customers ORDER BY customer_id', {
      ...limits,
      maxRows: 2,
    });
    assert.deepEqual(result.rows, [['Ada Park'], ['Ben Ortiz']]);
    assert.equal(result.rowCount, 2);
    assert.equal(result.truncated, true);
  });

  it('does not flag truncation when the row count equals maxRows', async () => {
    const result = await store.execute('SELECT name FROM customers', { ...limits, maxRows: 3 });
    assert.equal(result.rowCount, 3);
    assert.equal(result.truncated, false);
  });

  it('reports zero rows without truncation', async () => {
    const result = await store.execute("SELECT name FROM customers WHERE city = 'Nowhere'", limits);
    assert.equal(result.rowCount, 0);
    assert.equal(result.truncated, false);
    assert.deepEqual(result.rows, []);
    assert.deepEqual(result.columns, [{ name: 'name', inferredType: 'text' }]);
  });

  it('freezes the result', async () => {
    const result = await store.execute('SELECT 1 AS one', limits);
    assert.ok(Object.isFrozen(result));
    assert.ok(Object.isFrozen(result.rows));
    assert.ok(Object.isFrozen(result.rows[0]));
  });

  it('passes engine errors through verbatim', async () => {
    await assert.rejects(store.execute('SELECT nope FROM customers', limits), (err: unknown) => {
      assert.ok(err instanceof QueryExecutionError);
      assert.equal(err.code, 'ExecutionError');
      assert.equal(err.message, 'no such column: nope');
      assert.ok(err.cause instanceof Error);
      return true;
    });
  });

  it('refuses statements that return no rows', async () => {
    await assert.rejects(
      store.execute('DELETE FROM loans', limits),
      (err: unknown) =>
        err instanceof QueryExecutionError &&
        err.message === 'Only statements that return rows can be executed.',
    );
  });

  it('fails writes at the engine level', async () => {
    await assert.rejects(
      store.execute('DELETE FROM loans RETURNING loan_id', limits),
      (err: unknown) => err instanceof QueryExecutionError && /readonly/i.test(err.message),
    );
    const db = new Database(fixture.path, { readonly: true });
    try {
      const row = db.prepare('SELECT COUNT(*) AS c FROM loans').get();
      assert.deepEqual(row, { c: 3 });
    } finally {
      db.close();
    }
  });

  it('stops a runaway query at the deadline', async () => {
    const sql = 'WITH RECURSIVE n(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM n) SELECT x FROM n';
    await assert.rejects(
      store.execute(sql, { maxRows: 10_000_000, timeoutMs: 50 }),
      (err: unknown) => err instanceof ExecutionTimeoutError && err.code === 'ExecutionTimeout',
    );
  });

  // One row, produced only after the engine has counted millions
  const slowCount =
    'WITH RECURSIVE n(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM n WHERE x < 8000000) SELECT COUNT(*) FROM n';

  it('times out a slow single-row aggregate at the deadline', async () => {
    const started = Date.now();
    await assert.rejects(
      store.execute(slowCount, { maxRows: 10, timeoutMs: 100 }),
      (err: unknown) => err instanceof ExecutionTimeoutError && err.timeoutMs === 100,
    );
    assert.ok(Date.now() - started < 1_000, `took ${Date.now() - started}ms`);
  });

  it('cancels a running statement when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(), 50);
    await assert.rejects(
      store.execute(slowCount, { maxRows: 10, timeoutMs: 30_000 }, controller.signal),
      PipelineCancelledError,
    );
    assert.ok(Date.now() - started < 1_000, `took ${Date.now() - started}ms`);
  });

  it('honours an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await assert.rejects(store.execute('SELECT 1', limits, controller.signal), PipelineCancelledError);
  });

  it('rejects invalid limits', async () => {
    await assert.rejects(store.execute('SELECT 1', { maxRows: 0, timeoutMs: 10 }), RangeError);
    await assert.rejects(store.execute('SELECT 1', { maxRows: 1, timeoutMs: 0 }), RangeError);
  });

  it('fails for a missing database file', async () => {
    const missing = new SqliteStore(`${fixture.path}.missing`);
    await assert.rejects(missing.execute('SELECT 1', limits), QueryExecutionError);
  });

  it('reports the engine version on a connection test', async () => {
    const status = await store.testConnection();
    assert.equal(status.ok, true);
    assert.match(status.serverVersion ?? '', /^3\.\d+/);
  });
});

describe('inferColumnType', () => {
  it('uses the declared affinity first', () => {
    assert.equal(inferColumnType('INTEGER', ['a']), 'number');
    assert.equal(inferColumnType('DATETIME', []), 'datetime');
    assert.equal(inferColumnType('BOOLEAN', [1, 0]), 'boolean');
    assert.equal(inferColumnType('DECIMAL(10,2)', []), 'number');
    assert.equal(inferColumnType('BLOB', []), 'blob');
  });

  it('promotes text columns holding only ISO dates', () => {
    assert.equal(inferColumnType('TEXT', ['2024-05', null, '2024-06-01 10:30:00']), 'datetime');
    assert.equal(inferColumnType('TEXT', ['2024-05', 'soon']), 'text');
  });

  it('falls back to the values when nothing is declared', () => {
    assert.equal(inferColumnType(null, [1, 2.5]), 'number');
    assert.equal(inferColumnType(null, [1, 'x']), 'text');
    assert.equal(inferColumnType(null, [null]), 'unknown');
  });

  it('recognises ISO dates only', () => {
    assert.equal(looksLikeDate('2024-05-03T08:00:00Z'), true);
    assert.equal(looksLikeDate('05/03/2024'), false);
  });
});

/**
 * SQLite adapter. Uses better-sqlite3 against a pre-provisioned file.
 *
 * Statements run on a worker thread so the deadline and cancellation
 * hold even while the engine is busy producing a single row.
 */

import { extname } from 'node:path';
import { performance } from 'node:perf_hooks';
import { fileURLToPath } from 'node:url';
import { Worker } from 'node:worker_threads';
import {
  ExecutionTimeoutError,
  PipelineCancelledError,
  QueryExecutionError,
  errorMessage,
} from '../../errors.js';
import { inferColumnType } from '../infer.js';
import type { ExecuteLimits, QueryResult, TableSpec } from '../types.js';
import { openDatabase, type SqliteConnectionConfig } from './sqlite-connection.js';
import type { StatementReply, StatementTask } from './sqlite-worker.js';

export type { SqliteConnectionConfig } from './sqlite-connection.js';

// .ts under tsx, .js once built
const WORKER_URL = new URL(`./sqlite-worker${extname(fileURLToPath(import.meta.url))}`, import.meta.url);

function assertLimits(limits: ExecuteLimits): void {
  if (!Number.isInteger(limits.maxRows) || limits.maxRows <= 0) {
    throw new RangeError(`maxRows must be a positive integer, got ${limits.maxRows}`);
  }
  if (!(limits.timeoutMs > 0)) {
    throw new RangeError(`timeoutMs must be positive, got ${limits.timeoutMs}`);
  }
}

export async function testConnection(
  cfg: SqliteConnectionConfig,
): Promise<{ ok: boolean; error?: string; serverVersion?: string }> {
  try {
    const db = openDatabase(cfg);
    try {
      const versionRow = db.prepare('SELECT sqlite_version() as version').get() as
        | { version?: string }
        | undefined;
      return { ok: true, serverVersion: versionRow?.version ?? 'sqlite' };
    } finally {
      db.close();
    }
  } catch (err: unknown) {
    return { ok: false, error: errorMessage(err) };
  }
}

function runOnWorker(task: StatementTask, timeoutMs: number, signal?: AbortSignal): Promise<StatementReply> {
  return new Promise((resolve, reject) => {
    const worker = new Worker(WORKER_URL, { workerData: task });
    let settled = false;

    const finish = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      fn();
    };
    // terminate() returns once the thread is gone; the caller does not wait for it
    const stop = (error: Error): void =>
      finish(() => {
        void worker.terminate();
        reject(error);
      });
    const onAbort = (): void => stop(new PipelineCancelledError('execution'));

    const timer = setTimeout(() => stop(new ExecutionTimeoutError(timeoutMs)), timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    worker.once('message', (reply: StatementReply) => finish(() => resolve(reply)));
    worker.once('error', (err: Error) =>
      finish(() => reject(new QueryExecutionError(err.message, { cause: err }))),
    );
    worker.once('exit', (code: number) =>
      finish(() => reject(new QueryExecutionError(`Query worker exited with code ${code}.`))),
    );
  });
}

/**
 * Run one statement and return at most `limits.maxRows` rows.
 *
 * The deadline covers the whole run. When it passes, or the signal aborts,
 * the worker is terminated and the call rejects at once.
 */
export async function execute(
  cfg: SqliteConnectionConfig,
  sql: string,
  limits: ExecuteLimits,
  signal?: AbortSignal,
): Promise<QueryResult> {
  assertLimits(limits);
  if (signal?.aborted) throw new PipelineCancelledError('execution');

  const start = performance.now();
  const reply = await runOnWorker(
    { database: cfg.database, sql, maxRows: limits.maxRows },
    limits.timeoutMs,
    signal,
  );
  if (!reply.ok) {
    throw new QueryExecutionError(reply.error.message, { cause: reply.error });
  }

  const execMs = Math.round(performance.now() - start);
  const { rows } = reply;
  const columns = reply.columns.map((def, index) =>
    Object.freeze({
      name: def.name,
      inferredType: inferColumnType(
        def.type,
        rows.map((row) => row[index]),
      ),
    }),
  );

  return Object.freeze({
    columns: Object.freeze(columns),
    rows: Object.freeze(rows.map((row) => Object.freeze(row))),
    rowCount: rows.length,
    truncated: reply.truncated,
    execMs,
  });
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

interface PragmaColumn {
  name: string;
  type: string;
  notnull: 0 | 1;
  pk: number;
}

export async function introspectTables(cfg: SqliteConnectionConfig): Promise<TableSpec[]> {
  const db = openDatabase(cfg);
  try {
    const tables = db
      .prepare(`
        SELECT name
        FROM sqlite_master
        WHERE type = 'table'
          AND name NOT LIKE 'sqlite_%'
        ORDER BY name
      `)
      .all() as Array<{ name: string }>;

    return tables.map((tableRow) => {
      const columns = db
        .prepare(`PRAGMA table_info(${quoteIdent(tableRow.name)})`)
        .all() as PragmaColumn[];

      const countRow = db
        .prepare(`SELECT COUNT(*) as c FROM ${quoteIdent(tableRow.name)}`)
        .get() as { c: number } | undefined;

      return {
        name: tableRow.name,
        rowCount: Number(countRow?.c ?? 0),
        columns: columns.map((column) => ({
          name: column.name,
          declaredType: column.type || 'TEXT',
          nullable: column.notnull === 0,
          isPrimaryKey: column.pk > 0,
        })),
      };
    });
  } finally {
    db.close();
  }
}

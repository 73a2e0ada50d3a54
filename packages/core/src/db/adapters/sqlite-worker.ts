/**
 * Worker thread entry: runs one statement and posts the rows back.
 * The parent terminates the thread on deadline or cancellation.
 */

import { parentPort, workerData } from 'node:worker_threads';
import { openDatabase } from './sqlite-connection.js';

export interface StatementTask {
  database: string;
  sql: string;
  maxRows: number;
}

export interface StatementColumn {
  name: string;
  type: string | null;
}

export type StatementReply =
  | { ok: true; columns: StatementColumn[]; rows: unknown[][]; truncated: boolean }
  | { ok: false; error: Error };

function isStatementTask(value: unknown): value is StatementTask {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'database' in value &&
    typeof value.database === 'string' &&
    'sql' in value &&
    typeof value.sql === 'string' &&
    'maxRows' in value &&
    typeof value.maxRows === 'number'
  );
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function runStatement(task: StatementTask): StatementReply {
  try {
    const db = openDatabase({ database: task.database });
    try {
      const stmt = db.prepare(task.sql);
      if (!stmt.reader) {
        return { ok: false, error: new Error('Only statements that return rows can be executed.') };
      }

      const columns = stmt.columns().map((def) => ({ name: def.name, type: def.type }));
      const rows: unknown[][] = [];
      let truncated = false;
      for (const row of stmt.raw(true).iterate()) {
        if (rows.length >= task.maxRows) {
          truncated = true;
          break;
        }
        rows.push(Array.isArray(row) ? row : [row]);
      }
      return { ok: true, columns, rows, truncated };
    } finally {
      db.close();
    }
  } catch (err: unknown) {
    return { ok: false, error: toError(err) };
  }
}

if (parentPort) {
  const reply: StatementReply = isStatementTask(workerData)
    ? runStatement(workerData)
    : { ok: false, error: new Error('Malformed statement task.') };
  parentPort.postMessage(reply);
}

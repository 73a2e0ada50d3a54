/**
 * The read-only store the pipeline executes admitted queries against.
 */

import * as sqlite from './adapters/sqlite.js';
import type { SchemaSource } from './schema.js';
import type { ExecuteLimits, QueryResult, TableSpec } from './types.js';

export type { SqliteConnectionConfig } from './adapters/sqlite.js';

/**
 * Store interface consumed by the pipeline. Implementations must open a
 * connection per call and must refuse writes at the engine level.
 */
export interface QueryStore {
  execute(sql: string, limits: ExecuteLimits, signal?: AbortSignal): Promise<QueryResult>;
}

export class SqliteStore implements QueryStore, SchemaSource {
  private readonly cfg: sqlite.SqliteConnectionConfig;

  constructor(databasePath: string) {
    this.cfg = { database: databasePath };
  }

  get path(): string {
    return this.cfg.database;
  }

  execute(sql: string, limits: ExecuteLimits, signal?: AbortSignal): Promise<QueryResult> {
    return sqlite.execute(this.cfg, sql, limits, signal);
  }

  introspect(): Promise<TableSpec[]> {
    return sqlite.introspectTables(this.cfg);
  }

  testConnection(): Promise<{ ok: boolean; error?: string; serverVersion?: string }> {
    return sqlite.testConnection(this.cfg);
  }
}

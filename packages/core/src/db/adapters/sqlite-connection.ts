import Database from 'better-sqlite3';

export interface SqliteConnectionConfig {
  database: string;
}

/**
 * Open the file read-only and switch the connection to query_only, so a
 * write that slips past the validator still fails inside the engine.
 */
export function openDatabase(cfg: SqliteConnectionConfig): Database.Database {
  if (!cfg.database?.trim()) {
    throw new Error('SQLite database path is required.');
  }
  const db = new Database(cfg.database, { readonly: true, fileMustExist: true });
  db.pragma('query_only = ON');
  return db;
}

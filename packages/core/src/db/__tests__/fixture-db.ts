import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';

export interface FixtureDb {
  path: string;
  cleanup(): void;
}

/**
 * A small banking database in a throwaway directory.
 * Deposits total 425.5; three customers, three loans.
 */
export function createBankingDb(): FixtureDb {
  const dir = mkdtempSync(join(tmpdir(), 'querygate-test-'));
  const path = join(dir, 'banking.db');
  const db = new Database(path);
  db.exec(`
    CREATE TABLE customers (
      customer_id INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      city TEXT,
      created_at DATE
    );
    CREATE TABLE accounts (
      account_id INTEGER PRIMARY KEY,
      customer_id INTEGER NOT NULL,
      account_type TEXT NOT NULL,
      balance REAL NOT NULL,
      opened_date TEXT
    );
    CREATE TABLE transactions (
      transaction_id INTEGER PRIMARY KEY,
      account_id INTEGER NOT NULL,
      transaction_type TEXT NOT NULL,
      amount REAL NOT NULL,
      transaction_date TEXT NOT NULL
    );
    CREATE TABLE loans (
      loan_id INTEGER PRIMARY KEY,
      customer_id INTEGER NOT NULL,
      loan_type TEXT NOT NULL,
      amount REAL NOT NULL
    );
    INSERT INTO customers VALUES
      (1, 'Ada Park', 'Springfield', '2023-01-15'),
      (2, 'Ben Ortiz', 'Riverton', '2023-03-02'),
      (3, 'Cleo Hart', NULL, '2023-07-20');
    INSERT INTO accounts VALUES
      (10, 1, 'checking', 1200.5, '2023-01-15'),
      (11, 1, 'savings', 5000, '2023-02-01'),
      (12, 2, 'checking', 300, '2023-03-02'),
      (13, 3, 'savings', 750.25, '2023-07-20');
    INSERT INTO transactions VALUES
      (100, 10, 'deposit', 100.5, '2024-05-03'),
      (101, 10, 'withdrawal', 40, '2024-05-10'),
      (102, 11, 'deposit', 250, '2024-05-21'),
      (103, 12, 'deposit', 75, '2024-06-01'),
      (104, 13, 'withdrawal', 20, '2024-06-11');
    INSERT INTO loans VALUES
      (1000, 1, 'mortgage', 250000),
      (1001, 2, 'auto', 18000),
      (1002, 2, 'personal', 5000);
  `);
  db.close();
  return { path, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

export function createEmptyDb(): FixtureDb {
  const dir = mkdtempSync(join(tmpdir(), 'querygate-test-'));
  const path = join(dir, 'empty.db');
  new Database(path).close();
  return { path, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

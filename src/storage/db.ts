import fs from "node:fs";
import path from "node:path";
import Sqlite from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema.js";
import { DatabaseUnavailableError } from "../errors.js";

export type DB = BetterSQLite3Database<typeof schema>;

export interface Database {
  db: DB;
  close(): void;
}

const statements = [
  `CREATE TABLE IF NOT EXISTS expenses (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    amount INTEGER NOT NULL,
    category TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    payment_mode TEXT NOT NULL,
    date TEXT NOT NULL,
    year INTEGER NOT NULL,
    month INTEGER NOT NULL,
    status TEXT NOT NULL DEFAULT 'active',
    created_at INTEGER NOT NULL
  )`,

  `CREATE TABLE IF NOT EXISTS shared_expenses (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    total_amount INTEGER NOT NULL,
    paid_by TEXT NOT NULL,
    participants TEXT NOT NULL,
    per_person_amount INTEGER NOT NULL,
    date TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'pending',
    settled_on TEXT,
    created_at INTEGER NOT NULL
  )`,

  `CREATE TABLE IF NOT EXISTS budgets (
    category TEXT PRIMARY KEY,
    monthly_limit INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  )`,

  `CREATE INDEX IF NOT EXISTS idx_expenses_year_month ON expenses(year, month)`,
  `CREATE INDEX IF NOT EXISTS idx_shared_expenses_status ON shared_expenses(status)`,
];

function connect(databasePath: string): Sqlite.Database {
  try {
    if (databasePath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
    }
    const sqlite = new Sqlite(databasePath);
    sqlite.pragma("journal_mode = WAL");
    sqlite.pragma("foreign_keys = ON");

    for (const stmt of statements) {
      sqlite.exec(stmt);
    }

    return sqlite;
  } catch (error) {
    throw new DatabaseUnavailableError(error);
  }
}

/**
 * Open (and create if needed) the database at `databasePath`.
 * `:memory:` gives a throwaway database, used by the tests.
 */
export function openDatabase(databasePath: string): Database {
  const sqlite = connect(databasePath);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}

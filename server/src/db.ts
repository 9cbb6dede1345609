import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { CATEGORIES } from '../../src/domain/types.js';

export type Db = Database.Database;

export interface OpenOptions {
  /** Milliseconds SQLite itself waits on a lock before reporting SQLITE_BUSY */
  busyTimeoutMs?: number;
}

const categoryCheck = CATEGORIES.map((c) => `'${c}'`).join(', ');

/**
 * Open (or create) the ledger database and bring its schema up to date.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(filename: string, options: OpenOptions = {}): Db {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }

  const db = new Database(filename, { timeout: options.busyTimeoutMs ?? 5000 });

  // WAL lets readers run alongside the single writer
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
  }
  db.pragma('foreign_keys = ON');

  migrate(db);
  console.log(`[db] Ledger ready at ${filename}`);
  return db;
}

function migrate(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS expenses (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      amount_cents INTEGER NOT NULL,
      currency TEXT NOT NULL DEFAULT 'USD',
      category TEXT NOT NULL CHECK (category IN (${categoryCheck})),
      note TEXT NOT NULL,
      occurred_at TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `);

  db.exec(`CREATE INDEX IF NOT EXISTS idx_expenses_occurred_at ON expenses(occurred_at)`);

  // name keeps the first-seen spelling; name_key enforces case-insensitive uniqueness
  db.exec(`
    CREATE TABLE IF NOT EXISTS tags (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      name_key TEXT NOT NULL UNIQUE
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS expense_tags (
      expense_id INTEGER NOT NULL,
      tag_id INTEGER NOT NULL,
      PRIMARY KEY (expense_id, tag_id),
      FOREIGN KEY (expense_id) REFERENCES expenses(id) ON DELETE CASCADE,
      FOREIGN KEY (tag_id) REFERENCES tags(id) ON DELETE CASCADE
    )
  `);

  // Settings table (single-row)
  db.exec(`
    CREATE TABLE IF NOT EXISTS settings (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      income_1_cents INTEGER NOT NULL DEFAULT 0,
      income_2_cents INTEGER NOT NULL DEFAULT 0,
      saving_goal_pct REAL NOT NULL DEFAULT 0
    )
  `);

  // --- Migrations: budget columns were added after the first release ---
  const settingsCols = db.pragma('table_info(settings)') as { name: string }[];
  const settingsColNames = new Set(settingsCols.map((c) => c.name));
  for (const column of [
    'budget_fun_cents',
    'budget_groceries_cents',
    'budget_travel_cents',
    'budget_home_cents',
    'budget_misc_cents',
  ]) {
    if (!settingsColNames.has(column)) {
      db.exec(`ALTER TABLE settings ADD COLUMN ${column} INTEGER NOT NULL DEFAULT 0`);
    }
  }

  // Ensure the single row exists
  db.exec(`INSERT OR IGNORE INTO settings (id) VALUES (1)`);
}

// Row shapes as SQLite returns them

export interface ExpenseRow {
  id: number;
  amount_cents: number;
  currency: string;
  category: string;
  note: string;
  occurred_at: string;
  created_at: string;
}

export interface SettingsRow {
  id: number;
  income_1_cents: number;
  income_2_cents: number;
  saving_goal_pct: number;
  budget_fun_cents: number;
  budget_groceries_cents: number;
  budget_travel_cents: number;
  budget_home_cents: number;
  budget_misc_cents: number;
}

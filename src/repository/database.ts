//this file manages the database schema and initialization for the pricing knowledge base

import Database from 'better-sqlite3';

//SQL SCHEMA DEFINITION
const SCHEMA = `
-- Price observations, keyed by the deterministic content id
CREATE TABLE IF NOT EXISTS observations (
  id TEXT PRIMARY KEY,
  source_identifier TEXT NOT NULL,
  item_identifier TEXT NOT NULL,
  item_key TEXT NOT NULL,
  raw_description TEXT NOT NULL,
  normalized_description TEXT NOT NULL,
  tokens TEXT NOT NULL,
  category TEXT NOT NULL,
  supplier_name TEXT,
  department_or_agency TEXT NOT NULL,
  unit_price REAL NOT NULL CHECK (unit_price > 0),
  quantity REAL NOT NULL CHECK (quantity >= 1),
  total_price REAL NOT NULL,
  award_date TEXT NOT NULL,
  source_kind TEXT NOT NULL,
  ingested_at TEXT NOT NULL,
  last_matched_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_observations_item_key ON observations(item_key);
CREATE INDEX IF NOT EXISTS idx_observations_category ON observations(category);
CREATE INDEX IF NOT EXISTS idx_observations_award_date ON observations(award_date);

-- Audit Trail Table
CREATE TABLE IF NOT EXISTS audit_trail (
  id TEXT PRIMARY KEY,
  subject_id TEXT NOT NULL,
  step TEXT NOT NULL,
  timestamp TEXT NOT NULL,
  details TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_audit_trail_subject_id ON audit_trail(subject_id);
`;

//initializing the database
//WAL: readers keep a consistent snapshot while a writer commits
//busy_timeout: writers from other processes wait for the lock instead of failing at once
export function initializeDatabase(dbPath: string = ':memory:'): Database.Database {
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.pragma('foreign_keys = ON');

  //db schema execution
  db.exec(SCHEMA);

  return db;
}

//closing the database connection
export function closeDatabase(db: Database.Database): void {
  db.close();
}

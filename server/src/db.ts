import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export type Db = Database.Database;

/**
 * Open (or create) the usage database. Pass ':memory:' for a throwaway one.
 */
export function openDatabase(dbPath: string): Db {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  // Enable WAL mode for better performance
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS api_usage (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp TEXT NOT NULL,
      project TEXT NOT NULL,
      model TEXT NOT NULL,
      input_tokens INTEGER NOT NULL,
      output_tokens INTEGER NOT NULL,
      cost_usd REAL NOT NULL
    )
  `);

  // Period queries all filter on timestamp
  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_api_usage_timestamp ON api_usage(timestamp)
  `);

  return db;
}

// Types
export interface UsageRecord {
  id: number;
  timestamp: string;       // YYYY-MM-DD HH:MM:SS, local time
  project: string;
  model: string;
  input_tokens: number;
  output_tokens: number;
  cost_usd: number;
}

export interface UsageInput {
  model: string;
  input_tokens: number;
  output_tokens: number;
  project?: string;
}

export interface ModelTotalRow {
  model: string;
  calls: number;
  input_tokens: number;
  output_tokens: number;
  cost_usd: number;
}

export interface ProjectTotalRow {
  project: string;
  cost_usd: number;
}

export interface DailyTotalRow {
  date: string;
  calls: number;
  cost_usd: number;
}

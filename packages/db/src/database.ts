import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

export type SqliteDatabase = Database.Database;

/**
 * Opens (creating if needed) the SQLite file at `dbPath` and brings the schema up to
 * date. Pass ":memory:" for a throwaway database.
 */
export function openDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== ":memory:") {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  migrate(db);
  return db;
}

function migrate(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS presentations (
      id              TEXT PRIMARY KEY,
      topic           TEXT NOT NULL,
      num_slides      INTEGER NOT NULL,
      slides          TEXT NOT NULL DEFAULT '[]',
      custom_content  TEXT,
      theme           TEXT NOT NULL DEFAULT 'modern',
      font            TEXT NOT NULL,
      colors          TEXT NOT NULL,
      aspect_ratio    TEXT NOT NULL DEFAULT '16:9',
      custom_width    REAL,
      custom_height   REAL,
      created_at      TEXT NOT NULL,
      updated_at      TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_presentations_created_at ON presentations(created_at);
  `);
}

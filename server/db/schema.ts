import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY_DATABASE = ':memory:';

export function initDatabase(db: Database.Database): Database.Database {
  // Create blob_cache table - raw reference payloads and settings, keyed by slot
  db.exec(`
    CREATE TABLE IF NOT EXISTS blob_cache (
      key TEXT PRIMARY KEY,
      payload TEXT NOT NULL,
      updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
    );
  `);

  return db;
}

/**
 * Open (and create if needed) the SQLite database at `dbPath`.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY_DATABASE) {
    // Ensure database directory exists
    const dbDir = path.dirname(path.resolve(dbPath));
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
    }
  }

  const db = new Database(dbPath);

  if (dbPath !== IN_MEMORY_DATABASE) {
    // Enable WAL mode for better concurrency
    db.pragma('journal_mode = WAL');
  }

  // Set busy timeout to handle concurrent access gracefully
  db.pragma('busy_timeout = 5000');

  return initDatabase(db);
}

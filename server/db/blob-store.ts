import Database from 'better-sqlite3';

/**
 * Opaque key/value slot storage for cached payloads and settings.
 */
export interface BlobStore {
  get(key: string): string | null;
  set(key: string, payload: string): void;
}

export class SqliteBlobStore implements BlobStore {
  private readonly selectStmt: Database.Statement<[string], { payload: string }>;
  private readonly upsertStmt: Database.Statement<[string, string]>;

  constructor(db: Database.Database) {
    this.selectStmt = db.prepare<[string], { payload: string }>(
      'SELECT payload FROM blob_cache WHERE key = ?',
    );
    this.upsertStmt = db.prepare<[string, string]>(`
      INSERT INTO blob_cache (key, payload, updated_at)
      VALUES (?, ?, CURRENT_TIMESTAMP)
      ON CONFLICT(key) DO UPDATE SET
        payload = excluded.payload,
        updated_at = excluded.updated_at
    `);
  }

  get(key: string): string | null {
    const row = this.selectStmt.get(key);
    return row ? row.payload : null;
  }

  set(key: string, payload: string): void {
    this.upsertStmt.run(key, payload);
  }
}

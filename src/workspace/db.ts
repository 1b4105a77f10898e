import Database from 'better-sqlite3';

let _db: Database.Database | null = null;

export function openDb(dbPath: string): Database.Database {
  if (_db) return _db;
  _db = new Database(dbPath);
  _db.pragma('journal_mode = WAL');
  _db.pragma('foreign_keys = ON');
  applySchema(_db);
  return _db;
}

/** Fresh in-memory database with the full schema (tests, dry runs). */
export function openMemoryDb(): Database.Database {
  const db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  applySchema(db);
  return db;
}

export function applySchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS pipeline_runs (
      id TEXT PRIMARY KEY,
      url TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('active','success','skipped','failed')),
      current_step TEXT,
      params_json TEXT NOT NULL,
      state_json TEXT NOT NULL,
      ledger_json TEXT NOT NULL DEFAULT '{}',
      attempts INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_pipeline_runs_status ON pipeline_runs(status);
    CREATE INDEX IF NOT EXISTS idx_pipeline_runs_url ON pipeline_runs(url);

    CREATE TABLE IF NOT EXISTS queue_messages (
      id TEXT PRIMARY KEY,
      url TEXT NOT NULL,
      priority TEXT NOT NULL CHECK (priority IN ('low','medium','high')),
      payload_json TEXT NOT NULL,
      enqueued_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_queue_messages_enqueued ON queue_messages(enqueued_at);
  `);
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

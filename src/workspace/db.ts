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

export function applySchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS runs (
      id TEXT PRIMARY KEY,
      workspace_id TEXT NOT NULL,
      recipe TEXT NOT NULL,
      trigger TEXT NOT NULL CHECK (trigger IN ('push','manual')),
      state TEXT NOT NULL CHECK (state IN ('pending','building','assembling','slimming','publishing','done','failed')),
      error_kind TEXT,
      error TEXT,
      image_ref TEXT,
      slimmed INTEGER NOT NULL DEFAULT 0 CHECK (slimmed IN (0,1)),
      fell_back INTEGER NOT NULL DEFAULT 0 CHECK (fell_back IN (0,1)),
      dry_run INTEGER NOT NULL CHECK (dry_run IN (0,1)),
      started_at TEXT NOT NULL,
      ended_at TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_runs_workspace ON runs(workspace_id);
    CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);

    CREATE TABLE IF NOT EXISTS audit_log (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      id TEXT NOT NULL UNIQUE,
      timestamp TEXT NOT NULL,
      actor TEXT NOT NULL,
      workspace_id TEXT NOT NULL,
      run_id TEXT NOT NULL REFERENCES runs(id),
      from_state TEXT NOT NULL,
      to_state TEXT NOT NULL,
      input_hash TEXT NOT NULL,
      error_kind TEXT,
      dry_run INTEGER NOT NULL CHECK (dry_run IN (0,1)),
      chain_prev_hash TEXT,
      chain_this_hash TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_audit_workspace ON audit_log(workspace_id);
    CREATE INDEX IF NOT EXISTS idx_audit_run ON audit_log(run_id);
  `);
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

import Database from 'better-sqlite3';

let _db: Database.Database | null = null;

export function openDb(dbPath: string): Database.Database {
  if (_db) return _db;
  _db = new Database(dbPath);
  _db.pragma('journal_mode = WAL');
  _db.pragma('foreign_keys = ON');
  _db.pragma('busy_timeout = 5000');
  applySchema(_db);
  return _db;
}

export function applySchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schedules (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      cron_expression TEXT NOT NULL,
      job_config_json TEXT NOT NULL,
      is_active INTEGER NOT NULL CHECK (is_active IN (0,1)),
      last_run_at TEXT,
      next_run_at TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_schedules_due ON schedules(is_active, next_run_at);

    CREATE TABLE IF NOT EXISTS executions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      job_id TEXT NOT NULL UNIQUE,
      status TEXT NOT NULL
        CHECK (status IN ('PENDING','RUNNING','COMPLETED','FAILED','CANCELLED')),
      run_name TEXT,
      trigger_type TEXT NOT NULL DEFAULT 'api'
        CHECK (trigger_type IN ('api','cli','scheduled')),
      schedule_id TEXT REFERENCES schedules(id) ON DELETE SET NULL,
      inputs_json TEXT NOT NULL DEFAULT '{}',
      result_json TEXT,
      error TEXT,
      message TEXT,
      created_at TEXT NOT NULL,
      started_at TEXT,
      completed_at TEXT,
      CHECK ((status IN ('PENDING','RUNNING')) = (completed_at IS NULL))
    );
    CREATE INDEX IF NOT EXISTS idx_executions_status ON executions(status);
    CREATE INDEX IF NOT EXISTS idx_executions_created ON executions(created_at);

    CREATE TABLE IF NOT EXISTS task_statuses (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      job_id TEXT NOT NULL REFERENCES executions(job_id) ON DELETE CASCADE,
      task_key TEXT NOT NULL,
      agent_name TEXT,
      status TEXT NOT NULL CHECK (status IN ('RUNNING','COMPLETED','FAILED')),
      started_at TEXT NOT NULL,
      completed_at TEXT,
      UNIQUE (job_id, task_key)
    );

    CREATE TABLE IF NOT EXISTS error_traces (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      execution_id INTEGER NOT NULL REFERENCES executions(id) ON DELETE CASCADE,
      task_key TEXT,
      error_type TEXT NOT NULL,
      error_message TEXT NOT NULL,
      metadata_json TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_error_traces_execution ON error_traces(execution_id);

    CREATE TABLE IF NOT EXISTS execution_traces (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      job_id TEXT NOT NULL REFERENCES executions(job_id) ON DELETE CASCADE,
      seq INTEGER NOT NULL,
      event_type TEXT NOT NULL,
      task_key TEXT,
      agent_name TEXT,
      payload_json TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_execution_traces_job ON execution_traces(job_id, seq);

    CREATE TABLE IF NOT EXISTS execution_logs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      job_id TEXT NOT NULL REFERENCES executions(job_id) ON DELETE CASCADE,
      seq INTEGER NOT NULL,
      content TEXT NOT NULL,
      created_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_execution_logs_job ON execution_logs(job_id, seq);
  `);
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

/** Drop the process-wide handle without failing if it is already closed. Tests only. */
export function _resetDb(): void {
  if (_db) {
    if (_db.open) _db.close();
    _db = null;
  }
}

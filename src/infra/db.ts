import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';

export type LedgerDb = Database.Database;

/** Opens the engine ledger. `:memory:` is accepted for tests. */
export function openDb(dbPath: string): LedgerDb {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.pragma('foreign_keys = ON');

  migrate(db);
  return db;
}

function migrate(db: LedgerDb) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS agent_invocations (
      id TEXT PRIMARY KEY,
      task_id TEXT NOT NULL,
      agent_name TEXT NOT NULL,
      depth INTEGER NOT NULL CHECK (depth BETWEEN 0 AND 1),
      invoked_at INTEGER NOT NULL,
      completed_at INTEGER,
      status TEXT CHECK (status IN ('success', 'failure', 'timeout')),
      signature TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS autofix_events (
      id TEXT PRIMARY KEY,
      signature TEXT NOT NULL,
      pattern_id TEXT,
      tier TEXT,
      kind TEXT NOT NULL CHECK (kind IN ('detected', 'attempt', 'success', 'rollback', 'escalated', 'deferred')),
      snapshot_id TEXT,
      reason TEXT,
      created_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS gate_decisions (
      id TEXT PRIMARY KEY,
      task_id TEXT,
      event_type TEXT NOT NULL,
      allow INTEGER NOT NULL,
      reasons_json TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_invocations_task_id ON agent_invocations(task_id);
    CREATE INDEX IF NOT EXISTS idx_autofix_signature ON autofix_events(signature);
    CREATE INDEX IF NOT EXISTS idx_autofix_created_at ON autofix_events(created_at);
    CREATE INDEX IF NOT EXISTS idx_gate_decisions_task_id ON gate_decisions(task_id);
  `);
}

import Database from 'better-sqlite3';

export type Db = Database.Database;

const SCHEMA_VERSION = 1;

/**
 * Open (or create) the work-order database and bring its schema up to date.
 * Pass ':memory:' for an isolated in-process database.
 */
export function openDatabase(path: string): Db {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('synchronous = NORMAL');
  db.pragma('busy_timeout = 5000');
  migrate(db);
  return db;
}

export function migrate(db: Db): void {
  const tx = db.transaction(() => {
    db.exec(`CREATE TABLE IF NOT EXISTS schema_version (version INTEGER NOT NULL)`);
    const row = db
      .prepare<[], { version: number }>(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
      .get();
    const current = row?.version ?? 0;

    if (current < 1) {
      db.exec(`
        CREATE TABLE work_orders (
          id TEXT PRIMARY KEY,
          type TEXT NOT NULL,
          state TEXT NOT NULL,
          priority INTEGER NOT NULL DEFAULT 0,
          payload TEXT NOT NULL,
          meta TEXT,
          requested_by_type TEXT NOT NULL,
          requested_by_id TEXT,
          apply_attempts INTEGER NOT NULL DEFAULT 0,
          last_transitioned_at TEXT,
          applied_at TEXT,
          completed_at TEXT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
        CREATE INDEX idx_work_orders_state ON work_orders (state, priority DESC, created_at);
        CREATE INDEX idx_work_orders_type ON work_orders (type, state);

        CREATE TABLE work_items (
          id TEXT PRIMARY KEY,
          order_id TEXT NOT NULL REFERENCES work_orders (id),
          type TEXT NOT NULL,
          state TEXT NOT NULL,
          attempts INTEGER NOT NULL DEFAULT 0,
          max_attempts INTEGER NOT NULL,
          lease_holder TEXT,
          lease_expires_at TEXT,
          last_heartbeat_at TEXT,
          available_at TEXT,
          input TEXT NOT NULL,
          result TEXT,
          assembled_result TEXT,
          parts_required TEXT NOT NULL DEFAULT '[]',
          parts_state TEXT NOT NULL DEFAULT '{}',
          revision INTEGER NOT NULL DEFAULT 0,
          error TEXT,
          accepted_at TEXT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
        CREATE INDEX idx_work_items_order ON work_items (order_id, state);
        CREATE INDEX idx_work_items_state ON work_items (state, created_at);
        CREATE INDEX idx_work_items_lease ON work_items (lease_holder, lease_expires_at);

        CREATE TABLE work_item_parts (
          id TEXT PRIMARY KEY,
          item_id TEXT NOT NULL REFERENCES work_items (id),
          part_key TEXT NOT NULL,
          seq INTEGER NOT NULL,
          revision INTEGER NOT NULL DEFAULT 0,
          status TEXT NOT NULL,
          payload TEXT NOT NULL,
          evidence TEXT,
          notes TEXT,
          errors TEXT,
          checksum TEXT NOT NULL,
          submitted_by TEXT,
          created_at TEXT NOT NULL,
          UNIQUE (item_id, revision, part_key, seq)
        );

        CREATE TABLE work_events (
          id TEXT PRIMARY KEY,
          order_id TEXT NOT NULL REFERENCES work_orders (id),
          item_id TEXT REFERENCES work_items (id),
          event_type TEXT NOT NULL,
          actor_type TEXT NOT NULL,
          actor_id TEXT,
          payload TEXT,
          diff TEXT,
          message TEXT,
          created_at TEXT NOT NULL
        );
        CREATE INDEX idx_work_events_order ON work_events (order_id, created_at);
        CREATE INDEX idx_work_events_item ON work_events (item_id, created_at);

        CREATE TABLE work_idempotency_keys (
          scope TEXT NOT NULL,
          key_hash TEXT NOT NULL,
          fingerprint TEXT NOT NULL,
          status TEXT NOT NULL,
          response TEXT,
          created_at TEXT NOT NULL,
          completed_at TEXT,
          PRIMARY KEY (scope, key_hash)
        );
        CREATE INDEX idx_work_idempotency_created ON work_idempotency_keys (created_at);

        CREATE TABLE work_leases (
          lease_key TEXT PRIMARY KEY,
          holder TEXT NOT NULL,
          expires_at INTEGER NOT NULL
        );
      `);
      db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(SCHEMA_VERSION);
    }
  });
  tx();
}

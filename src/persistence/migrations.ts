export type SqlMigration = {
  id: string
  statements: string[]
}

/**
 * Keeps schema evolution explicit and append-only. Ids sort lexically in apply order.
 *
 * Tables are created without `IF NOT EXISTS` so a pre-existing table that this store does not
 * own fails the revision instead of being silently adopted.
 */
export const SQL_MIGRATIONS: SqlMigration[] = [
  {
    id: "001_schema_migrations",
    statements: [
      `CREATE TABLE IF NOT EXISTS schema_migrations (
        id TEXT PRIMARY KEY,
        applied_at INTEGER NOT NULL
      )`,
    ],
  },
  {
    id: "002_messages",
    statements: [
      `CREATE TABLE messages (
        message_id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant', 'tool')),
        content TEXT NOT NULL,
        ts INTEGER NOT NULL
      )`,
      `CREATE INDEX idx_messages_session ON messages (session_id)`,
      `CREATE INDEX idx_messages_ts ON messages (ts)`,
    ],
  },
  {
    id: "003_memory_facts",
    statements: [
      `CREATE TABLE memory_facts (
        id TEXT PRIMARY KEY,
        key TEXT NOT NULL UNIQUE,
        value TEXT NOT NULL,
        confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
        updated_at INTEGER NOT NULL
      )`,
      `CREATE TABLE memory_fact_revisions (
        id TEXT PRIMARY KEY,
        fact_id TEXT NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        confidence REAL NOT NULL,
        observed_at INTEGER NOT NULL,
        superseded_at INTEGER NOT NULL,
        FOREIGN KEY (fact_id) REFERENCES memory_facts(id)
      )`,
      `CREATE INDEX idx_memory_fact_revisions_key ON memory_fact_revisions (key, superseded_at)`,
    ],
  },
  {
    id: "004_tasks",
    statements: [
      `CREATE TABLE tasks (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        schedule TEXT NOT NULL,
        payload TEXT,
        enabled INTEGER NOT NULL CHECK (enabled IN (0, 1)),
        last_run INTEGER,
        next_run INTEGER,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        CHECK (last_run IS NULL OR next_run IS NULL OR next_run >= last_run)
      )`,
      `CREATE INDEX idx_tasks_next_run ON tasks (next_run)`,
      `CREATE TABLE task_runs (
        id TEXT PRIMARY KEY,
        task_id TEXT NOT NULL,
        scheduled_for INTEGER,
        claimed_at INTEGER NOT NULL,
        finished_at INTEGER,
        ok INTEGER CHECK (ok IS NULL OR ok IN (0, 1)),
        detail TEXT,
        FOREIGN KEY (task_id) REFERENCES tasks(id)
      )`,
      `CREATE INDEX idx_task_runs_task_claimed_at ON task_runs (task_id, claimed_at DESC)`,
    ],
  },
  {
    id: "005_tool_calls",
    statements: [
      `CREATE TABLE tool_calls (
        call_id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        tool TEXT NOT NULL,
        args TEXT NOT NULL,
        result TEXT,
        ok INTEGER CHECK (ok IS NULL OR ok IN (0, 1)),
        elapsed_ms INTEGER,
        ts INTEGER NOT NULL
      )`,
      `CREATE INDEX idx_tool_calls_session ON tool_calls (session_id)`,
      `CREATE INDEX idx_tool_calls_ts ON tool_calls (ts)`,
    ],
  },
  {
    id: "006_artifacts",
    statements: [
      `CREATE TABLE artifacts (
        id TEXT PRIMARY KEY,
        type TEXT NOT NULL,
        path TEXT NOT NULL,
        metadata TEXT,
        ts INTEGER NOT NULL
      )`,
      `CREATE INDEX idx_artifacts_type ON artifacts (type)`,
    ],
  },
]

import Database from "better-sqlite3";
import type { PortRange } from "@devports/shared";

export const SCHEMA_VERSION = 1;

/**
 * Ranges seeded when the registry is first created
 */
export const DEFAULT_PORT_RANGES: readonly PortRange[] = [
  { service: "postgres", start: 5432, end: 5499 },
  { service: "postgresql", start: 5432, end: 5499 },
  { service: "mysql", start: 3306, end: 3399 },
  { service: "mariadb", start: 3306, end: 3399 },
  { service: "redis", start: 6379, end: 6449 },
  { service: "mongodb", start: 27017, end: 27099 },
  { service: "mongo", start: 27017, end: 27099 },
  { service: "elasticsearch", start: 9200, end: 9299 },
  { service: "meilisearch", start: 7700, end: 7799 },
  { service: "rabbitmq", start: 5672, end: 5699 },
  { service: "kafka", start: 9092, end: 9099 },
  { service: "default", start: 10000, end: 19999 },
];

export const DEFAULT_RANGE_NAME = "default";

/**
 * Used when even the "default" row has been removed from the store
 */
export const FALLBACK_RANGE: PortRange = { service: DEFAULT_RANGE_NAME, start: 10000, end: 19999 };

const SCHEMA = `
-- Version tracking
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY
);

-- Port allocations
CREATE TABLE IF NOT EXISTS allocations (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  context_hash TEXT NOT NULL,
  context_path TEXT NOT NULL,
  context_label TEXT NOT NULL,
  service TEXT NOT NULL,
  port INTEGER NOT NULL UNIQUE,
  container_port INTEGER,
  env_var TEXT,
  source TEXT,
  created_at TEXT NOT NULL,
  last_accessed_at TEXT NOT NULL,
  UNIQUE(context_hash, service)
);

-- Port ranges per service
CREATE TABLE IF NOT EXISTS port_ranges (
  service TEXT PRIMARY KEY,
  range_start INTEGER NOT NULL,
  range_end INTEGER NOT NULL
);

-- Indexes for common queries
CREATE INDEX IF NOT EXISTS idx_allocations_context ON allocations(context_hash);
CREATE INDEX IF NOT EXISTS idx_allocations_last_accessed ON allocations(last_accessed_at);
`;

/**
 * Open a connection to the registry file.
 * `busyTimeoutMs` bounds how long a writer waits for another process's lock.
 */
export function openDatabase(path: string, busyTimeoutMs: number): Database.Database {
  return new Database(path, { timeout: busyTimeoutMs });
}

/**
 * Create the schema and seed the default ranges on first use
 */
export function initializeSchema(db: Database.Database): void {
  db.pragma("journal_mode = WAL");

  const init = db.transaction(() => {
    db.exec(SCHEMA);

    const row = db.prepare("SELECT MAX(version) AS version FROM schema_version").get() as {
      version: number | null;
    };

    if (row.version === null) {
      const seed = db.prepare(
        "INSERT OR IGNORE INTO port_ranges (service, range_start, range_end) VALUES (?, ?, ?)"
      );
      for (const range of DEFAULT_PORT_RANGES) {
        seed.run(range.service, range.start, range.end);
      }
      db.prepare("INSERT INTO schema_version (version) VALUES (?)").run(SCHEMA_VERSION);
    }
  });

  init.immediate();
}

/**
 * Database schema definitions
 *
 * The schema is embedded directly in code so no SQL files have to be
 * located at run time.
 */

/** Initial schema: configuration and migration tracking */
export const SCHEMA_001 = `
CREATE TABLE IF NOT EXISTS config (
    key TEXT PRIMARY KEY,
    value TEXT,
    updated_at TEXT DEFAULT (datetime('now'))
);

INSERT OR IGNORE INTO config (key, value) VALUES ('schema_version', '000');

CREATE TABLE IF NOT EXISTS schema_migrations (
    version TEXT PRIMARY KEY,
    applied_at TEXT DEFAULT (datetime('now'))
);
`;

/** Drafts (revision sidecar of each local file) and the operation log */
export const SCHEMA_002 = `
CREATE TABLE IF NOT EXISTS drafts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    lang TEXT NOT NULL,
    title TEXT NOT NULL,
    filepath TEXT NOT NULL UNIQUE,
    origin TEXT NOT NULL CHECK (origin IN ('download', 'translation')),
    -- NULL: the page did not exist when the draft was made
    base_revision_id TEXT,
    base_timestamp TEXT,
    source_lang TEXT,
    source_title TEXT,
    source_revision_id TEXT,
    reference_text TEXT NOT NULL,
    generated_text TEXT NOT NULL,
    generated_hash TEXT NOT NULL,
    translation_status TEXT,
    translation_stats TEXT,
    published_revision_id TEXT,
    published_at TEXT,
    created_at TEXT DEFAULT (datetime('now')),
    updated_at TEXT DEFAULT (datetime('now')),
    UNIQUE (lang, title)
);

CREATE INDEX IF NOT EXISTS idx_drafts_lang ON drafts(lang);

CREATE TABLE IF NOT EXISTS operation_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    operation TEXT NOT NULL CHECK (operation IN ('download', 'translate', 'publish')),
    lang TEXT NOT NULL,
    title TEXT NOT NULL,
    status TEXT NOT NULL,
    revision_id TEXT,
    error_message TEXT,
    details TEXT,
    timestamp TEXT DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_operation_log_timestamp ON operation_log(timestamp);
`;

export interface Migration {
  version: string;
  sql: string;
}

/** Ordered migrations */
export const MIGRATIONS: readonly Migration[] = [
  { version: '001', sql: SCHEMA_001 },
  { version: '002', sql: SCHEMA_002 },
];

/** Tables every current database has */
export const REQUIRED_TABLES: readonly string[] = [
  'config',
  'schema_migrations',
  'drafts',
  'operation_log',
];

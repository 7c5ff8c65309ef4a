/**
 * Migration runner
 *
 * Transactional migrations with tracking in `schema_migrations` and
 * schema validation.
 */

import type BetterSqlite3 from 'better-sqlite3';
import { MIGRATIONS, REQUIRED_TABLES } from './schema.js';

type SqliteDb = BetterSqlite3.Database;

/** Result of running migrations */
export interface MigrationResult {
  applied: string[];
  skipped: string[];
  failed?: { version: string; error: string };
}

/** Schema validation result */
export interface SchemaValidation {
  valid: boolean;
  currentVersion: string;
  expectedVersion: string;
  missingTables?: string[];
}

function hasTable(db: SqliteDb, name: string): boolean {
  const row = db
    .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(name);
  return row !== undefined;
}

/**
 * Get applied migrations from database
 */
export function getAppliedMigrations(db: SqliteDb): Set<string> {
  // Created by the first migration
  if (!hasTable(db, 'schema_migrations')) {
    return new Set();
  }
  const rows = db.prepare<[], { version: string }>('SELECT version FROM schema_migrations').all();
  return new Set(rows.map(r => r.version));
}

/**
 * Run pending migrations.
 *
 * Each migration runs in its own transaction; a failing migration is rolled
 * back and reported, and later ones are not attempted.
 */
export function runMigrations(db: SqliteDb): MigrationResult {
  const applied: string[] = [];
  const skipped: string[] = [];

  const appliedSet = getAppliedMigrations(db);

  for (const migration of MIGRATIONS) {
    if (appliedSet.has(migration.version)) {
      skipped.push(migration.version);
      continue;
    }

    const apply = db.transaction(() => {
      db.exec(migration.sql);
      db.prepare(
        `INSERT OR REPLACE INTO schema_migrations (version, applied_at)
         VALUES (?, datetime('now'))`
      ).run(migration.version);
      db.prepare(
        `UPDATE config SET value = ?, updated_at = datetime('now')
         WHERE key = 'schema_version'`
      ).run(migration.version);
    });

    try {
      apply.immediate();
      applied.push(migration.version);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        applied,
        skipped,
        failed: { version: migration.version, error: message },
      };
    }
  }

  return { applied, skipped };
}

/**
 * Schema version recorded in the config table
 */
function getSchemaVersion(db: SqliteDb): string {
  if (!hasTable(db, 'config')) {
    return '000';
  }
  const row = db
    .prepare<[string], { value: string | null }>('SELECT value FROM config WHERE key = ?')
    .get('schema_version');
  return row?.value ?? '000';
}

/**
 * Validate database schema matches the latest migration
 */
export function validateSchema(db: SqliteDb): SchemaValidation {
  const currentVersion = getSchemaVersion(db);
  const expectedVersion = MIGRATIONS[MIGRATIONS.length - 1].version;
  const missingTables = REQUIRED_TABLES.filter(t => !hasTable(db, t));

  return {
    valid: currentVersion === expectedVersion && missingTables.length === 0,
    currentVersion,
    expectedVersion,
    missingTables: missingTables.length > 0 ? missingTables : undefined,
  };
}

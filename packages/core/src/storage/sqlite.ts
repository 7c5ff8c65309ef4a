/**
 * SQLite database wrapper
 *
 * Synchronous access through better-sqlite3. Holds the revision sidecar of
 * every draft and a log of downloads, translations and publishes.
 */

import { createHash } from 'node:crypto';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import BetterSqlite3 from 'better-sqlite3';
import { runMigrations, validateSchema } from './migrations.js';

export type DraftOrigin = 'download' | 'translation';

/** Draft record from database */
export interface DraftRecord {
  id: number;
  lang: string;
  title: string;
  filepath: string;
  origin: DraftOrigin;
  /** Revision the draft is based on; null when the page did not exist */
  base_revision_id: string | null;
  base_timestamp: string | null;
  source_lang: string | null;
  source_title: string | null;
  source_revision_id: string | null;
  /** Text the draft was derived from (source article for translations) */
  reference_text: string;
  /** Text the tool wrote to the file */
  generated_text: string;
  generated_hash: string;
  translation_status: string | null;
  /** JSON-encoded translation statistics */
  translation_stats: string | null;
  published_revision_id: string | null;
  published_at: string | null;
  created_at: string;
  updated_at: string;
}

export type DraftInput = Omit<
  DraftRecord,
  'id' | 'generated_hash' | 'published_revision_id' | 'published_at' | 'created_at' | 'updated_at'
>;

export type Operation = 'download' | 'translate' | 'publish';

/** Operation log record */
export interface OperationLogRecord {
  id: number;
  operation: Operation;
  lang: string;
  title: string;
  status: string;
  revision_id: string | null;
  error_message: string | null;
  details: string | null;
  timestamp: string;
}

export type OperationLogInput = Omit<OperationLogRecord, 'id' | 'timestamp'>;

/**
 * Compute SHA-256 hash of content (first 16 chars)
 */
export function computeHash(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}

/**
 * Database wrapper class
 */
export class Database {
  private db: BetterSqlite3.Database;

  private constructor(db: BetterSqlite3.Database) {
    this.db = db;
  }

  /**
   * Open (or create) a database and bring its schema up to date
   */
  static async create(dbPath: string): Promise<Database> {
    const isMemoryDb = dbPath === ':memory:';
    if (!isMemoryDb) {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    const db = new BetterSqlite3(dbPath);
    if (!isMemoryDb) {
      db.pragma('journal_mode = WAL');
    }

    const result = runMigrations(db);
    if (result.failed) {
      db.close();
      throw new Error(`Migration ${result.failed.version} failed: ${result.failed.error}`);
    }

    const schema = validateSchema(db);
    if (!schema.valid) {
      db.close();
      const missing = schema.missingTables ? `; missing tables: ${schema.missingTables.join(', ')}` : '';
      throw new Error(
        `Database schema is at ${schema.currentVersion}, expected ${schema.expectedVersion}${missing}`
      );
    }

    return new Database(db);
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
  }

  // =========================================================================
  // Draft operations
  // =========================================================================

  getDraft(lang: string, title: string): DraftRecord | null {
    return this.db
      .prepare<[string, string], DraftRecord>('SELECT * FROM drafts WHERE lang = ? AND title = ?')
      .get(lang, title) ?? null;
  }

  getDraftByPath(filepath: string): DraftRecord | null {
    return this.db
      .prepare<[string], DraftRecord>('SELECT * FROM drafts WHERE filepath = ?')
      .get(normalizePath(filepath)) ?? null;
  }

  getDrafts(options: { lang?: string } = {}): DraftRecord[] {
    if (options.lang) {
      return this.db
        .prepare<[string], DraftRecord>('SELECT * FROM drafts WHERE lang = ? ORDER BY title')
        .all(options.lang);
    }
    return this.db.prepare<[], DraftRecord>('SELECT * FROM drafts ORDER BY lang, title').all();
  }

  /**
   * Insert or replace the draft for (lang, title). A new download or
   * translation resets the published state.
   */
  upsertDraft(draft: DraftInput): number {
    const filepath = normalizePath(draft.filepath);

    // A file path belongs to one draft, so any conflict left is on this row
    this.db
      .prepare('DELETE FROM drafts WHERE filepath = ? AND NOT (lang = ? AND title = ?)')
      .run(filepath, draft.lang, draft.title);

    this.db.prepare(`
      INSERT INTO drafts (
        lang, title, filepath, origin, base_revision_id, base_timestamp,
        source_lang, source_title, source_revision_id, reference_text,
        generated_text, generated_hash, translation_status, translation_stats
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT DO UPDATE SET
        filepath = excluded.filepath,
        origin = excluded.origin,
        base_revision_id = excluded.base_revision_id,
        base_timestamp = excluded.base_timestamp,
        source_lang = excluded.source_lang,
        source_title = excluded.source_title,
        source_revision_id = excluded.source_revision_id,
        reference_text = excluded.reference_text,
        generated_text = excluded.generated_text,
        generated_hash = excluded.generated_hash,
        translation_status = excluded.translation_status,
        translation_stats = excluded.translation_stats,
        published_revision_id = NULL,
        published_at = NULL,
        updated_at = datetime('now')
    `).run(
      draft.lang,
      draft.title,
      filepath,
      draft.origin,
      draft.base_revision_id,
      draft.base_timestamp,
      draft.source_lang,
      draft.source_title,
      draft.source_revision_id,
      draft.reference_text,
      draft.generated_text,
      computeHash(draft.generated_text),
      draft.translation_status,
      draft.translation_stats
    );

    const row = this.db
      .prepare<[string, string], { id: number }>('SELECT id FROM drafts WHERE lang = ? AND title = ?')
      .get(draft.lang, draft.title);
    if (!row) {
      throw new Error(`Draft ${draft.lang}:${draft.title} was not stored`);
    }
    return row.id;
  }

  /**
   * Record a successful publish: the new revision becomes the base of any
   * further edit of the draft.
   */
  markPublished(lang: string, title: string, revisionId: string, publishedText: string): void {
    this.db.prepare(`
      UPDATE drafts SET
        base_revision_id = ?,
        base_timestamp = NULL,
        published_revision_id = ?,
        published_at = datetime('now'),
        generated_text = ?,
        generated_hash = ?,
        updated_at = datetime('now')
      WHERE lang = ? AND title = ?
    `).run(revisionId, revisionId, publishedText, computeHash(publishedText), lang, title);
  }

  // =========================================================================
  // Operation log
  // =========================================================================

  logOperation(entry: OperationLogInput): number {
    const result = this.db.prepare(`
      INSERT INTO operation_log (operation, lang, title, status, revision_id, error_message, details)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      entry.operation,
      entry.lang,
      entry.title,
      entry.status,
      entry.revision_id,
      entry.error_message,
      entry.details
    );
    return Number(result.lastInsertRowid);
  }

  /**
   * Most recent entries first
   */
  getOperationLogs(limit: number = 100): OperationLogRecord[] {
    return this.db
      .prepare<[number], OperationLogRecord>('SELECT * FROM operation_log ORDER BY id DESC LIMIT ?')
      .all(limit);
  }

  getStats(): { drafts: number; translations: number; published: number } {
    const row = this.db.prepare<[], { drafts: number; translations: number; published: number }>(`
      SELECT
        COUNT(*) AS drafts,
        COALESCE(SUM(CASE WHEN origin = 'translation' THEN 1 ELSE 0 END), 0) AS translations,
        COALESCE(SUM(CASE WHEN published_revision_id IS NOT NULL THEN 1 ELSE 0 END), 0) AS published
      FROM drafts
    `).get();
    return row ?? { drafts: 0, translations: 0, published: 0 };
  }
}

function normalizePath(filepath: string): string {
  return filepath.replace(/\\/g, '/');
}

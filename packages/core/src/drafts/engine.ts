/**
 * Draft engine - orchestrates download/translate/preview/publish
 *
 * Coordinates between:
 * - MediaWiki API (one client per language edition)
 * - SQLite database (revision sidecar of each draft, operation log)
 * - Filesystem (draft files)
 */

import type { Database, DraftRecord } from '../storage/sqlite.js';
import type { Filesystem } from '../storage/filesystem.js';
import { titleFromPath } from '../storage/filesystem.js';
import type { PageContent } from '../api/types.js';
import { WikiError } from '../api/url.js';
import type { RevisionSource, EditSubmitter, PublishResult, RevisionCheck } from '../publish/guard.js';
import { checkAndPublish, checkRevision } from '../publish/guard.js';
import type { TranslationService } from '../translate/adapter.js';
import { translateWikitext, type TranslateOptions, type TranslationReport } from '../translate/pipeline.js';
import { previewDraft, type PreviewReport } from '../preview/structure.js';

/** What the engine needs from a wiki */
export interface WikiSite extends RevisionSource, EditSubmitter {
  getPageContent(title: string): Promise<PageContent | null>;
}

/** Provides a client for a language edition; `auth` clients can edit */
export type SiteFactory = (lang: string, options: { auth: boolean }) => Promise<WikiSite>;

type ProgressFn = (message: string, current?: number, total?: number) => void;

export interface DownloadOptions {
  lang: string;
  title: string;
  /** Draft path (default: articles/<lang>/<Title>.wiki) */
  path?: string;
  onProgress?: ProgressFn;
}

export interface DownloadResult {
  lang: string;
  title: string;
  filepath: string;
  revisionId: string;
  bytes: number;
}

export interface TranslateDraftOptions {
  sourceLang: string;
  title: string;
  targetLang: string;
  /** Title on the target wiki (default: the source title) */
  targetTitle?: string;
  path?: string;
  /** null copies the source text unchanged */
  service: TranslationService | null;
  pipeline?: Pick<TranslateOptions, 'maxChars' | 'concurrency' | 'timeoutMs' | 'signal'>;
  onProgress?: ProgressFn;
}

export interface TranslateDraftResult {
  sourceLang: string;
  sourceTitle: string;
  sourceRevisionId: string;
  lang: string;
  title: string;
  filepath: string;
  /** Current revision of the target page; null when it does not exist */
  baseRevisionId: string | null;
  /** null when no translation service was used */
  report: TranslationReport | null;
}

export interface PreviewResult {
  filepath: string;
  draft: DraftRecord | null;
  report: PreviewReport;
}

export interface PublishOptions {
  path: string;
  lang?: string;
  title?: string;
  summary: string;
  minor?: boolean;
  /** Check the base revision only */
  dryRun?: boolean;
  onProgress?: ProgressFn;
}

export interface PublishOutcome {
  lang: string;
  title: string;
  filepath: string;
  baseRevisionId: string | null;
  result: PublishResult | RevisionCheck;
}

export type DraftState = 'unchanged' | 'modified' | 'missing';

export interface DraftStatus {
  record: DraftRecord;
  state: DraftState;
}

/**
 * Draft engine
 */
export class DraftEngine {
  private db: Database;
  private fs: Filesystem;
  private sites: SiteFactory;

  constructor(db: Database, fs: Filesystem, sites: SiteFactory) {
    this.db = db;
    this.fs = fs;
    this.sites = sites;
  }

  /**
   * Download an article into a draft file and record its revision
   */
  async download(options: DownloadOptions): Promise<DownloadResult> {
    options.onProgress?.(`Fetching ${options.lang}:${options.title}...`);

    const site = await this.sites(options.lang, { auth: false });
    const page = await this.fetchPage(site, options.lang, options.title);
    const filepath = this.fs.relPath(options.path ?? this.fs.draftPath(options.lang, page.title));

    this.fs.writeFile(filepath, page.content);
    this.db.upsertDraft({
      lang: options.lang,
      title: page.title,
      filepath,
      origin: 'download',
      base_revision_id: page.revisionId,
      base_timestamp: page.timestamp,
      source_lang: null,
      source_title: null,
      source_revision_id: null,
      reference_text: page.content,
      generated_text: page.content,
      translation_status: null,
      translation_stats: null,
    });
    this.db.logOperation({
      operation: 'download',
      lang: options.lang,
      title: page.title,
      status: 'success',
      revision_id: page.revisionId,
      error_message: null,
      details: null,
    });

    return {
      lang: options.lang,
      title: page.title,
      filepath,
      revisionId: page.revisionId,
      bytes: Buffer.byteLength(page.content, 'utf-8'),
    };
  }

  /**
   * Fetch a source article, translate it and write the result as a draft
   * for the target wiki
   */
  async translate(options: TranslateDraftOptions): Promise<TranslateDraftResult> {
    const { sourceLang, targetLang } = options;

    options.onProgress?.(`Fetching ${sourceLang}:${options.title}...`);
    const source = await this.fetchPage(await this.sites(sourceLang, { auth: false }), sourceLang, options.title);

    const title = options.targetTitle ?? source.title;
    options.onProgress?.(`Checking ${targetLang}:${title}...`);
    const target = await this.sites(targetLang, { auth: false });
    const current = await target.getCurrentRevision(title);
    const baseRevisionId = current?.revisionId ?? null;

    let report: TranslationReport | null = null;
    let text = source.content;
    if (options.service) {
      report = await translateWikitext(source.content, options.service, {
        ...options.pipeline,
        sourceLang,
        targetLang,
        onProgress: options.onProgress,
      });
      text = report.wikitext;
    }

    const filepath = this.fs.relPath(options.path ?? this.fs.draftPath(targetLang, title));
    this.fs.writeFile(filepath, text);

    const stats = report
      ? JSON.stringify({
          segments: report.segmentCount,
          tokens: report.tokenCount,
          units: report.units.length,
          translated: report.translatedUnits,
          failed: report.failedUnits,
          warnings: report.warnings.length,
        })
      : null;

    this.db.upsertDraft({
      lang: targetLang,
      title,
      filepath,
      origin: 'translation',
      base_revision_id: baseRevisionId,
      base_timestamp: current?.timestamp ?? null,
      source_lang: sourceLang,
      source_title: source.title,
      source_revision_id: source.revisionId,
      reference_text: source.content,
      generated_text: text,
      translation_status: report?.status ?? 'copied',
      translation_stats: stats,
    });
    this.db.logOperation({
      operation: 'translate',
      lang: targetLang,
      title,
      status: report?.status ?? 'copied',
      revision_id: baseRevisionId,
      error_message: report?.error ?? null,
      details: JSON.stringify({ sourceLang, sourceTitle: source.title, sourceRevisionId: source.revisionId }),
    });

    return {
      sourceLang,
      sourceTitle: source.title,
      sourceRevisionId: source.revisionId,
      lang: targetLang,
      title,
      filepath,
      baseRevisionId,
      report,
    };
  }

  /**
   * Structure check of a draft against the text it was derived from
   */
  preview(path: string): PreviewResult {
    const file = this.fs.readFile(path);
    if (!file) {
      throw new Error(`File not found: ${path}`);
    }

    const draft = this.db.getDraftByPath(file.filepath);
    const report = previewDraft({
      reference: draft?.reference_text ?? file.content,
      generated: draft?.generated_text ?? file.content,
      draft: file.content,
      name: file.filepath,
    });

    return { filepath: file.filepath, draft, report };
  }

  /**
   * Publish a draft if the page has not changed since the draft's base
   * revision. Never retries the edit.
   */
  async publish(options: PublishOptions): Promise<PublishOutcome> {
    const file = this.fs.readFile(options.path);
    if (!file) {
      throw new Error(`File not found: ${options.path}`);
    }

    const draft = this.db.getDraftByPath(file.filepath);
    const lang = options.lang ?? draft?.lang ?? this.fs.langFromPath(file.filepath);
    if (!lang) {
      throw new Error(`Cannot tell the wiki language of ${file.filepath}; pass --lang`);
    }
    const title = options.title ?? draft?.title ?? titleFromPath(file.filepath);

    const record = draft && draft.lang === lang && draft.title === title
      ? draft
      : this.db.getDraft(lang, title);
    if (!record) {
      throw new Error(`No base revision recorded for ${lang}:${title}; download or translate it first`);
    }

    const baseRevisionId = record.base_revision_id;
    const outcome = { lang, title, filepath: file.filepath, baseRevisionId };

    if (options.dryRun) {
      options.onProgress?.(`Checking ${lang}:${title}...`);
      const site = await this.sites(lang, { auth: false });
      return { ...outcome, result: await checkRevision(title, baseRevisionId, site) };
    }

    options.onProgress?.(`Publishing ${lang}:${title}...`);
    const site = await this.sites(lang, { auth: true });
    const result = await checkAndPublish(
      { title, baseRevisionId, text: file.content, summary: options.summary, minor: options.minor },
      site
    );

    if (result.status === 'published' && !result.unchanged) {
      this.db.markPublished(lang, title, result.newRevisionId, file.content);
    }

    this.db.logOperation({
      operation: 'publish',
      lang,
      title,
      status: result.status,
      revision_id: result.status === 'published' ? result.newRevisionId : baseRevisionId,
      error_message: 'reason' in result ? result.reason : null,
      details: JSON.stringify(result),
    });

    return { ...outcome, result };
  }

  /**
   * Drafts with their local state
   */
  status(options: { lang?: string } = {}): DraftStatus[] {
    return this.db.getDrafts(options).map(record => {
      const file = this.fs.readFile(record.filepath);
      let state: DraftState = 'missing';
      if (file) {
        state = file.contentHash === record.generated_hash ? 'unchanged' : 'modified';
      }
      return { record, state };
    });
  }

  private async fetchPage(site: WikiSite, lang: string, title: string): Promise<PageContent> {
    const page = await site.getPageContent(title);
    if (!page) {
      throw new WikiError(`Page not found: ${lang}:${title}`);
    }
    return page;
  }
}

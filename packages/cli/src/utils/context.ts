/**
 * CLI context utilities
 *
 * Provides shared context (settings, database, filesystem, engine) for CLI
 * commands.
 */

import { resolve } from 'node:path';
import {
  Database,
  DraftEngine,
  Filesystem,
  createAuthenticatedClient,
  createClientFromSettings,
  loadSettings,
  type MediaWikiClient,
  type Settings,
  type SiteFactory,
} from '@wikiport/core';

export interface ProjectContext {
  /** Project root where articles/ lives */
  projectRoot: string;
  /** Absolute path to SQLite database */
  dbPath: string;
  /** Absolute path to the .env file */
  envPath: string;
}

/** CLI context with all dependencies */
export interface CliContext {
  settings: Settings;
  db: Database;
  fs: Filesystem;
  engine: DraftEngine;
  projectContext: ProjectContext;
}

export function detectProjectContext(settings: Settings = loadSettings()): ProjectContext {
  return {
    projectRoot: settings.projectRoot,
    dbPath: settings.dbPath,
    envPath: resolve(settings.projectRoot, '.env'),
  };
}

/**
 * Clients per language; authenticated ones log in on first use
 */
export function createSiteFactory(settings: Settings): SiteFactory {
  const readers = new Map<string, MediaWikiClient>();
  const writers = new Map<string, Promise<MediaWikiClient>>();

  return async (lang, options) => {
    if (options.auth) {
      let client = writers.get(lang);
      if (!client) {
        client = createAuthenticatedClient(settings, lang);
        writers.set(lang, client);
      }
      return client;
    }

    let client = readers.get(lang);
    if (!client) {
      client = createClientFromSettings(settings, lang);
      readers.set(lang, client);
    }
    return client;
  };
}

/**
 * Create CLI context
 */
export async function createContext(): Promise<CliContext> {
  const settings = loadSettings();
  const projectContext = detectProjectContext(settings);

  const db = await Database.create(settings.dbPath);
  const fs = new Filesystem({ rootDir: settings.projectRoot });
  const engine = new DraftEngine(db, fs, createSiteFactory(settings));

  return { settings, db, fs, engine, projectContext };
}

/**
 * Clean up context (close database)
 */
export function closeContext(ctx: CliContext): void {
  ctx.db.close();
}

/**
 * Run a command with context management
 */
export async function withContext<T>(fn: (ctx: CliContext) => Promise<T>): Promise<T> {
  const ctx = await createContext();
  try {
    return await fn(ctx);
  } finally {
    closeContext(ctx);
  }
}

/**
 * Path given on the command line, made absolute against the working directory
 */
export function resolveUserPath(path: string): string {
  return resolve(process.cwd(), path);
}

/**
 * Filesystem operations for draft files
 *
 * Drafts live at `articles/<lang>/<Title>.wiki` under the project root,
 * with spaces and characters unsafe in file names replaced by `_`.
 */

import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { basename, dirname, extname, isAbsolute, join, relative, resolve } from 'node:path';
import { computeHash } from './sqlite.js';

export const ARTICLES_DIR = 'articles';
export const DRAFT_EXTENSION = '.wiki';

/** File metadata */
export interface FileInfo {
  /** Path relative to the project root, with forward slashes */
  filepath: string;
  content: string;
  contentHash: string;
  mtime: number; // Unix timestamp in milliseconds
}

/** Filesystem configuration */
export interface FilesystemConfig {
  /** Project root directory */
  rootDir: string;
  /** Directory for drafts, relative to the root (default: articles) */
  articlesDir?: string;
}

/**
 * File name for a title: spaces and `\ / : * ? " < > |` become `_`
 */
export function safeFilename(title: string): string {
  return title.replace(/ /g, '_').replace(/[\\/:*?"<>|]/g, '_');
}

/**
 * Title from a draft path: the file stem with `_` read as a space
 */
export function titleFromPath(filepath: string): string {
  const name = basename(filepath.replace(/\\/g, '/'));
  const ext = extname(name);
  const stem = ext ? name.slice(0, -ext.length) : name;
  return stem.replace(/_/g, ' ');
}

/**
 * Filesystem manager for drafts
 */
export class Filesystem {
  private config: Required<FilesystemConfig>;

  constructor(config: FilesystemConfig) {
    this.config = { articlesDir: ARTICLES_DIR, ...config };
  }

  get rootDir(): string {
    return this.config.rootDir;
  }

  /**
   * Get absolute path from a root-relative (or absolute) path
   */
  absPath(filepath: string): string {
    return isAbsolute(filepath) ? filepath : join(this.config.rootDir, filepath);
  }

  /**
   * Root-relative path with forward slashes
   */
  relPath(filepath: string): string {
    return relative(this.config.rootDir, resolve(this.config.rootDir, filepath)).replace(/\\/g, '/');
  }

  /**
   * Default location of the draft for a title
   */
  draftPath(lang: string, title: string): string {
    return `${this.config.articlesDir}/${lang}/${safeFilename(title)}${DRAFT_EXTENSION}`;
  }

  /**
   * Language directory of a draft path (`articles/<lang>/...`), if any
   */
  langFromPath(filepath: string): string | null {
    const parts = this.relPath(filepath).split('/');
    if (parts.length === 3 && parts[0] === this.config.articlesDir) {
      return parts[1];
    }
    return null;
  }

  /**
   * Read a file and return its info
   */
  readFile(filepath: string): FileInfo | null {
    const absPath = this.absPath(filepath);

    if (!existsSync(absPath)) {
      return null;
    }

    const content = readFileSync(absPath, 'utf-8');
    return {
      filepath: this.relPath(filepath),
      content,
      contentHash: computeHash(content),
      mtime: statSync(absPath).mtimeMs,
    };
  }

  /**
   * Write content to a file, creating directories; returns the new mtime
   */
  writeFile(filepath: string, content: string): number {
    const absPath = this.absPath(filepath);
    const dir = dirname(absPath);

    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    writeFileSync(absPath, content, 'utf-8');
    return statSync(absPath).mtimeMs;
  }
}

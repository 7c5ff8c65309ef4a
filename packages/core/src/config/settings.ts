/**
 * Runtime settings
 *
 * Read from environment variables (the CLI loads `.env` first). Numeric
 * values that do not parse fall back to their defaults.
 */

import path from 'node:path';

export const DEFAULT_API_URL = 'https://{lang}.wikipedia.org/w/api.php';
export const DEFAULT_USER_AGENT = 'wikiport/0.1 (https://example.invalid; contact: local)';
export const DEFAULT_DB_FILE = '.wikiport/wikiport.db';

export interface TranslateSettings {
  endpoint?: string;
  apiKey?: string;
  maxChars: number;
  concurrency: number;
  timeoutMs: number;
}

export interface HttpSettings {
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  rateLimitReadMs: number;
  rateLimitWriteMs: number;
}

export interface Settings {
  projectRoot: string;
  dbPath: string;
  /** API URL; `{lang}` is replaced by the wiki language */
  apiUrl: string;
  userAgent: string;
  username?: string;
  password?: string;
  translate: TranslateSettings;
  http: HttpSettings;
}

type Env = Record<string, string | undefined>;

export function loadSettings(env: Env = process.env, cwd: string = process.cwd()): Settings {
  const projectRoot = path.resolve(cwd, env.WKP_PROJECT_ROOT || '.');
  const dbPath = path.resolve(projectRoot, env.WKP_DB || DEFAULT_DB_FILE);

  return {
    projectRoot,
    dbPath,
    apiUrl: env.WKP_API_URL || DEFAULT_API_URL,
    userAgent: env.WKP_USER_AGENT || DEFAULT_USER_AGENT,
    username: env.WKP_USERNAME || undefined,
    password: env.WKP_PASSWORD || undefined,
    translate: {
      endpoint: env.WKP_TRANSLATE_URL || undefined,
      apiKey: env.WKP_TRANSLATE_KEY || undefined,
      maxChars: readInt(env.WKP_TRANSLATE_MAX_CHARS, 4500, 1),
      concurrency: readInt(env.WKP_TRANSLATE_CONCURRENCY, 4, 1),
      timeoutMs: readInt(env.WKP_TRANSLATE_TIMEOUT_MS, 30000, 1),
    },
    http: {
      timeoutMs: readInt(env.WKP_HTTP_TIMEOUT_MS, 30000, 1),
      retries: readInt(env.WKP_HTTP_RETRIES, 2, 0),
      retryDelayMs: readInt(env.WKP_HTTP_RETRY_DELAY_MS, 500, 0),
      rateLimitReadMs: readInt(env.WKP_RATE_LIMIT_READ, 300, 0),
      rateLimitWriteMs: readInt(env.WKP_RATE_LIMIT_WRITE, 1000, 0),
    },
  };
}

/**
 * API URL for a language edition
 */
export function apiUrlFor(settings: Pick<Settings, 'apiUrl'>, lang: string): string {
  return settings.apiUrl.split('{lang}').join(lang);
}

function readInt(value: string | undefined, fallback: number, min: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < min) return fallback;
  return parsed;
}

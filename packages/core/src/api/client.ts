/**
 * MediaWiki API Client
 *
 * Rate-limited HTTP client for one wiki's action API. Reads are retried
 * with backoff; writes are sent once.
 */

import type {
  ApiResponse,
  QueryResponse,
  LoginResponse,
  EditResponse,
  PageContent,
} from './types.js';
import { WikiError } from './url.js';
import type {
  EditRequest,
  EditSubmission,
  EditSubmitter,
  RevisionInfo,
  RevisionSource,
} from '../publish/guard.js';
import { CONFLICT_CODES } from '../publish/guard.js';
import { apiUrlFor, type Settings } from '../config/settings.js';

/** Client configuration */
export interface ClientConfig {
  /** Wiki API URL (e.g., https://en.wikipedia.org/w/api.php) */
  apiUrl: string;
  /** User agent string */
  userAgent?: string;
  /** Rate limit for read operations (ms between requests) */
  rateLimitReadMs?: number;
  /** Rate limit for write operations (ms between requests) */
  rateLimitWriteMs?: number;
  /** Request timeout (ms) */
  timeoutMs?: number;
  /** Max retries for read requests */
  maxRetries?: number;
  /** Base retry delay (ms) */
  retryDelayMs?: number;
}

/** Default configuration */
const DEFAULT_CONFIG: Required<Omit<ClientConfig, 'apiUrl'>> = {
  userAgent: 'wikiport/0.1 (https://example.invalid; contact: local)',
  rateLimitReadMs: 300,
  rateLimitWriteMs: 1000,
  timeoutMs: 30000,
  maxRetries: 2,
  retryDelayMs: 500,
};

type Params = Record<string, string | number | undefined>;

/**
 * Sleep for a given number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * MediaWiki API Client
 */
export class MediaWikiClient implements RevisionSource, EditSubmitter {
  private config: Required<ClientConfig>;
  private lastRequestTime: number = 0;
  private requestCount: number = 0;
  private csrfToken: string | null = null;
  private cookies: Map<string, string> = new Map();

  constructor(config: ClientConfig) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
    };
  }

  /**
   * Apply rate limiting before a request
   */
  private async rateLimit(isWrite: boolean): Promise<void> {
    const delay = isWrite ? this.config.rateLimitWriteMs : this.config.rateLimitReadMs;
    const elapsed = Date.now() - this.lastRequestTime;

    if (this.requestCount > 0 && elapsed < delay) {
      await sleep(delay - elapsed);
    }

    this.lastRequestTime = Date.now();
    this.requestCount++;
  }

  /**
   * Build cookie header from stored cookies
   */
  private getCookieHeader(): string {
    const parts: string[] = [];
    for (const [key, value] of this.cookies) {
      parts.push(`${key}=${value}`);
    }
    return parts.join('; ');
  }

  /**
   * Parse and store cookies from response
   */
  private storeCookies(response: Response): void {
    const setCookie = response.headers.get('set-cookie');
    if (setCookie) {
      // Several cookies may arrive joined in one header
      const cookieStrings = setCookie.split(/,(?=\s*\w+=)/);
      for (const cookieStr of cookieStrings) {
        const match = cookieStr.match(/^([^=]+)=([^;]*)/);
        if (match) {
          this.cookies.set(match[1].trim(), match[2].trim());
        }
      }
    }
  }

  /**
   * Determine retry delay with exponential backoff + jitter
   */
  private getRetryDelayMs(attempt: number): number {
    const base = this.config.retryDelayMs * Math.pow(2, attempt);
    const jitter = Math.floor(Math.random() * 100);
    return base + jitter;
  }

  private isRetryableStatus(status: number): boolean {
    return status === 408 || status === 429 || status === 502 || status === 503 || status === 504;
  }

  /**
   * Make a request with timeout; reads are retried with backoff
   */
  private async request<T extends ApiResponse>(method: 'GET' | 'POST', params: Params): Promise<T> {
    const isWrite = method === 'POST';
    const maxRetries = isWrite ? 0 : this.config.maxRetries;

    for (let attempt = 0; ; attempt++) {
      await this.rateLimit(isWrite);

      const headers: Record<string, string> = {
        'User-Agent': this.config.userAgent,
      };

      if (this.cookies.size > 0) {
        headers['Cookie'] = this.getCookieHeader();
      }

      const query = new URLSearchParams();
      query.set('format', 'json');
      query.set('formatversion', '2');
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
          query.set(key, String(value));
        }
      }

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

      try {
        let response: Response;

        if (method === 'GET') {
          const url = new URL(this.config.apiUrl);
          url.search = query.toString();
          response = await fetch(url.toString(), { headers, signal: controller.signal });
        } else {
          headers['Content-Type'] = 'application/x-www-form-urlencoded';
          response = await fetch(this.config.apiUrl, {
            method: 'POST',
            headers,
            body: query.toString(),
            signal: controller.signal,
          });
        }

        this.storeCookies(response);

        if (!response.ok) {
          if (attempt < maxRetries && this.isRetryableStatus(response.status)) {
            await sleep(this.getRetryDelayMs(attempt));
            continue;
          }
          throw new WikiError(`HTTP ${response.status}: ${response.statusText}`);
        }

        return await response.json();
      } catch (error) {
        if (attempt < maxRetries && !(error instanceof WikiError)) {
          await sleep(this.getRetryDelayMs(attempt));
          continue;
        }
        if (error instanceof Error && error.name === 'AbortError') {
          throw new WikiError(`Request timed out after ${this.config.timeoutMs}ms`);
        }
        throw error;
      } finally {
        clearTimeout(timeout);
      }
    }
  }

  /**
   * Make a GET request to the API
   */
  async get<T extends ApiResponse = ApiResponse>(params: Params): Promise<T> {
    return this.request<T>('GET', params);
  }

  /**
   * Make a POST request to the API (never retried)
   */
  async post<T extends ApiResponse = ApiResponse>(params: Params): Promise<T> {
    return this.request<T>('POST', params);
  }

  // =========================================================================
  // Authentication
  // =========================================================================

  /**
   * Login with bot credentials
   */
  async login(username: string, password: string): Promise<void> {
    const tokenResult = await this.get<QueryResponse>({
      action: 'query',
      meta: 'tokens',
      type: 'login',
    });

    const loginToken = tokenResult.query?.tokens?.logintoken;
    if (!loginToken) {
      throw new WikiError('Failed to get login token');
    }

    const loginResult = await this.post<LoginResponse>({
      action: 'login',
      lgname: username,
      lgpassword: password,
      lgtoken: loginToken,
    });

    if (loginResult.login?.result !== 'Success') {
      throw new WikiError(`Login failed: ${loginResult.login?.reason || 'Unknown error'}`);
    }

    this.csrfToken = null; // fetched again on demand
  }

  /**
   * Get CSRF token (required for edits)
   */
  async getCsrfToken(): Promise<string> {
    if (this.csrfToken) {
      return this.csrfToken;
    }

    const result = await this.get<QueryResponse>({
      action: 'query',
      meta: 'tokens',
    });

    const token = result.query?.tokens?.csrftoken;
    if (!token) {
      throw new WikiError('Failed to get CSRF token');
    }

    this.csrfToken = token;
    return token;
  }

  // =========================================================================
  // Page queries
  // =========================================================================

  /**
   * Get the latest wikitext of a page, following redirects.
   * Returns null when the page does not exist.
   */
  async getPageContent(title: string): Promise<PageContent | null> {
    const result = await this.get<QueryResponse>({
      action: 'query',
      titles: title,
      prop: 'revisions',
      rvprop: 'content|timestamp|ids',
      rvslots: 'main',
      redirects: 1,
    });

    if (result.error) {
      throw new WikiError(`Query failed: ${result.error.info}`);
    }

    const pageInfo = result.query?.pages?.[0];
    if (!pageInfo || pageInfo.missing || pageInfo.invalid) {
      return null;
    }

    const revision = pageInfo.revisions?.[0];
    const content = revision?.slots?.main?.content;
    if (!revision || content === undefined) {
      throw new WikiError(`Missing wikitext content for ${pageInfo.title}`);
    }

    return {
      title: pageInfo.title,
      content,
      timestamp: revision.timestamp,
      revisionId: String(revision.revid),
      pageId: pageInfo.pageid ?? null,
      contentModel: revision.slots?.main?.contentmodel || 'wikitext',
    };
  }

  /**
   * Latest revision id and timestamp of a page (for conflict detection).
   * Redirects are not followed: the edit goes to this exact title.
   */
  async getCurrentRevision(title: string): Promise<RevisionInfo | null> {
    const result = await this.get<QueryResponse>({
      action: 'query',
      titles: title,
      prop: 'revisions',
      rvprop: 'timestamp|ids',
    });

    if (result.error) {
      throw new WikiError(`Query failed: ${result.error.info}`);
    }

    const pageInfo = result.query?.pages?.[0];
    if (!pageInfo) {
      throw new WikiError(`No page returned for ${title}`);
    }
    if (pageInfo.invalid) {
      throw new WikiError(`Invalid title: ${title}`);
    }
    if (pageInfo.missing) {
      return null;
    }

    const revision = pageInfo.revisions?.[0];
    if (!revision) {
      throw new WikiError(`No revisions found for ${title}`);
    }

    return { revisionId: String(revision.revid), timestamp: revision.timestamp };
  }

  // =========================================================================
  // Write operations
  // =========================================================================

  async prepareEdit(): Promise<void> {
    await this.getCsrfToken();
  }

  /**
   * Submit an edit based on a known revision.
   *
   * The server rejects the edit if the page changed since `baseRevisionId`
   * (or, for a new page, if it was created meanwhile).
   */
  async submitEdit(request: EditRequest): Promise<EditSubmission> {
    const token = await this.getCsrfToken();

    const params: Params = {
      action: 'edit',
      title: request.title,
      text: request.text,
      summary: request.summary,
      token,
    };

    if (request.baseRevisionId === null) {
      params.createonly = 1;
    } else {
      params.baserevid = request.baseRevisionId;
      params.nocreate = 1;
    }
    if (request.minor) {
      params.minor = 1;
    }

    const result = await this.post<EditResponse>(params);

    if (result.error) {
      const { code, info } = result.error;
      if (CONFLICT_CODES.has(code)) {
        return { kind: 'conflict', code };
      }
      return { kind: 'rejected', code, reason: info };
    }

    const edit = result.edit;
    if (!edit || edit.result !== 'Success') {
      return { kind: 'rejected', code: 'failure', reason: 'Edit was not saved' };
    }

    if (edit.nochange) {
      return {
        kind: 'saved',
        newRevisionId: request.baseRevisionId ?? '',
        unchanged: true,
      };
    }

    if (edit.newrevid === undefined) {
      return { kind: 'rejected', code: 'failure', reason: 'Edit response has no revision id' };
    }

    return { kind: 'saved', newRevisionId: String(edit.newrevid), unchanged: false };
  }
}

/**
 * Create a client for a language edition from settings
 */
export function createClientFromSettings(settings: Settings, lang: string): MediaWikiClient {
  return new MediaWikiClient({
    apiUrl: apiUrlFor(settings, lang),
    userAgent: settings.userAgent,
    rateLimitReadMs: settings.http.rateLimitReadMs,
    rateLimitWriteMs: settings.http.rateLimitWriteMs,
    timeoutMs: settings.http.timeoutMs,
    maxRetries: settings.http.retries,
    retryDelayMs: settings.http.retryDelayMs,
  });
}

/**
 * Create a client and log in
 */
export async function createAuthenticatedClient(settings: Settings, lang: string): Promise<MediaWikiClient> {
  const { username, password } = settings;

  if (!username || !password) {
    throw new WikiError('WKP_USERNAME and WKP_PASSWORD environment variables required');
  }

  const client = createClientFromSettings(settings, lang);
  await client.login(username, password);
  return client;
}

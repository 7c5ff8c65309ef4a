/**
 * LibreTranslate service
 *
 * HTTP client for a LibreTranslate-compatible `/translate` endpoint.
 * Uses native fetch().
 */

import type { TranslationRequest, TranslationService } from './adapter.js';

export const DEFAULT_TRANSLATE_URL = 'https://libretranslate.de/translate';

export interface LibreTranslateConfig {
  /** Endpoint URL (default: public libretranslate.de instance) */
  endpoint?: string;
  /** API key, for instances that require one */
  apiKey?: string;
  userAgent?: string;
}

interface LibreTranslateResponse {
  translatedText?: unknown;
  error?: unknown;
}

export class LibreTranslateService implements TranslationService {
  readonly name = 'libretranslate';
  private endpoint: string;
  private apiKey?: string;
  private userAgent?: string;

  constructor(config: LibreTranslateConfig = {}) {
    this.endpoint = config.endpoint || DEFAULT_TRANSLATE_URL;
    this.apiKey = config.apiKey;
    this.userAgent = config.userAgent;
  }

  async translate(request: TranslationRequest, signal: AbortSignal): Promise<string> {
    const payload: Record<string, string> = {
      q: request.text,
      source: request.sourceLang,
      target: request.targetLang,
      format: 'text',
    };
    if (this.apiKey) {
      payload.api_key = this.apiKey;
    }

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent;
    }

    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers,
      body: JSON.stringify(payload),
      signal,
    });

    const data = await readJson(response);

    if (!response.ok) {
      const detail = typeof data?.error === 'string' ? `: ${data.error}` : '';
      throw new Error(`HTTP ${response.status}${detail}`);
    }

    if (typeof data?.translatedText !== 'string') {
      throw new Error('Translation API response missing translatedText');
    }

    return data.translatedText;
  }
}

async function readJson(response: Response): Promise<LibreTranslateResponse | null> {
  try {
    const data: unknown = await response.json();
    if (typeof data !== 'object' || data === null) return null;
    return {
      translatedText: 'translatedText' in data ? data.translatedText : undefined,
      error: 'error' in data ? data.error : undefined,
    };
  } catch {
    return null;
  }
}

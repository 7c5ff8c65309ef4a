/**
 * Wiki article URLs
 */

export class WikiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WikiError';
  }
}

export interface ParsedWikiUrl {
  /** Language edition (subdomain) */
  lang: string;
  title: string;
}

/**
 * Parse a Wikipedia article URL.
 *
 * Supports `https://xx.wikipedia.org/wiki/Title` and
 * `https://xx.wikipedia.org/w/index.php?title=Title`. Underscores in the
 * title become spaces.
 *
 * @throws WikiError for other hosts or URLs without a title
 */
export function parseWikiUrl(url: string): ParsedWikiUrl {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new WikiError(`Invalid URL: ${url}`);
  }

  const hostParts = parsed.hostname.toLowerCase().split('.');
  if (hostParts.length < 3 || hostParts.slice(-2).join('.') !== 'wikipedia.org') {
    throw new WikiError(`Unsupported host: ${parsed.hostname}`);
  }

  // xx.wikipedia.org and the mobile xx.m.wikipedia.org
  const lang = hostParts[0];

  let title: string | null = null;
  if (parsed.pathname.startsWith('/wiki/')) {
    title = safeDecode(parsed.pathname.slice('/wiki/'.length));
  } else {
    title = parsed.searchParams.get('title');
  }

  if (!title) {
    throw new WikiError(`Could not parse title from URL: ${url}`);
  }

  return { lang, title: title.replace(/_/g, ' ').trim() };
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    throw new WikiError(`Malformed title encoding: ${value}`);
  }
}

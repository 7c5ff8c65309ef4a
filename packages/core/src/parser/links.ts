/**
 * Wikilink parsing
 *
 * Splits a `[[...]]` link into its kind, normalized target and display
 * text. Used to compare the link targets of two versions of a document.
 */

import type { Segment } from './segments.js';

export interface ParsedLink {
  type: 'internal' | 'interwiki' | 'category' | 'file';
  target: string;
  displayText?: string;
  raw: string;
}

const INTERLANGUAGE_PREFIX = /^[a-z]{2,3}(-[a-z]{2,8})*$/;

/**
 * Parse a link; `raw` may include the surrounding brackets
 */
export function parseLink(raw: string): ParsedLink | null {
  let target = raw;
  if (target.startsWith('[[') && target.endsWith(']]')) {
    target = target.slice(2, -2);
  }
  let displayText: string | undefined;

  // Leading colon forces a plain link
  const forced = target.startsWith(':');
  if (forced) target = target.slice(1);

  // [[Page|display]] → Page
  const pipeIdx = target.indexOf('|');
  if (pipeIdx !== -1) {
    displayText = target.slice(pipeIdx + 1);
    target = target.slice(0, pipeIdx);
  }

  // [[Page#Section]] → Page
  const hashIdx = target.indexOf('#');
  if (hashIdx !== -1) {
    target = target.slice(0, hashIdx);
  }

  target = target.replace(/_/g, ' ').replace(/\s+/g, ' ').trim();
  if (!target) return null;

  const colonIdx = target.indexOf(':');
  if (colonIdx > 0) {
    const prefix = target.slice(0, colonIdx).trim().toLowerCase();
    const rest = target.slice(colonIdx + 1).trim();

    if (!forced && (prefix === 'file' || prefix === 'image')) {
      return { type: 'file', target: `File:${upperFirst(rest)}`, displayText, raw };
    }

    if (prefix === 'category') {
      return forced
        ? { type: 'internal', target: `Category:${upperFirst(rest)}`, displayText, raw }
        : { type: 'category', target: upperFirst(rest), raw };
    }

    if (INTERLANGUAGE_PREFIX.test(prefix)) {
      return { type: 'interwiki', target: `${prefix}:${rest}`, displayText, raw };
    }

    return { type: 'internal', target: `${upperFirst(target.slice(0, colonIdx).trim())}:${rest}`, displayText, raw };
  }

  return { type: 'internal', target: upperFirst(target), displayText, raw };
}

/**
 * Normalized targets of every wikilink segment, in document order
 */
export function linkTargets(segments: readonly Segment[]): string[] {
  const targets: string[] = [];
  for (const segment of segments) {
    if (segment.kind !== 'wikilink') continue;
    const link = parseLink(segment.raw);
    if (link) {
      targets.push(link.type === 'category' ? `Category:${link.target}` : link.target);
    }
  }
  return targets;
}

function upperFirst(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

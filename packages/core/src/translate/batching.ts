/**
 * Translation unit batching
 *
 * Groups protected text into requests that respect the translation
 * service's size limit. Units break between segments, so a token is never
 * cut in half.
 */

import type { ProtectedDocument } from './placeholders.js';

export const DEFAULT_MAX_CHARS = 4500;

export interface TranslationUnit {
  id: number;
  sourceLang: string;
  targetLang: string;
  text: string;
  /** Segments whose protected text is (partly) in this unit */
  segmentIndexes: number[];
  /** Placeholder tokens contained in `text` */
  tokens: string[];
}

export interface UnitOptions {
  sourceLang: string;
  targetLang: string;
  /** Character budget per unit */
  maxChars?: number;
}

export function buildUnits(doc: ProtectedDocument, options: UnitOptions): TranslationUnit[] {
  const maxChars = Math.max(1, options.maxChars ?? DEFAULT_MAX_CHARS);
  const units: TranslationUnit[] = [];

  let text = '';
  let segmentIndexes: number[] = [];
  let tokens: string[] = [];

  const flush = () => {
    if (text.length === 0) return;
    units.push({
      id: units.length,
      sourceLang: options.sourceLang,
      targetLang: options.targetLang,
      text,
      segmentIndexes,
      tokens,
    });
    text = '';
    segmentIndexes = [];
    tokens = [];
  };

  for (const piece of doc.pieces) {
    const split = piece.kind === 'plain_text' && piece.text.length > maxChars;
    const chunks = split ? splitPlainText(piece.text, maxChars, piece.tokens) : [piece.text];

    for (const chunk of chunks) {
      if (text.length > 0 && text.length + chunk.length > maxChars) {
        flush();
      }
      text += chunk;
      if (segmentIndexes[segmentIndexes.length - 1] !== piece.segmentIndex) {
        segmentIndexes.push(piece.segmentIndex);
      }
      tokens.push(...(split ? piece.tokens.filter(token => chunk.includes(token)) : piece.tokens));
    }
  }

  flush();
  return units;
}

/**
 * Split a run of plain text into chunks of at most `maxChars`, preferring
 * line breaks, then whitespace. None of `tokens` is cut in half; a token
 * longer than the budget gets a chunk of its own.
 */
export function splitPlainText(text: string, maxChars: number, tokens: readonly string[] = []): string[] {
  const chunks: string[] = [];
  let rest = text;

  while (rest.length > maxChars) {
    const window = rest.slice(0, maxChars);
    let cut = window.lastIndexOf('\n') + 1;
    if (cut <= 0) {
      cut = lastWhitespace(window) + 1;
    }
    if (cut <= 0) {
      cut = maxChars;
    }
    cut = avoidTokens(rest, cut, tokens);
    chunks.push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }

  if (rest.length > 0) {
    chunks.push(rest);
  }
  return chunks;
}

/** Move a cut inside a token to the token's start, or its end when it opens the text */
function avoidTokens(text: string, cut: number, tokens: readonly string[]): number {
  for (const token of tokens) {
    const at = text.indexOf(token);
    if (at !== -1 && at < cut && cut < at + token.length) {
      return at > 0 ? at : at + token.length;
    }
  }
  return cut;
}

function lastWhitespace(text: string): number {
  for (let i = text.length - 1; i >= 0; i--) {
    const ch = text[i];
    if (ch === ' ' || ch === '\t') return i;
  }
  return -1;
}

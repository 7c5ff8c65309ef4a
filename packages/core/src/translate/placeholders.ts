/**
 * Placeholder mapper
 *
 * Replaces protected markup with short opaque tokens before text is sent to
 * a translation service. Each pipeline run owns its own context and table.
 */

import type { Segment, SegmentKind } from '../parser/segments.js';
import { joinSegments } from '../parser/segments.js';

export interface DelimiterPair {
  open: string;
  close: string;
}

/** Candidate delimiters, first one absent from the document wins */
export const DELIMITER_PAIRS: readonly DelimiterPair[] = [
  { open: '⟦', close: '⟧' },
  { open: '⟪', close: '⟫' },
  { open: '⦃', close: '⦄' },
  { open: '〚', close: '〛' },
];

export class PlaceholderCollisionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlaceholderCollisionError';
  }
}

export interface PlaceholderEntry {
  token: string;
  segmentIndex: number;
  kind: SegmentKind;
  /** Original text the token stands for */
  text: string;
  /** Position of the token among the tokens of its segment */
  order: number;
}

/**
 * Token table for a single document
 */
export class PlaceholderTable {
  readonly delimiters: DelimiterPair;
  private entries: Map<string, PlaceholderEntry> = new Map();

  constructor(delimiters: DelimiterPair) {
    this.delimiters = delimiters;
  }

  add(entry: PlaceholderEntry): void {
    if (this.entries.has(entry.token)) {
      throw new Error(`Duplicate placeholder token ${entry.token}`);
    }
    this.entries.set(entry.token, entry);
  }

  get(token: string): PlaceholderEntry | undefined {
    return this.entries.get(token);
  }

  has(token: string): boolean {
    return this.entries.has(token);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Tokens in the order they were minted */
  tokens(): string[] {
    return Array.from(this.entries.keys());
  }

  formatToken(id: number): string {
    return `${this.delimiters.open}${id}${this.delimiters.close}`;
  }

  /**
   * Pattern for token-shaped strings. Whitespace inside the delimiters is
   * tolerated; group 1 is the numeric id.
   */
  tokenPattern(): RegExp {
    const open = escapeRegExp(this.delimiters.open);
    const close = escapeRegExp(this.delimiters.close);
    return new RegExp(`${open}\\s*(\\d+)\\s*${close}`, 'gu');
  }
}

/**
 * Per-run placeholder state: the chosen delimiters and the token counter
 */
export class PlaceholderContext {
  readonly table: PlaceholderTable;
  private counter: number = 0;

  constructor(document: string) {
    const delimiters = DELIMITER_PAIRS.find(
      pair => !document.includes(pair.open) && !document.includes(pair.close)
    );
    if (!delimiters) {
      throw new PlaceholderCollisionError(
        'Document already contains every placeholder delimiter; cannot protect markup'
      );
    }
    this.table = new PlaceholderTable(delimiters);
  }

  mint(segment: Segment, text: string, order: number): string {
    const token = this.table.formatToken(this.counter++);
    this.table.add({
      token,
      segmentIndex: segment.index,
      kind: segment.kind,
      text,
      order,
    });
    return token;
  }
}

/** Protected text of one segment */
export interface ProtectedPiece {
  segmentIndex: number;
  kind: SegmentKind;
  text: string;
  tokens: string[];
}

export interface ProtectedDocument {
  text: string;
  table: PlaceholderTable;
  pieces: ProtectedPiece[];
}

/**
 * Substitute protected markup with tokens.
 *
 * Opaque segments become one token; segments with translatable spans keep
 * their spans inline and get one token per gap between spans. For plain
 * text the gaps are its formatting markup (quotes, list markers).
 */
export function protect(
  segments: readonly Segment[],
  context: PlaceholderContext = new PlaceholderContext(joinSegments(segments))
): ProtectedDocument {
  const pieces: ProtectedPiece[] = [];

  for (const segment of segments) {
    const tokens: string[] = [];
    let text = '';
    let cursor = 0;

    const protectGap = (end: number) => {
      if (end > cursor) {
        const token = context.mint(segment, segment.raw.slice(cursor, end), tokens.length);
        tokens.push(token);
        text += token;
      }
    };

    for (const span of segment.translatable) {
      protectGap(span.offset);
      text += segment.raw.slice(span.offset, span.offset + span.length);
      cursor = span.offset + span.length;
    }
    protectGap(segment.raw.length);

    pieces.push({ segmentIndex: segment.index, kind: segment.kind, text, tokens });
  }

  return {
    text: pieces.map(p => p.text).join(''),
    table: context.table,
    pieces,
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

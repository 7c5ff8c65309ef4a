/**
 * Wikitext segment model
 *
 * A document is partitioned into an ordered list of segments. Joining the
 * raw text of every segment gives back the document unchanged.
 */

export type SegmentKind =
  | 'plain_text'
  | 'template'
  | 'wikilink'
  | 'external_link'
  | 'html_tag'
  | 'heading'
  | 'table'
  | 'reference'
  | 'comment';

/** Range inside a segment's raw text */
export interface TextSpan {
  offset: number;
  length: number;
}

export interface Segment {
  /** Position in the segment list */
  index: number;
  kind: SegmentKind;
  /** Offset of `raw` in the source document */
  start: number;
  raw: string;
  /** Prose ranges inside `raw` that may be translated, in order */
  translatable: TextSpan[];
}

export interface MarkupWarning {
  code: 'malformed_markup';
  kind: SegmentKind;
  offset: number;
  message: string;
}

export interface TokenizeResult {
  segments: Segment[];
  warnings: MarkupWarning[];
}

export function joinSegments(segments: readonly Segment[]): string {
  let out = '';
  for (const segment of segments) {
    out += segment.raw;
  }
  return out;
}

export function spanText(segment: Segment, span: TextSpan): string {
  return segment.raw.slice(span.offset, span.offset + span.length);
}

/**
 * Parser module exports
 */

export {
  joinSegments,
  spanText,
  type Segment,
  type SegmentKind,
  type TextSpan,
  type MarkupWarning,
  type TokenizeResult,
} from './segments.js';

export { tokenize, OPAQUE_TAGS } from './tokenizer.js';

export { parseLink, linkTargets, type ParsedLink } from './links.js';

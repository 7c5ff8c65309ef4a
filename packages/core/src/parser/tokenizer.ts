/**
 * Wikitext tokenizer
 *
 * Splits wikitext into typed segments with a single left-to-right scan.
 * Nested constructs (templates inside templates, links inside file
 * captions, tables inside tables) are matched with depth counters rather
 * than regular expressions.
 *
 * Scope: segmentation for translation - NOT a full wikitext parser.
 */

import type { MarkupWarning, Segment, SegmentKind, TextSpan, TokenizeResult } from './segments.js';

/** Extension tags whose body is kept verbatim */
export const OPAQUE_TAGS: ReadonlySet<string> = new Set([
  'nowiki', 'pre', 'code', 'syntaxhighlight', 'source', 'math', 'chem', 'score',
  'gallery', 'timeline', 'graph', 'templatedata', 'imagemap', 'mapframe',
  'maplink', 'poem', 'references', 'inputbox', 'categorytree',
]);

/** Formatting tags: the tags are protected, their content stays in the prose flow */
const PROSE_TAGS = new Set([
  'b', 'i', 'u', 's', 'strike', 'small', 'big', 'sup', 'sub', 'span', 'div',
  'center', 'blockquote', 'p', 'abbr', 'em', 'strong', 'cite', 'q', 'font',
  'ins', 'del', 'mark', 'kbd', 'var', 'tt', 'bdi', 'ol', 'ul', 'li', 'dl',
  'dt', 'dd',
]);

const VOID_TAGS = new Set(['br', 'hr', 'wbr']);

const URL_SCHEMES = ['http://', 'https://', 'ftp://', 'ftps://', 'mailto:', 'news:', 'irc://', 'ircs://', '//'];

const IMAGE_OPTIONS = new Set([
  'thumb', 'thumbnail', 'frame', 'framed', 'frameless', 'border', 'left', 'right',
  'center', 'centre', 'none', 'upright', 'baseline', 'sub', 'super', 'top',
  'text-top', 'middle', 'bottom', 'text-bottom',
]);

const IMAGE_OPTION_PREFIXES = ['upright=', 'alt=', 'link=', 'page=', 'class=', 'lang=', 'thumb=', 'thumbnail='];

const KIND_LABELS: Record<SegmentKind, string> = {
  plain_text: 'text',
  template: 'template',
  wikilink: 'wikilink',
  external_link: 'external link',
  html_tag: 'tag',
  heading: 'heading',
  table: 'table',
  reference: 'reference',
  comment: 'comment',
};

interface ScanContext {
  /** Nested scans (link labels, heading text) skip line-level constructs */
  nested: boolean;
  warnings: MarkupWarning[];
}

interface Match {
  kind: SegmentKind;
  end: number;
  translatable: TextSpan[];
  unterminated: boolean;
}

/**
 * Tokenize wikitext into segments.
 *
 * Never throws: unterminated markup is closed at the end of input as an
 * opaque segment and reported as a warning.
 */
export function tokenize(wikitext: string): TokenizeResult {
  const warnings: MarkupWarning[] = [];
  const segments = scan(wikitext, { nested: false, warnings });
  return { segments, warnings };
}

function scan(text: string, ctx: ScanContext): Segment[] {
  const segments: Segment[] = [];
  const len = text.length;
  let plainStart = 0;
  let i = 0;

  const push = (kind: SegmentKind, start: number, end: number, translatable: TextSpan[]) => {
    segments.push({
      index: segments.length,
      kind,
      start,
      raw: text.slice(start, end),
      translatable,
    });
  };

  while (i < len) {
    const match = matchConstruct(text, i, ctx);
    if (!match) {
      i++;
      continue;
    }

    if (i > plainStart) {
      push('plain_text', plainStart, i, plainSpans(text.slice(plainStart, i), plainStart, text, ctx));
    }

    if (match.unterminated) {
      ctx.warnings.push({
        code: 'malformed_markup',
        kind: match.kind,
        offset: i,
        message: `Unterminated ${KIND_LABELS[match.kind]} at offset ${i}; kept the remainder as-is`,
      });
    }

    push(match.kind, i, match.end, match.translatable);
    i = match.end;
    plainStart = i;
  }

  if (len > plainStart) {
    push('plain_text', plainStart, len, plainSpans(text.slice(plainStart), plainStart, text, ctx));
  }

  return segments;
}

function matchConstruct(text: string, i: number, ctx: ScanContext): Match | null {
  const ch = text[i];

  if (ch === '<') {
    return matchComment(text, i) ?? matchTag(text, i);
  }

  if (ch === '{') {
    if (!ctx.nested && text[i + 1] === '|' && isLineStart(text, i, true)) {
      return matchTable(text, i);
    }
    if (text[i + 1] === '{') {
      return matchTemplate(text, i);
    }
    return null;
  }

  if (ch === '[') {
    if (text[i + 1] === '[') {
      return matchWikilink(text, i);
    }
    return matchExternalLink(text, i);
  }

  if (ch === '=' && !ctx.nested && isLineStart(text, i, false)) {
    return matchHeading(text, i);
  }

  return null;
}

// ===========================================================================
// Comments and tags
// ===========================================================================

function matchComment(text: string, i: number): Match | null {
  if (!startsWith(text, i, '<!--')) return null;
  const close = text.indexOf('-->', i + 4);
  if (close === -1) {
    return opaque('comment', text.length, true);
  }
  return opaque('comment', close + 3, false);
}

function matchTag(text: string, i: number): Match | null {
  const closing = text[i + 1] === '/';
  const nameStart = closing ? i + 2 : i + 1;
  const name = readTagName(text, nameStart);
  if (!name) return null;

  const lower = name.toLowerCase();
  const known = lower === 'ref' || OPAQUE_TAGS.has(lower) || PROSE_TAGS.has(lower) || VOID_TAGS.has(lower);
  if (!known) return null;

  const afterName = nameStart + name.length;
  const boundary = text[afterName];
  if (boundary !== '>' && boundary !== '/' && !isWhitespace(boundary)) return null;

  const openEnd = findTagEnd(text, afterName);
  if (openEnd === -1) return null;

  // Stray closing tags are protected on their own
  if (closing) {
    return opaque('html_tag', openEnd + 1, false);
  }

  const selfClosing = text[openEnd - 1] === '/';

  if (lower === 'ref' || OPAQUE_TAGS.has(lower)) {
    const kind: SegmentKind = lower === 'ref' ? 'reference' : 'html_tag';
    if (selfClosing) {
      return opaque(kind, openEnd + 1, false);
    }
    const end = findClosingTag(text, openEnd + 1, lower);
    if (end === -1) {
      return opaque(kind, text.length, true);
    }
    return opaque(kind, end, false);
  }

  return opaque('html_tag', openEnd + 1, false);
}

/**
 * Find the end of the matching `</name>` for an opened tag, counting nested
 * tags of the same name. Returns the index after the closing tag or -1.
 */
function findClosingTag(text: string, from: number, name: string): number {
  let depth = 1;
  let i = from;
  const len = text.length;

  while (i < len) {
    if (text[i] !== '<') {
      i++;
      continue;
    }

    if (startsWith(text, i, '<!--')) {
      const close = text.indexOf('-->', i + 4);
      if (close === -1) return -1;
      i = close + 3;
      continue;
    }

    const closing = text[i + 1] === '/';
    const nameStart = closing ? i + 2 : i + 1;
    const tagName = readTagName(text, nameStart);
    if (!tagName || tagName.toLowerCase() !== name) {
      i++;
      continue;
    }

    const afterName = nameStart + tagName.length;
    const boundary = text[afterName];
    if (boundary !== '>' && boundary !== '/' && !isWhitespace(boundary)) {
      i++;
      continue;
    }

    const tagEnd = findTagEnd(text, afterName);
    if (tagEnd === -1) {
      i++;
      continue;
    }

    if (closing) {
      depth--;
      if (depth === 0) return tagEnd + 1;
    } else if (text[tagEnd - 1] !== '/') {
      depth++;
    }
    i = tagEnd + 1;
  }

  return -1;
}

/** Index of the `>` closing a tag, or -1 when another `<` or a blank line comes first */
function findTagEnd(text: string, from: number): number {
  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (ch === '>') return i;
    if (ch === '<') return -1;
    if (ch === '\n' && text[i + 1] === '\n') return -1;
  }
  return -1;
}

function readTagName(text: string, start: number): string {
  let i = start;
  if (!isAsciiLetter(text[i])) return '';
  while (i < text.length && (isAsciiLetter(text[i]) || isDigit(text[i]))) i++;
  return text.slice(start, i);
}

// ===========================================================================
// Templates and tables
// ===========================================================================

function matchTemplate(text: string, i: number): Match {
  const end = findTemplateEnd(text, i);
  if (end === -1) {
    return opaque('template', text.length, true);
  }
  return opaque('template', end, false);
}

/**
 * Find the end of a `{{...}}` or `{{{...}}}` construct starting at `start`.
 * Template and parameter braces are counted separately.
 */
function findTemplateEnd(text: string, start: number): number {
  const len = text.length;
  let depth = 0;
  let paramDepth = 0;
  let i = start;

  if (startsWith(text, i, '{{{')) {
    paramDepth = 1;
    i += 3;
  } else {
    depth = 1;
    i += 2;
  }

  while (i < len) {
    if (text[i] === '<') {
      const skip = skipOpaqueTag(text, i);
      if (skip === -1) return -1;
      if (skip !== null) {
        i = skip;
        continue;
      }
    }

    if (startsWith(text, i, '{{{')) {
      paramDepth++;
      i += 3;
      continue;
    }

    if (startsWith(text, i, '{{')) {
      depth++;
      i += 2;
      continue;
    }

    if (paramDepth > 0 && startsWith(text, i, '}}}')) {
      paramDepth--;
      i += 3;
      if (depth === 0 && paramDepth === 0) return i;
      continue;
    }

    if (startsWith(text, i, '}}')) {
      if (depth > 0) depth--;
      i += 2;
      if (depth === 0 && paramDepth === 0) return i;
      continue;
    }

    i++;
  }

  return -1;
}

/**
 * Skip a comment, reference or opaque extension tag inside another construct.
 * Returns the index after it, null when nothing is skipped, or -1 when it
 * never closes.
 */
function skipOpaqueTag(text: string, i: number): number | null {
  if (startsWith(text, i, '<!--')) {
    const close = text.indexOf('-->', i + 4);
    return close === -1 ? -1 : close + 3;
  }

  const name = readTagName(text, i + 1);
  if (!name) return null;
  const lower = name.toLowerCase();
  if (lower !== 'ref' && !OPAQUE_TAGS.has(lower)) return null;

  const afterName = i + 1 + name.length;
  const boundary = text[afterName];
  if (boundary !== '>' && boundary !== '/' && !isWhitespace(boundary)) return null;

  const openEnd = findTagEnd(text, afterName);
  if (openEnd === -1) return null;
  if (text[openEnd - 1] === '/') return openEnd + 1;

  return findClosingTag(text, openEnd + 1, lower);
}

function matchTable(text: string, i: number): Match {
  const len = text.length;
  let depth = 1;
  let j = i + 2;
  let lineStart = false;

  while (j < len) {
    const ch = text[j];

    if (ch === '\n') {
      lineStart = true;
      j++;
      continue;
    }

    if (lineStart && (ch === ' ' || ch === '\t')) {
      j++;
      continue;
    }

    if (lineStart && startsWith(text, j, '{|')) {
      depth++;
      j += 2;
      lineStart = false;
      continue;
    }

    if (lineStart && startsWith(text, j, '|}')) {
      depth--;
      j += 2;
      lineStart = false;
      if (depth === 0) return opaque('table', j, false);
      continue;
    }

    lineStart = false;

    if (ch === '<') {
      const skip = skipOpaqueTag(text, j);
      if (skip === -1) break;
      if (skip !== null) {
        j = skip;
        continue;
      }
    }

    if (startsWith(text, j, '{{')) {
      const end = findTemplateEnd(text, j);
      if (end === -1) break;
      j = end;
      continue;
    }

    j++;
  }

  return opaque('table', len, true);
}

// ===========================================================================
// Links
// ===========================================================================

function matchWikilink(text: string, i: number): Match {
  const len = text.length;
  let depth = 1;
  let j = i + 2;

  while (j < len) {
    if (startsWith(text, j, '<!--')) {
      const close = text.indexOf('-->', j + 4);
      if (close === -1) break;
      j = close + 3;
      continue;
    }
    if (startsWith(text, j, '[[')) {
      depth++;
      j += 2;
      continue;
    }
    if (startsWith(text, j, ']]')) {
      depth--;
      j += 2;
      if (depth === 0) {
        const raw = text.slice(i, j);
        return { kind: 'wikilink', end: j, translatable: wikilinkSpans(raw), unterminated: false };
      }
      continue;
    }
    j++;
  }

  return opaque('wikilink', len, true);
}

/** Translatable ranges of a complete `[[...]]` link */
function wikilinkSpans(raw: string): TextSpan[] {
  const inner = raw.slice(2, -2);
  const parts = splitTopLevelPipes(inner);
  if (parts.length < 2) return [];

  let target = parts[0].text.trim();
  const forced = target.startsWith(':');
  if (forced) target = target.slice(1).trim();

  const colon = target.indexOf(':');
  const prefix = colon > 0 ? target.slice(0, colon).trim() : '';
  const prefixLower = prefix.toLowerCase();

  if (!forced && prefixLower === 'category') return [];
  if (!forced && /^[a-z]{2,3}(-[a-z]{2,8})*$/.test(prefixLower)) return [];

  if (!forced && (prefixLower === 'file' || prefixLower === 'image')) {
    const caption = parts[parts.length - 1];
    if (isImageOption(caption.text)) return [];
    return proseSpans(caption.text, 2 + caption.offset);
  }

  const display = parts[1];
  const label = inner.slice(display.offset);
  return proseSpans(label, 2 + display.offset);
}

function isImageOption(part: string): boolean {
  const value = part.trim().toLowerCase();
  if (!value) return true;
  if (IMAGE_OPTIONS.has(value)) return true;
  if (/^(\d+)?(x\d+)?px$/.test(value)) return true;
  return IMAGE_OPTION_PREFIXES.some(prefix => value.startsWith(prefix));
}

function matchExternalLink(text: string, i: number): Match | null {
  const schemeStart = i + 1;
  const scheme = URL_SCHEMES.find(s => startsWithIgnoreCase(text, schemeStart, s));
  if (!scheme) return null;

  let close = -1;
  for (let j = schemeStart + scheme.length; j < text.length; j++) {
    const ch = text[j];
    if (ch === '\n') break;
    if (ch === ']') {
      close = j;
      break;
    }
  }
  if (close === -1) return null;

  const inner = text.slice(i + 1, close);
  let space = -1;
  for (let j = 0; j < inner.length; j++) {
    if (inner[j] === ' ' || inner[j] === '\t') {
      space = j;
      break;
    }
  }

  const translatable = space === -1 ? [] : proseSpans(inner.slice(space + 1), 1 + space + 1);
  return { kind: 'external_link', end: close + 1, translatable, unterminated: false };
}

// ===========================================================================
// Headings
// ===========================================================================

function matchHeading(text: string, i: number): Match | null {
  let lineEnd = text.indexOf('\n', i);
  if (lineEnd === -1) lineEnd = text.length;

  // Comments after the closing `=` run still end the heading
  let bodyEnd = lineEnd;
  for (;;) {
    while (bodyEnd > i && isWhitespace(text[bodyEnd - 1])) bodyEnd--;
    if (bodyEnd - i < 4 || !text.startsWith('-->', bodyEnd - 3)) break;
    const open = text.lastIndexOf('<!--', bodyEnd - 3);
    if (open < i || text.indexOf('-->', open + 4) !== bodyEnd - 3) break;
    bodyEnd = open;
  }
  const body = text.slice(i, bodyEnd);

  let leading = 0;
  while (leading < body.length && body[leading] === '=') leading++;
  let trailing = 0;
  while (trailing < body.length && body[body.length - 1 - trailing] === '=') trailing++;

  let level = Math.min(leading, trailing, 6);
  while (level > 0 && body.length <= level * 2) level--;
  if (level === 0) return null;

  const interior = body.slice(level, body.length - level);
  if (!interior.trim()) return null;

  return {
    kind: 'heading',
    end: lineEnd,
    translatable: proseSpans(interior, level),
    unterminated: false,
  };
}

// ===========================================================================
// Inline formatting
// ===========================================================================

/**
 * Prose ranges of a plain-text run. Bold and italic quotes and behavior
 * switches are left out; so are list and indent markers, horizontal rules
 * and redirects at the start of a line.
 */
function plainSpans(raw: string, start: number, text: string, ctx: ScanContext): TextSpan[] {
  const spans: TextSpan[] = [];
  let proseStart = 0;
  let i = 0;

  while (i < raw.length) {
    const lineStart = !ctx.nested && (i === 0 ? isLineStart(text, start, false) : raw[i - 1] === '\n');
    let end = lineStart ? lineMarkupEnd(raw, i) : -1;
    if (end === -1) end = inlineMarkupEnd(raw, i);
    if (end === -1) {
      i++;
      continue;
    }

    if (i > proseStart) {
      spans.push({ offset: proseStart, length: i - proseStart });
    }
    i = end;
    proseStart = end;
  }

  if (raw.length > proseStart) {
    spans.push({ offset: proseStart, length: raw.length - proseStart });
  }
  return spans;
}

const REDIRECT = /#redirect[ \t]*:?/iy;
const HORIZONTAL_RULE = /-{4,}/y;
const LIST_MARKERS = /[*#:;]+[ \t]*/y;
const BEHAVIOR_SWITCH = /__[A-Z]+__/y;

/** End of the line-start markup at `i`, or -1 */
function lineMarkupEnd(raw: string, i: number): number {
  for (const pattern of [REDIRECT, HORIZONTAL_RULE, LIST_MARKERS]) {
    const end = stickyMatchEnd(pattern, raw, i);
    if (end !== -1) return end;
  }
  return -1;
}

function inlineMarkupEnd(raw: string, i: number): number {
  if (raw[i] === "'" && raw[i + 1] === "'") {
    let j = i + 2;
    while (raw[j] === "'") j++;
    return j;
  }
  if (raw[i] === '_') {
    return stickyMatchEnd(BEHAVIOR_SWITCH, raw, i);
  }
  return -1;
}

function stickyMatchEnd(pattern: RegExp, raw: string, i: number): number {
  pattern.lastIndex = i;
  const match = pattern.exec(raw);
  return match ? i + match[0].length : -1;
}

// ===========================================================================
// Helpers
// ===========================================================================

/**
 * Prose ranges of a fragment (link label, heading text): the fragment is
 * tokenized on its own and only the prose of its plain-text runs counts,
 * trimmed at the edges of each run.
 */
function proseSpans(fragment: string, base: number): TextSpan[] {
  const spans: TextSpan[] = [];
  const segments = scan(fragment, { nested: true, warnings: [] });

  for (const segment of segments) {
    if (segment.kind !== 'plain_text') continue;
    const raw = segment.raw;
    let from = 0;
    let to = raw.length;
    while (from < to && isWhitespace(raw[from])) from++;
    while (to > from && isWhitespace(raw[to - 1])) to--;

    for (const span of segment.translatable) {
      const spanFrom = Math.max(span.offset, from);
      const spanTo = Math.min(span.offset + span.length, to);
      if (spanTo > spanFrom) {
        spans.push({ offset: base + segment.start + spanFrom, length: spanTo - spanFrom });
      }
    }
  }

  return spans;
}

interface PipePart {
  text: string;
  offset: number;
}

/** Split on `|` outside nested links, templates and comments */
function splitTopLevelPipes(input: string): PipePart[] {
  const parts: PipePart[] = [];
  let partStart = 0;
  let linkDepth = 0;
  let braceDepth = 0;
  let i = 0;

  while (i < input.length) {
    if (startsWith(input, i, '<!--')) {
      const close = input.indexOf('-->', i + 4);
      i = close === -1 ? input.length : close + 3;
      continue;
    }
    if (startsWith(input, i, '[[')) {
      linkDepth++;
      i += 2;
      continue;
    }
    if (startsWith(input, i, ']]') && linkDepth > 0) {
      linkDepth--;
      i += 2;
      continue;
    }
    if (startsWith(input, i, '{{')) {
      braceDepth++;
      i += 2;
      continue;
    }
    if (startsWith(input, i, '}}') && braceDepth > 0) {
      braceDepth--;
      i += 2;
      continue;
    }
    if (input[i] === '|' && linkDepth === 0 && braceDepth === 0) {
      parts.push({ text: input.slice(partStart, i), offset: partStart });
      partStart = i + 1;
    }
    i++;
  }

  parts.push({ text: input.slice(partStart), offset: partStart });
  return parts;
}

function opaque(kind: SegmentKind, end: number, unterminated: boolean): Match {
  return { kind, end, translatable: [], unterminated };
}

/**
 * Whether `i` starts a line. Tables may be indented, so `allowIndent`
 * accepts spaces and tabs between the newline and `i`.
 */
function isLineStart(text: string, i: number, allowIndent: boolean): boolean {
  let j = i - 1;
  if (allowIndent) {
    while (j >= 0 && (text[j] === ' ' || text[j] === '\t')) j--;
  }
  return j < 0 || text[j] === '\n';
}

function startsWith(text: string, index: number, search: string): boolean {
  return text.startsWith(search, index);
}

function startsWithIgnoreCase(text: string, index: number, search: string): boolean {
  return text.slice(index, index + search.length).toLowerCase() === search;
}

function isWhitespace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

function isAsciiLetter(ch: string | undefined): boolean {
  if (ch === undefined) return false;
  const code = ch.charCodeAt(0);
  return (code >= 65 && code <= 90) || (code >= 97 && code <= 122);
}

function isDigit(ch: string | undefined): boolean {
  if (ch === undefined) return false;
  const code = ch.charCodeAt(0);
  return code >= 48 && code <= 57;
}

/**
 * Draft preview
 *
 * Checks that a draft kept the structure of the text it came from, and
 * shows what the user changed in it. Nothing is rendered.
 */

import { createTwoFilesPatch, diffLines } from 'diff';
import { OPAQUE_TAGS, tokenize } from '../parser/tokenizer.js';
import { linkTargets } from '../parser/links.js';
import type { MarkupWarning, Segment, SegmentKind } from '../parser/segments.js';

export interface PreviewInput {
  /** Text the draft was derived from (the source article for translations) */
  reference: string;
  /** Text the tool wrote to the draft file */
  generated: string;
  /** Current content of the draft file */
  draft: string;
  /** File name shown in the diff header */
  name?: string;
}

export interface BlockChange {
  kind: SegmentKind;
  raw: string;
}

export interface UserEdits {
  /** Unified diff of the draft against the generated text, '' if unchanged */
  patch: string;
  addedLines: number;
  removedLines: number;
}

export interface PreviewReport {
  ok: boolean;
  warnings: MarkupWarning[];
  /** Segment counts per kind */
  counts: {
    reference: Partial<Record<SegmentKind, number>>;
    draft: Partial<Record<SegmentKind, number>>;
  };
  /** Opaque blocks of the reference absent from the draft */
  missingBlocks: BlockChange[];
  /** Opaque blocks of the draft absent from the reference */
  addedBlocks: BlockChange[];
  missingLinks: string[];
  addedLinks: string[];
  edits: UserEdits;
}

/** Blocks the translation pipeline must carry over byte for byte */
const PRESERVED_KINDS: ReadonlySet<SegmentKind> = new Set<SegmentKind>([
  'template',
  'table',
  'reference',
  'comment',
]);

export function previewDraft(input: PreviewInput): PreviewReport {
  const reference = tokenize(input.reference);
  const draft = tokenize(input.draft);

  const referenceBlocks = preservedBlocks(reference.segments);
  const draftBlocks = preservedBlocks(draft.segments);

  const missingBlocks = multisetDifference(referenceBlocks, draftBlocks, blockKey);
  const addedBlocks = multisetDifference(draftBlocks, referenceBlocks, blockKey);

  const referenceLinks = linkTargets(reference.segments);
  const draftLinks = linkTargets(draft.segments);
  const missingLinks = multisetDifference(referenceLinks, draftLinks, t => t);
  const addedLinks = multisetDifference(draftLinks, referenceLinks, t => t);

  return {
    ok:
      draft.warnings.length === 0 &&
      missingBlocks.length === 0 &&
      addedBlocks.length === 0 &&
      missingLinks.length === 0 &&
      addedLinks.length === 0,
    warnings: draft.warnings,
    counts: {
      reference: countKinds(reference.segments),
      draft: countKinds(draft.segments),
    },
    missingBlocks,
    addedBlocks,
    missingLinks,
    addedLinks,
    edits: userEdits(input.generated, input.draft, input.name ?? 'draft'),
  };
}

/**
 * Diff of the draft against what the tool generated
 */
export function userEdits(generated: string, draft: string, name: string): UserEdits {
  if (generated === draft) {
    return { patch: '', addedLines: 0, removedLines: 0 };
  }

  const patch = createTwoFilesPatch(
    `${name} (generated)`,
    `${name} (draft)`,
    generated,
    draft,
    '',
    '',
    { context: 2 }
  );

  let addedLines = 0;
  let removedLines = 0;
  for (const chunk of diffLines(generated, draft)) {
    const lines = chunk.count ?? countLines(chunk.value);
    if (chunk.added) addedLines += lines;
    else if (chunk.removed) removedLines += lines;
  }

  return { patch, addedLines, removedLines };
}

function preservedBlocks(segments: readonly Segment[]): BlockChange[] {
  const blocks: BlockChange[] = [];
  for (const segment of segments) {
    if (PRESERVED_KINDS.has(segment.kind) || isExtensionTag(segment)) {
      blocks.push({ kind: segment.kind, raw: segment.raw });
    }
  }
  return blocks;
}

// <math>…</math> and the like; formatting tags such as <b> are not blocks
function isExtensionTag(segment: Segment): boolean {
  if (segment.kind !== 'html_tag') return false;
  const name = /^<\s*([a-zA-Z][\w-]*)/.exec(segment.raw)?.[1];
  return name !== undefined && OPAQUE_TAGS.has(name.toLowerCase());
}

function blockKey(block: BlockChange): string {
  return `${block.kind}\u0000${block.raw}`;
}

function multisetDifference<T>(from: readonly T[], subtract: readonly T[], key: (item: T) => string): T[] {
  const remaining = new Map<string, number>();
  for (const item of subtract) {
    const k = key(item);
    remaining.set(k, (remaining.get(k) ?? 0) + 1);
  }

  const out: T[] = [];
  for (const item of from) {
    const k = key(item);
    const count = remaining.get(k) ?? 0;
    if (count > 0) {
      remaining.set(k, count - 1);
    } else {
      out.push(item);
    }
  }
  return out;
}

function countKinds(segments: readonly Segment[]): Partial<Record<SegmentKind, number>> {
  const counts: Partial<Record<SegmentKind, number>> = {};
  for (const segment of segments) {
    counts[segment.kind] = (counts[segment.kind] ?? 0) + 1;
  }
  return counts;
}

function countLines(text: string): number {
  if (!text) return 0;
  const lines = text.split('\n');
  return text.endsWith('\n') ? lines.length - 1 : lines.length;
}

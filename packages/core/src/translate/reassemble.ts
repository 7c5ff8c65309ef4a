/**
 * Reassembler
 *
 * Puts the protected markup back into translated text. Placeholder
 * integrity is checked first; a document with a lost, repeated, unknown or
 * reordered token is rejected instead of being rebuilt incorrectly.
 */

import type { PlaceholderTable, ProtectedDocument } from './placeholders.js';

export type ReassemblyProblemKind = 'missing' | 'duplicated' | 'unknown' | 'malformed' | 'reordered';

export interface ReassemblyProblem {
  kind: ReassemblyProblemKind;
  token: string;
}

export class ReassemblyError extends Error {
  readonly problems: ReassemblyProblem[];

  constructor(problems: ReassemblyProblem[]) {
    super(`Placeholder integrity check failed: ${describeProblems(problems)}`);
    this.name = 'ReassemblyError';
    this.problems = problems;
  }
}

/**
 * Check the tokens of `text` against the table.
 *
 * @param expected Tokens that must each occur exactly once (defaults to the
 *   whole table). Any other token-shaped string is reported as unknown.
 */
export function checkPlaceholders(
  text: string,
  table: PlaceholderTable,
  expected: readonly string[] = table.tokens()
): ReassemblyProblem[] {
  const problems: ReassemblyProblem[] = [];
  const expectedSet = new Set(expected);
  const counts = new Map<string, number>();
  const lastOrder = new Map<number, number>();
  const reordered = new Set<string>();

  const pattern = table.tokenPattern();
  let remainder = '';
  let cursor = 0;

  for (const match of text.matchAll(pattern)) {
    const index = match.index ?? 0;
    remainder += text.slice(cursor, index);
    cursor = index + match[0].length;

    const token = table.formatToken(Number(match[1]));
    const entry = table.get(token);
    if (!entry || !expectedSet.has(token)) {
      problems.push({ kind: 'unknown', token: match[0] });
      continue;
    }

    counts.set(token, (counts.get(token) ?? 0) + 1);

    // Formatting runs in prose may be reordered with the words they wrap
    if (entry.kind === 'plain_text') continue;

    const previous = lastOrder.get(entry.segmentIndex);
    if (previous !== undefined && entry.order < previous) {
      reordered.add(token);
    }
    lastOrder.set(entry.segmentIndex, entry.order);
  }
  remainder += text.slice(cursor);

  const { open, close } = table.delimiters;
  for (const ch of remainder) {
    if (ch === open || ch === close) {
      problems.push({ kind: 'malformed', token: ch });
    }
  }

  for (const token of expected) {
    const count = counts.get(token) ?? 0;
    if (count === 0) {
      problems.push({ kind: 'missing', token });
    } else if (count > 1) {
      problems.push({ kind: 'duplicated', token });
    }
  }

  for (const token of reordered) {
    problems.push({ kind: 'reordered', token });
  }

  return problems;
}

/**
 * Rebuild wikitext from translated text and the token table.
 *
 * @throws ReassemblyError when placeholder integrity is violated
 */
export function reassemble(text: string, table: PlaceholderTable): string {
  const problems = checkPlaceholders(text, table);
  if (problems.length > 0) {
    throw new ReassemblyError(problems);
  }

  return text.replace(table.tokenPattern(), (match: string, id: string) => {
    const entry = table.get(table.formatToken(Number(id)));
    if (!entry) {
      throw new ReassemblyError([{ kind: 'unknown', token: match }]);
    }
    return entry.text;
  });
}

/**
 * Undo `protect` without any translation
 */
export function restore(doc: ProtectedDocument): string {
  return reassemble(doc.text, doc.table);
}

export function describeProblems(problems: readonly ReassemblyProblem[]): string {
  const shown = problems.slice(0, 5).map(p => `${p.kind} ${p.token}`);
  if (problems.length > 5) {
    shown.push(`and ${problems.length - 5} more`);
  }
  return shown.join(', ');
}

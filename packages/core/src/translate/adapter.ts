/**
 * Translation client adapter
 *
 * Sends translation units to a translation service with bounded
 * concurrency. Translation is best-effort: a unit that fails keeps its
 * original text and the rest of the document goes on.
 */

import type { TranslationUnit } from './batching.js';
import type { PlaceholderTable } from './placeholders.js';
import { checkPlaceholders, describeProblems } from './reassemble.js';

export interface TranslationRequest {
  text: string;
  sourceLang: string;
  targetLang: string;
}

/** External translation service */
export interface TranslationService {
  readonly name: string;
  translate(request: TranslationRequest, signal: AbortSignal): Promise<string>;
}

export type UnitStatus = 'translated' | 'skipped' | 'failed';

export interface UnitOutcome {
  unitId: number;
  status: UnitStatus;
  /** Text to use in the document: the translation, or the original on skip/failure */
  text: string;
  error?: string;
}

export class TranslationUnitError extends Error {
  readonly unitId: number;

  constructor(unitId: number, message: string) {
    super(message);
    this.name = 'TranslationUnitError';
    this.unitId = unitId;
  }
}

export interface BatchOptions {
  /** Units in flight at once (default: 4) */
  concurrency?: number;
  /** Per-unit timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Cancels every unit still pending */
  signal?: AbortSignal;
  /** Token table; when given, each translation must carry back its unit's tokens */
  table?: PlaceholderTable;
  onProgress?: (completed: number, total: number) => void;
}

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_UNIT_TIMEOUT_MS = 30000;

/**
 * Translate units; outcomes come back in unit order whatever the order of
 * completion.
 */
export async function translateBatch(
  units: readonly TranslationUnit[],
  service: TranslationService,
  options: BatchOptions = {}
): Promise<UnitOutcome[]> {
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  const timeoutMs = options.timeoutMs ?? DEFAULT_UNIT_TIMEOUT_MS;
  const cache = new Map<string, Promise<string>>();
  const outcomes: UnitOutcome[] = [];

  let next = 0;
  let completed = 0;

  const worker = async (): Promise<void> => {
    while (next < units.length) {
      const index = next++;
      outcomes[index] = await translateUnit(units[index], service, cache, timeoutMs, options);
      completed++;
      options.onProgress?.(completed, units.length);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, units.length); i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return outcomes;
}

async function translateUnit(
  unit: TranslationUnit,
  service: TranslationService,
  cache: Map<string, Promise<string>>,
  timeoutMs: number,
  options: BatchOptions
): Promise<UnitOutcome> {
  if (!hasTranslatableText(unit.text, options.table)) {
    return { unitId: unit.id, status: 'skipped', text: unit.text };
  }

  const { leading, core, trailing } = splitEdgeWhitespace(unit.text);

  try {
    let pending = cache.get(core);
    if (!pending) {
      pending = callService(
        service,
        { text: core, sourceLang: unit.sourceLang, targetLang: unit.targetLang },
        timeoutMs,
        options.signal
      );
      cache.set(core, pending);
    }

    const translated: unknown = await pending;
    if (typeof translated !== 'string' || !translated.trim()) {
      throw new TranslationUnitError(unit.id, 'Translation service returned no text');
    }

    if (options.table) {
      const problems = checkPlaceholders(translated, options.table, unit.tokens);
      if (problems.length > 0) {
        throw new TranslationUnitError(unit.id, `Placeholder mismatch: ${describeProblems(problems)}`);
      }
    }

    return { unitId: unit.id, status: 'translated', text: `${leading}${translated.trim()}${trailing}` };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { unitId: unit.id, status: 'failed', text: unit.text, error: message };
  }
}

/**
 * Call the service, giving up on timeout or cancellation
 */
async function callService(
  service: TranslationService,
  request: TranslationRequest,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<string> {
  if (signal?.aborted) {
    throw new Error('Translation cancelled');
  }

  const controller = new AbortController();
  let cleanup = (): void => {};

  const interrupted = new Promise<never>((_resolve, reject) => {
    // Reject before aborting so this error wins the race
    const timer = setTimeout(() => {
      reject(new Error(`Translation timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);

    const onAbort = () => {
      reject(new Error('Translation cancelled'));
      controller.abort();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
  });

  try {
    return await Promise.race([service.translate(request, controller.signal), interrupted]);
  } finally {
    cleanup();
  }
}

/**
 * Whether the text has letters once placeholder tokens are removed
 */
export function hasTranslatableText(text: string, table?: PlaceholderTable): boolean {
  const stripped = table ? text.replace(table.tokenPattern(), ' ') : text;
  return /\p{L}/u.test(stripped);
}

function splitEdgeWhitespace(text: string): { leading: string; core: string; trailing: string } {
  const leading = /^\s*/.exec(text)?.[0] ?? '';
  const rest = text.slice(leading.length);
  const trailing = /\s*$/.exec(rest)?.[0] ?? '';
  return {
    leading,
    core: rest.slice(0, rest.length - trailing.length),
    trailing,
  };
}

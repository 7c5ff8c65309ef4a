/**
 * Translation pipeline
 *
 * tokenize → protect → batch → translate → reassemble, for one document.
 * Content problems never throw: the report says what happened and, when
 * the markup cannot be rebuilt safely, carries the original wikitext.
 */

import { tokenize } from '../parser/tokenizer.js';
import type { MarkupWarning } from '../parser/segments.js';
import { PlaceholderCollisionError, PlaceholderContext, protect } from './placeholders.js';
import { buildUnits } from './batching.js';
import { translateBatch, type TranslationService, type UnitOutcome } from './adapter.js';
import { reassemble, ReassemblyError, type ReassemblyProblem } from './reassemble.js';

export interface TranslateOptions {
  sourceLang: string;
  targetLang: string;
  /** Character budget per translation unit */
  maxChars?: number;
  concurrency?: number;
  /** Per-unit timeout (ms) */
  timeoutMs?: number;
  signal?: AbortSignal;
  onProgress?: (message: string, current?: number, total?: number) => void;
}

/**
 * - translated: every unit with prose was translated
 * - partial: some units failed and kept their original text
 * - failed: no unit could be translated
 * - unchanged: nothing to translate
 * - fallback: markup could not be rebuilt; wikitext is the original
 */
export type TranslationStatus = 'translated' | 'partial' | 'failed' | 'unchanged' | 'fallback';

export interface TranslationReport {
  status: TranslationStatus;
  wikitext: string;
  warnings: MarkupWarning[];
  units: UnitOutcome[];
  translatedUnits: number;
  failedUnits: number;
  segmentCount: number;
  tokenCount: number;
  error?: string;
  problems?: ReassemblyProblem[];
}

export async function translateWikitext(
  wikitext: string,
  service: TranslationService,
  options: TranslateOptions
): Promise<TranslationReport> {
  const { segments, warnings } = tokenize(wikitext);

  let context: PlaceholderContext;
  try {
    context = new PlaceholderContext(wikitext);
  } catch (error) {
    if (error instanceof PlaceholderCollisionError) {
      return {
        status: 'fallback',
        wikitext,
        warnings,
        units: [],
        translatedUnits: 0,
        failedUnits: 0,
        segmentCount: segments.length,
        tokenCount: 0,
        error: error.message,
      };
    }
    throw error;
  }

  const doc = protect(segments, context);
  const units = buildUnits(doc, {
    sourceLang: options.sourceLang,
    targetLang: options.targetLang,
    maxChars: options.maxChars,
  });

  options.onProgress?.(`Translating ${units.length} units with ${service.name}...`, 0, units.length);

  const outcomes = await translateBatch(units, service, {
    concurrency: options.concurrency,
    timeoutMs: options.timeoutMs,
    signal: options.signal,
    table: doc.table,
    onProgress: (completed, total) => options.onProgress?.('Translating...', completed, total),
  });

  const translatedUnits = outcomes.filter(o => o.status === 'translated').length;
  const failedUnits = outcomes.filter(o => o.status === 'failed').length;

  const base = {
    warnings,
    units: outcomes,
    translatedUnits,
    failedUnits,
    segmentCount: segments.length,
    tokenCount: doc.table.size,
  };

  try {
    const rebuilt = reassemble(outcomes.map(o => o.text).join(''), doc.table);
    return { ...base, status: summarize(translatedUnits, failedUnits), wikitext: rebuilt };
  } catch (error) {
    if (error instanceof ReassemblyError) {
      return {
        ...base,
        status: 'fallback',
        wikitext,
        error: error.message,
        problems: error.problems,
      };
    }
    throw error;
  }
}

function summarize(translated: number, failed: number): TranslationStatus {
  if (failed === 0) {
    return translated > 0 ? 'translated' : 'unchanged';
  }
  return translated > 0 ? 'partial' : 'failed';
}

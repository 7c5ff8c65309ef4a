/**
 * translate command - Machine-translate an article into a local draft
 */

import chalk from 'chalk';
import ora from 'ora';
import {
  LibreTranslateService,
  describeProblems,
  parseWikiUrl,
  type TranslationService,
} from '@wikiport/core';
import { resolveUserPath, withContext } from '../utils/context.js';
import { printJson } from '../utils/meta.js';
import {
  createStatusTable,
  errorMessage,
  formatStatus,
  printError,
  printInfo,
  printSection,
  printSuccess,
  printWarning,
} from '../utils/format.js';

export interface TranslateOptions {
  lang: string;
  sourceLang?: string;
  title?: string;
  engine: string;
  out?: string;
  maxChars?: string;
  concurrency?: string;
  json?: boolean;
  meta?: boolean;
}

const ENGINES = ['libretranslate', 'none'];

export async function translateCommand(url: string, options: TranslateOptions): Promise<void> {
  const spinner = ora({ text: 'Resolving URL...', isEnabled: !options.json }).start();

  try {
    if (!ENGINES.includes(options.engine)) {
      throw new Error(`Unknown engine "${options.engine}" (expected ${ENGINES.join(' or ')})`);
    }

    const parsed = parseWikiUrl(url);
    const sourceLang = options.sourceLang ?? parsed.lang;

    await withContext(async (ctx) => {
      const { translate } = ctx.settings;
      const service: TranslationService | null = options.engine === 'none'
        ? null
        : new LibreTranslateService({
            endpoint: translate.endpoint,
            apiKey: translate.apiKey,
            userAgent: ctx.settings.userAgent,
          });

      const result = await ctx.engine.translate({
        sourceLang,
        title: parsed.title,
        targetLang: options.lang,
        targetTitle: options.title,
        path: options.out ? resolveUserPath(options.out) : undefined,
        service,
        pipeline: {
          maxChars: parsePositive(options.maxChars, translate.maxChars),
          concurrency: parsePositive(options.concurrency, translate.concurrency),
          timeoutMs: translate.timeoutMs,
        },
        onProgress: (message, current, total) => {
          spinner.text = total ? `${message} (${current ?? 0}/${total})` : message;
        },
      });

      spinner.stop();

      if (options.json) {
        printJson(result, ctx.projectContext, options.meta !== false);
        return;
      }

      const source = chalk.cyan(`${result.sourceLang}:${result.sourceTitle}`);
      const target = chalk.cyan(`${result.lang}:${result.title}`);
      const report = result.report;

      if (!report) {
        printSuccess(`Copied ${source} to ${result.filepath} (no translation engine)`);
      } else if (report.status === 'fallback') {
        printWarning(`Could not rebuild the markup; wrote the untranslated source to ${result.filepath}`);
        if (report.error) printWarning(report.error);
      } else {
        printSuccess(`Translated ${source} → ${target}: ${result.filepath}`);
      }

      if (report) {
        const table = createStatusTable();
        table.push(
          ['Status:', formatStatus(report.status)],
          ['Segments:', String(report.segmentCount)],
          ['Placeholders:', String(report.tokenCount)],
          ['Units:', String(report.units.length)],
          ['Translated:', chalk.green(String(report.translatedUnits))],
          ['Failed:', report.failedUnits > 0 ? chalk.red(String(report.failedUnits)) : '0'],
        );
        console.log(table.toString());

        const failed = report.units.filter(u => u.status === 'failed');
        if (failed.length > 0) {
          printSection('Units kept in the source language');
          for (const unit of failed.slice(0, 10)) {
            console.log(`  ${chalk.red(`#${unit.unitId}`)} ${unit.error ?? 'failed'}`);
          }
          if (failed.length > 10) {
            console.log(chalk.dim(`  ... and ${failed.length - 10} more`));
          }
        }

        if (report.problems && report.problems.length > 0) {
          printWarning(`Placeholder problems: ${describeProblems(report.problems)}`);
        }

        if (report.warnings.length > 0) {
          printSection('Markup warnings');
          for (const warning of report.warnings) {
            console.log(`  ${chalk.yellow('!')} ${warning.message} (offset ${warning.offset})`);
          }
        }
      }

      console.log();
      printInfo(result.baseRevisionId
        ? `Target page exists (revision ${result.baseRevisionId}); publishing will replace it`
        : 'Target page does not exist yet; publishing will create it');
    });
  } catch (error) {
    spinner.fail('Translation failed');
    printError(errorMessage(error));
    process.exit(1);
  }
}

function parsePositive(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new Error(`Expected a positive number, got "${value}"`);
  }
  return parsed;
}

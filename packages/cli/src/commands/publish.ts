/**
 * publish command - Upload a draft if the page has not changed meanwhile
 */

import chalk from 'chalk';
import ora from 'ora';
import type { PublishOutcome } from '@wikiport/core';
import { resolveUserPath, withContext } from '../utils/context.js';
import { printJson } from '../utils/meta.js';
import { errorMessage, printError, printInfo, printSuccess, printWarning } from '../utils/format.js';

export interface PublishOptions {
  lang?: string;
  title?: string;
  summary: string;
  minor?: boolean;
  dryRun?: boolean;
  json?: boolean;
  meta?: boolean;
}

export async function publishCommand(path: string, options: PublishOptions): Promise<void> {
  const spinner = ora({ text: 'Reading draft...', isEnabled: !options.json }).start();

  try {
    await withContext(async (ctx) => {
      const outcome = await ctx.engine.publish({
        path: resolveUserPath(path),
        lang: options.lang,
        title: options.title,
        summary: options.summary,
        minor: options.minor,
        dryRun: options.dryRun,
        onProgress: (message) => {
          spinner.text = message;
        },
      });

      spinner.stop();

      if (options.json) {
        printJson(outcome, ctx.projectContext, options.meta !== false);
      } else {
        report(outcome, options);
      }

      const ok = outcome.result.status === 'published' || outcome.result.status === 'current';
      if (!ok) process.exitCode = 1;
    });
  } catch (error) {
    spinner.fail('Publish failed');
    printError(errorMessage(error));
    process.exit(1);
  }
}

function report(outcome: PublishOutcome, options: PublishOptions): void {
  const page = chalk.cyan(`${outcome.lang}:${outcome.title}`);
  const base = outcome.baseRevisionId ?? 'none (new page)';
  const result = outcome.result;

  switch (result.status) {
    case 'current':
      printSuccess(`${page} is still at base revision ${base}`);
      console.log(`Edit summary: "${options.summary}"`);
      printInfo('To publish, run without --dry-run');
      break;
    case 'published':
      if (result.unchanged) {
        printInfo(`${page} already has this content; no new revision`);
      } else {
        printSuccess(`Published ${page} as revision ${result.newRevisionId}`);
      }
      break;
    case 'edit_conflict':
      if (result.source === 'guard') {
        printError(`Edit conflict: ${page} is at revision ${result.remoteRevisionId ?? 'none (deleted)'}, draft is based on ${base}`);
      } else {
        printError(`Edit conflict reported by the wiki (${result.code})`);
      }
      printInfo('Download the page again and reapply your changes');
      break;
    case 'rejected':
      printError(`Edit rejected (${result.code}): ${result.reason}`);
      break;
    case 'check_failed':
      printError(`Could not check the current revision: ${result.reason}`);
      printInfo('Nothing was submitted');
      break;
    case 'unknown':
      printWarning(`Edit outcome unknown: ${result.reason}`);
      printInfo(`Check the page history of ${page} before trying again`);
      break;
  }
}

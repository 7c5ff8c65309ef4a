/**
 * download command - Save an article's wikitext as a local draft
 */

import chalk from 'chalk';
import ora from 'ora';
import { parseWikiUrl } from '@wikiport/core';
import { resolveUserPath, withContext } from '../utils/context.js';
import { printJson } from '../utils/meta.js';
import { errorMessage, formatSize, printError, printInfo, printSuccess } from '../utils/format.js';

export interface DownloadOptions {
  out?: string;
  json?: boolean;
  meta?: boolean;
}

export async function downloadCommand(url: string, options: DownloadOptions): Promise<void> {
  const spinner = ora({ text: 'Resolving URL...', isEnabled: !options.json }).start();

  try {
    const { lang, title } = parseWikiUrl(url);

    await withContext(async (ctx) => {
      const result = await ctx.engine.download({
        lang,
        title,
        path: options.out ? resolveUserPath(options.out) : undefined,
        onProgress: (message) => {
          spinner.text = message;
        },
      });

      spinner.stop();

      if (options.json) {
        printJson(result, ctx.projectContext, options.meta !== false);
        return;
      }

      printSuccess(`Saved ${chalk.cyan(`${result.lang}:${result.title}`)} to ${result.filepath}`);
      printInfo(`Revision ${result.revisionId} (${formatSize(result.bytes)})`);
    });
  } catch (error) {
    spinner.fail('Download failed');
    printError(errorMessage(error));
    process.exit(1);
  }
}

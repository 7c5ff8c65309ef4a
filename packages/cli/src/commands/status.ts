/**
 * status command - Show drafts and recent operations
 */

import chalk from 'chalk';
import { withContext } from '../utils/context.js';
import { printJson } from '../utils/meta.js';
import { createStatusTable, errorMessage, formatStatus, formatTime, printError, printSection } from '../utils/format.js';

export interface StatusOptions {
  lang?: string;
  log?: string;
  json?: boolean;
  meta?: boolean;
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  try {
    await withContext(async (ctx) => {
      const drafts = ctx.engine.status({ lang: options.lang });
      const logLimit = options.log ? parseInt(options.log, 10) || 0 : 0;
      const operations = logLimit > 0 ? ctx.db.getOperationLogs(logLimit) : [];

      if (options.json) {
        printJson({
          drafts: drafts.map(({ record, state }) => ({
            lang: record.lang,
            title: record.title,
            filepath: record.filepath,
            origin: record.origin,
            baseRevisionId: record.base_revision_id,
            translationStatus: record.translation_status,
            publishedRevisionId: record.published_revision_id,
            state,
          })),
          operations,
        }, ctx.projectContext, options.meta !== false);
        return;
      }

      const stats = ctx.db.getStats();
      console.log(chalk.bold('Drafts'));

      const overview = createStatusTable();
      overview.push(
        ['Total:', chalk.cyan(String(stats.drafts))],
        ['Translations:', String(stats.translations)],
        ['Published:', chalk.green(String(stats.published))],
        ['Modified locally:', chalk.yellow(String(drafts.filter(d => d.state === 'modified').length))],
      );
      console.log(overview.toString());

      if (drafts.length > 0) {
        const table = createStatusTable(['Page', 'File', 'Base', 'Translation', 'Local', 'Published']);
        for (const { record, state } of drafts) {
          table.push([
            `${record.lang}:${record.title}`,
            record.filepath,
            record.base_revision_id ?? chalk.dim('new'),
            formatStatus(record.translation_status),
            formatStatus(state),
            record.published_revision_id ?? chalk.dim('-'),
          ]);
        }
        console.log();
        console.log(table.toString());
      }

      if (operations.length > 0) {
        printSection('Recent operations');
        for (const op of operations) {
          console.log(`  ${chalk.dim(formatTime(`${op.timestamp}Z`))} ${op.operation} ${op.lang}:${op.title} ${formatStatus(op.status)}`);
        }
      }
    });
  } catch (error) {
    printError(errorMessage(error));
    process.exit(1);
  }
}

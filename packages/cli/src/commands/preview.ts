/**
 * preview command - Check a draft's structure and show local edits
 */

import chalk from 'chalk';
import type { BlockChange, SegmentKind } from '@wikiport/core';
import { resolveUserPath, withContext } from '../utils/context.js';
import { printJson } from '../utils/meta.js';
import {
  createStatusTable,
  errorMessage,
  formatPatch,
  printError,
  printInfo,
  printSection,
  printSuccess,
  printWarning,
} from '../utils/format.js';

export interface PreviewOptions {
  json?: boolean;
  meta?: boolean;
  verbose?: boolean;
}

export async function previewCommand(path: string, options: PreviewOptions): Promise<void> {
  try {
    await withContext(async (ctx) => {
      const { filepath, draft, report } = ctx.engine.preview(resolveUserPath(path));

      if (options.json) {
        printJson({ filepath, draft: draft ? { lang: draft.lang, title: draft.title } : null, ...report }, ctx.projectContext, options.meta !== false);
        if (!report.ok) process.exitCode = 1;
        return;
      }

      console.log(chalk.bold(`Preview: ${filepath}`));
      if (draft) {
        console.log(chalk.dim(`${draft.lang}:${draft.title} (${draft.origin}, base revision ${draft.base_revision_id ?? 'none'})`));
      } else {
        printWarning('No draft record for this file; only markup is checked');
      }

      const kinds = new Set<SegmentKind>([
        ...keys(report.counts.reference),
        ...keys(report.counts.draft),
      ]);
      const table = createStatusTable(['Segment', 'Source', 'Draft']);
      for (const kind of kinds) {
        const before = report.counts.reference[kind] ?? 0;
        const after = report.counts.draft[kind] ?? 0;
        table.push([kind, String(before), before === after ? String(after) : chalk.yellow(String(after))]);
      }
      console.log();
      console.log(table.toString());

      if (report.warnings.length > 0) {
        printSection('Markup warnings');
        for (const warning of report.warnings) {
          console.log(`  ${chalk.yellow('!')} ${warning.message} (offset ${warning.offset})`);
        }
      }

      printBlocks('Missing from draft', report.missingBlocks, chalk.red);
      printBlocks('Added in draft', report.addedBlocks, chalk.green);
      printLinks('Links missing from draft', report.missingLinks, chalk.red);
      printLinks('Links added in draft', report.addedLinks, chalk.green);

      printSection('Local edits');
      if (report.edits.patch) {
        console.log(`  ${chalk.green(`+${report.edits.addedLines}`)} ${chalk.red(`-${report.edits.removedLines}`)} lines`);
        if (options.verbose) {
          console.log(formatPatch(report.edits.patch));
        } else {
          printInfo('Use -v to show the diff');
        }
      } else {
        console.log(chalk.dim('  none'));
      }

      console.log();
      if (report.ok) {
        printSuccess('Markup structure preserved');
      } else {
        printWarning('Markup structure differs from the source');
        process.exitCode = 1;
      }
    });
  } catch (error) {
    printError(errorMessage(error));
    process.exit(1);
  }
}

function printBlocks(title: string, blocks: BlockChange[], color: (s: string) => string): void {
  if (blocks.length === 0) return;
  printSection(`${title} (${blocks.length})`);
  for (const block of blocks.slice(0, 20)) {
    const oneLine = block.raw.replace(/\s+/g, ' ');
    const shown = oneLine.length > 72 ? `${oneLine.slice(0, 69)}...` : oneLine;
    console.log(`  ${color(block.kind)} ${shown}`);
  }
  if (blocks.length > 20) {
    console.log(chalk.dim(`  ... and ${blocks.length - 20} more`));
  }
}

function printLinks(title: string, links: string[], color: (s: string) => string): void {
  if (links.length === 0) return;
  printSection(`${title} (${links.length})`);
  for (const link of links.slice(0, 20)) {
    console.log(`  ${color(`[[${link}]]`)}`);
  }
  if (links.length > 20) {
    console.log(chalk.dim(`  ... and ${links.length - 20} more`));
  }
}

function keys<K extends string>(record: Partial<Record<K, number>>): K[] {
  const out: K[] = [];
  for (const key in record) {
    out.push(key);
  }
  return out;
}

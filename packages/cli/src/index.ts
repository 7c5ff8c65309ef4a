#!/usr/bin/env tsx
/**
 * @wikiport/cli - Command-line interface for wikiport
 *
 * Download wiki articles, translate them with their markup intact, check
 * drafts locally and publish them back.
 */

import { resolve } from 'node:path';
import { existsSync } from 'node:fs';
import { config as dotenvConfig } from 'dotenv';
import { Command } from 'commander';
import { VERSION } from '@wikiport/core';

// Load .env from the project root (where credentials live)
const envPath = resolve(process.env.WKP_PROJECT_ROOT || process.cwd(), '.env');
if (existsSync(envPath)) {
  dotenvConfig({ path: envPath });
}

import { downloadCommand } from './commands/download.js';
import { translateCommand } from './commands/translate.js';
import { previewCommand } from './commands/preview.js';
import { publishCommand } from './commands/publish.js';
import { statusCommand } from './commands/status.js';

const program = new Command();

program
  .name('wikiport')
  .description('Download, translate and publish wiki articles with their markup intact')
  .version(VERSION);

program
  .command('download <url>')
  .description('Download an article as a local draft')
  .option('-o, --out <path>', 'Draft path (default: articles/<lang>/<Title>.wiki)')
  .option('--json', 'Output JSON')
  .option('--no-meta', 'Omit meta block from JSON output')
  .action(downloadCommand);

program
  .command('translate <url>')
  .description('Translate an article into a local draft for another wiki')
  .option('--lang <lang>', 'Target language', 'es')
  .option('--source-lang <lang>', 'Source language (default: from the URL)')
  .option('--title <title>', 'Title on the target wiki (default: the source title)')
  .option('--engine <engine>', 'Translation engine: libretranslate|none', 'libretranslate')
  .option('-o, --out <path>', 'Draft path (default: articles/<lang>/<Title>.wiki)')
  .option('--max-chars <n>', 'Characters per translation request')
  .option('--concurrency <n>', 'Translation requests in flight')
  .option('--json', 'Output JSON')
  .option('--no-meta', 'Omit meta block from JSON output')
  .action(translateCommand);

program
  .command('preview <path>')
  .description('Check a draft\'s markup against its source and show local edits')
  .option('-v, --verbose', 'Show the diff of local edits')
  .option('--json', 'Output JSON')
  .option('--no-meta', 'Omit meta block from JSON output')
  .action(previewCommand);

program
  .command('publish <path>')
  .description('Publish a draft unless the page changed since it was made (requires authentication)')
  .option('--lang <lang>', 'Wiki language (default: from the draft record or path)')
  .option('--title <title>', 'Page title (default: from the draft record or file name)')
  .option('-s, --summary <text>', 'Edit summary', 'Update via wikiport')
  .option('--minor', 'Mark as a minor edit')
  .option('--dry-run', 'Only check that the base revision is still current')
  .option('--json', 'Output JSON')
  .option('--no-meta', 'Omit meta block from JSON output')
  .action(publishCommand);

program
  .command('status')
  .description('Show drafts and their state')
  .option('--lang <lang>', 'Only drafts for this language')
  .option('--log <n>', 'Show the last N operations')
  .option('--json', 'Output JSON')
  .option('--no-meta', 'Omit meta block from JSON output')
  .action(statusCommand);

// Parse and run
program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});

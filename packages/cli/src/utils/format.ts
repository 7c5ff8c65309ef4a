/**
 * CLI output formatting utilities
 */

import chalk from 'chalk';
import Table from 'cli-table3';

/**
 * Format file size in human-readable form (compact, no spaces)
 */
export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}

/**
 * Format a timestamp
 */
export function formatTime(timestamp: string | null | undefined): string {
  if (!timestamp) return chalk.dim('never');
  const date = new Date(timestamp);
  return Number.isNaN(date.getTime()) ? timestamp : date.toLocaleString();
}

/**
 * Create a status table
 */
export function createStatusTable(head?: string[]): Table.Table {
  return new Table({
    head: head?.map(h => chalk.bold(h)),
    chars: { mid: '', 'left-mid': '', 'mid-mid': '', 'right-mid': '' },
    style: { 'padding-left': 0, 'padding-right': 2, head: [] },
  });
}

/**
 * Print a section header
 */
export function printSection(title: string): void {
  console.log();
  console.log(chalk.bold(title));
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow('!'), message);
}

/**
 * Print info message
 */
export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

/**
 * Format a translation or publish status
 */
export function formatStatus(status: string | null): string {
  if (!status) return chalk.dim('-');
  const colors: Record<string, (s: string) => string> = {
    translated: chalk.green,
    published: chalk.green,
    unchanged: chalk.dim,
    copied: chalk.dim,
    partial: chalk.yellow,
    modified: chalk.yellow,
    fallback: chalk.red,
    failed: chalk.red,
    missing: chalk.red,
    edit_conflict: chalk.red,
    rejected: chalk.red,
    check_failed: chalk.red,
    unknown: chalk.magenta,
  };
  const color = colors[status] || chalk.white;
  return color(status);
}

/**
 * Color a unified diff line by line
 */
export function formatPatch(patch: string): string {
  return patch
    .split('\n')
    .map(line => {
      if (line.startsWith('+++') || line.startsWith('---')) return chalk.bold(line);
      if (line.startsWith('@@')) return chalk.cyan(line);
      if (line.startsWith('+')) return chalk.green(line);
      if (line.startsWith('-')) return chalk.red(line);
      return line;
    })
    .join('\n');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

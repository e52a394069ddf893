/**
 * CLI output formatting utilities
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { InvalidArgumentError } from 'commander';
import { isWikiError, type LogEntry, type Revision } from '@wikibot/core';

/**
 * Format byte counts in human-readable form (compact, no spaces)
 */
export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}

/**
 * Format a timestamp as UTC, e.g. 2024-05-01 12:30:00
 */
export function formatTime(timestamp: Date | null | undefined): string {
  if (!timestamp) return chalk.dim('never');
  return timestamp.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
}

/**
 * Flags column for a revision: N(ew), m(inor), b(ot)
 */
export function formatFlags(revision: Revision): string {
  return [
    revision.isNew ? chalk.green('N') : ' ',
    revision.minor ? 'm' : ' ',
    revision.bot ? chalk.cyan('b') : ' ',
  ].join('');
}

/** Shown where the server hid a field */
export function hidden(value: string | null): string {
  return value ?? chalk.dim('(hidden)');
}

/**
 * Create a status table
 */
export function createStatusTable(head?: string[]): Table.Table {
  return new Table({
    head: head?.map(cell => chalk.bold(cell)),
    chars: { mid: '', 'left-mid': '', 'mid-mid': '', 'right-mid': '' },
    style: { head: [], 'padding-left': 0, 'padding-right': 2 },
  });
}

/**
 * Render revisions as a table
 */
export function revisionTable(revisions: readonly Revision[], withTitle: boolean): string {
  const table = createStatusTable(
    withTitle ? ['Time', 'Rev', '', 'Title', 'Size', 'Summary'] : ['Time', 'Rev', '', 'User', 'Size', 'Summary']
  );
  for (const rev of revisions) {
    table.push([
      formatTime(rev.timestamp),
      String(rev.id),
      formatFlags(rev),
      withTitle ? hidden(rev.title) : hidden(rev.user),
      formatSize(rev.size),
      hidden(rev.summary),
    ]);
  }
  return table.toString();
}

/**
 * Render log entries as a table
 */
export function logTable(entries: readonly LogEntry[]): string {
  const table = createStatusTable(['Time', 'Action', 'Performer', 'Target', 'Reason']);
  for (const entry of entries) {
    table.push([
      formatTime(entry.timestamp),
      `${entry.type}/${hidden(entry.action)}`,
      hidden(entry.performer),
      hidden(entry.target),
      hidden(entry.reason),
    ]);
  }
  return table.toString();
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
 * Describe any thrown value, prefixed with the error kind for client errors
 */
export function describeError(error: unknown): string {
  if (isWikiError(error)) {
    return `${chalk.dim(`[${error.kind}]`)} ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse a positive integer option such as --limit
 */
export function parseLimit(value: string): number {
  if (!/^\d+$/.test(value.trim()) || Number(value) < 1) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return Number(value);
}

/**
 * Option parser for a namespace ID (negative for Special and Media)
 */
export function parseNamespaceId(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a namespace number.');
  }
  return Number(value);
}

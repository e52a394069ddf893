/**
 * Write commands - edit, delete, rollback
 *
 * Each logs in from WIKI_BOT_USER / WIKI_BOT_PASS unless a logged-in
 * session was saved.
 */

import chalk from 'chalk';
import ora from 'ora';
import { readFileSync } from 'node:fs';
import type { MutationOutcome } from '@wikibot/core';
import { withContext } from '../utils/context.js';
import { describeError, printError, printInfo, printSuccess, printWarning } from '../utils/format.js';

function report(outcome: MutationOutcome): void {
  if (outcome.status === 'done') {
    printSuccess(`${outcome.action}: ${outcome.title}`);
  } else {
    printWarning(`${outcome.action} skipped for ${outcome.title}${outcome.note ? `: ${outcome.note}` : ''}`);
  }
}

export interface EditCommandOptions {
  summary: string;
  file?: string;
  text?: string;
  minor?: boolean;
}

export async function editCommand(title: string, options: EditCommandOptions): Promise<void> {
  if (options.file === undefined && options.text === undefined) {
    printError('Content is required: --file <path> or --text "..."');
    process.exit(1);
  }

  const text = options.file !== undefined ? readFileSync(options.file, 'utf-8') : (options.text ?? '');
  const spinner = ora(`Editing ${title}...`).start();

  try {
    await withContext(async ({ client }) => {
      const outcome = await client.edit(title, text, options.summary, { minor: options.minor });
      spinner.stop();
      report(outcome);
    }, { requireAuth: true });
  } catch (error) {
    spinner.fail('Edit failed');
    printError(describeError(error));
    process.exit(1);
  }
}

export interface DeleteOptions {
  reason: string;
  dryRun?: boolean;
}

export async function deleteCommand(title: string, options: DeleteOptions): Promise<void> {
  console.log(chalk.bold(`Delete: ${title}`));
  console.log();

  if (options.dryRun) {
    printInfo('Dry-run mode - no changes will be made');
    console.log();
  }

  const spinner = ora('Preparing...').start();

  try {
    await withContext(async ({ client }) => {
      const [exists] = await client.pages.exists(title);
      if (!exists) {
        spinner.stop();
        printWarning('Page does not exist on wiki (already deleted?)');
        return;
      }

      if (options.dryRun) {
        spinner.stop();
        console.log(chalk.bold('Would delete:'));
        console.log(`  Title: ${title}`);
        console.log(`  Reason: ${options.reason}`);
        console.log();
        printInfo('Use without --dry-run to actually delete');
        return;
      }

      spinner.text = 'Deleting from wiki...';
      const outcome = await client.delete(title, options.reason);
      spinner.stop();
      report(outcome);
    }, { requireAuth: true });
  } catch (error) {
    spinner.fail('Delete failed');
    printError(describeError(error));
    process.exit(1);
  }
}

export interface RollbackCommandOptions {
  user?: string;
  summary?: string;
}

export async function rollbackCommand(title: string, options: RollbackCommandOptions): Promise<void> {
  const spinner = ora(`Reading the latest revision of ${title}...`).start();

  try {
    await withContext(async ({ client }) => {
      const top = await client.revisions.getTopRevision(title);
      if (!top) {
        spinner.stop();
        printWarning(`"${title}" does not exist`);
        return;
      }
      if (options.user && top.user !== options.user) {
        spinner.stop();
        printWarning(`Latest revision is by ${top.user ?? '(hidden)'}, not ${options.user}; nothing rolled back`);
        return;
      }

      spinner.text = 'Rolling back...';
      const outcome = await client.rollback(top, { reason: options.summary });
      spinner.stop();
      report(outcome);
    }, { requireAuth: true });
  } catch (error) {
    spinner.fail('Rollback failed');
    printError(describeError(error));
    process.exit(1);
  }
}

/**
 * Read-only commands - contribs, history, log, lag
 */

import chalk from 'chalk';
import ora from 'ora';
import { withContext } from '../utils/context.js';
import { describeError, logTable, printError, printInfo, revisionTable } from '../utils/format.js';

export interface ListCommandOptions {
  limit?: number;
}

export async function contribsCommand(user: string, options: ListCommandOptions & { namespace?: number }): Promise<void> {
  const spinner = ora(`Fetching contributions of ${user}...`).start();
  try {
    await withContext(async ({ client }) => {
      const revisions = await client.users.contribs(user, {
        limit: options.limit ?? 50,
        namespace: options.namespace,
      });
      spinner.stop();
      if (revisions.length === 0) {
        printInfo('No contributions');
        return;
      }
      console.log(revisionTable(revisions, true));
    });
  } catch (error) {
    spinner.fail('Failed');
    printError(describeError(error));
    process.exit(1);
  }
}

export async function historyCommand(title: string, options: ListCommandOptions): Promise<void> {
  const spinner = ora(`Fetching history of ${title}...`).start();
  try {
    await withContext(async ({ client }) => {
      const revisions = await client.revisions.getPageHistory(title, { limit: options.limit ?? 50 });
      spinner.stop();
      if (revisions.length === 0) {
        printInfo('No revisions (page does not exist?)');
        return;
      }
      console.log(chalk.bold(title));
      console.log(revisionTable(revisions, false));
    });
  } catch (error) {
    spinner.fail('Failed');
    printError(describeError(error));
    process.exit(1);
  }
}

export interface LogCommandOptions extends ListCommandOptions {
  type?: string;
  user?: string;
  target?: string;
}

export async function logCommand(options: LogCommandOptions): Promise<void> {
  const spinner = ora('Fetching log entries...').start();
  try {
    await withContext(async ({ client }) => {
      const entries = await client.lists.getLogEntries({
        type: options.type,
        user: options.user,
        target: options.target,
        limit: options.limit ?? 50,
      });
      spinner.stop();
      if (entries.length === 0) {
        printInfo('No log entries');
        return;
      }
      console.log(logTable(entries));
    });
  } catch (error) {
    spinner.fail('Failed');
    printError(describeError(error));
    process.exit(1);
  }
}

export async function lagCommand(): Promise<void> {
  try {
    await withContext(async ({ client }) => {
      const lag = await client.getCurrentDatabaseLag();
      const color = lag > client.maxLag ? chalk.red : chalk.green;
      console.log(`${client.domain}: ${color(`${lag}s`)} replication lag (limit ${client.maxLag}s)`);
    });
  } catch (error) {
    printError(describeError(error));
    process.exit(1);
  }
}

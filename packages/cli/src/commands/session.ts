/**
 * Session commands - login, logout, whoami
 */

import chalk from 'chalk';
import ora from 'ora';
import { createClientFromEnv } from '@wikibot/core';
import { clearSession, loadSession, saveSession, sessionFilePath } from '../utils/context.js';
import { createStatusTable, describeError, printError, printInfo, printSuccess, printWarning } from '../utils/format.js';

export interface LoginOptions {
  user?: string;
}

export async function loginCommand(options: LoginOptions): Promise<void> {
  const username = options.user ?? process.env.WIKI_BOT_USER;
  const password = process.env.WIKI_BOT_PASS;

  if (!username || !password) {
    printError('Credentials required');
    printInfo('Set WIKI_BOT_USER and WIKI_BOT_PASS environment variables');
    process.exit(1);
  }

  const spinner = ora(`Logging in as ${username}...`).start();

  try {
    const client = createClientFromEnv();
    await client.login(username, password);
    saveSession(client);
    spinner.stop();
    printSuccess(`Logged in to ${client.domain} as ${client.username ?? username}`);
    printInfo(`Session saved to ${sessionFilePath()}`);
  } catch (error) {
    spinner.fail('Login failed');
    printError(describeError(error));
    process.exit(1);
  }
}

export interface LogoutOptions {
  everywhere?: boolean;
}

export async function logoutCommand(options: LogoutOptions): Promise<void> {
  const client = loadSession();
  if (!client) {
    printWarning('No saved session');
    return;
  }

  try {
    if (options.everywhere) {
      const spinner = ora('Ending the session on the server...').start();
      await client.logoutEverywhere();
      spinner.stop();
    } else {
      await client.logout();
    }
    clearSession();
    printSuccess('Logged out');
  } catch (error) {
    printError(describeError(error));
    process.exit(1);
  }
}

export async function whoamiCommand(): Promise<void> {
  const client = loadSession();
  if (!client?.isLoggedIn) {
    printInfo('Not logged in');
    return;
  }

  const spinner = ora('Checking account...').start();
  try {
    await client.refreshIdentity();
    saveSession(client);
    spinner.stop();

    const identity = client.session.identity;
    const table = createStatusTable();
    table.push(
      [chalk.dim('Wiki'), client.domain],
      [chalk.dim('User'), client.username ?? ''],
      [chalk.dim('Edits'), String(identity?.editCount ?? 0)],
      [chalk.dim('Groups'), identity?.listGroups().join(', ') ?? ''],
      [chalk.dim('Bot'), identity?.isA('bot') ? chalk.green('yes') : 'no']
    );
    console.log(table.toString());
  } catch (error) {
    spinner.fail('Could not read the account');
    printError(describeError(error));
    process.exit(1);
  }
}

#!/usr/bin/env node
/**
 * @wikibot/cli - Command-line interface for @wikibot/core
 *
 * Session management plus a handful of read and write commands against
 * the wiki named by WIKI_DOMAIN.
 */

import { resolve } from 'node:path';
import { existsSync } from 'node:fs';
import { config as dotenvConfig } from 'dotenv';
import { Command } from 'commander';
import { VERSION } from '@wikibot/core';

// Load .env from the working directory (where user credentials live)
const projectEnv = resolve(process.cwd(), '.env');
if (existsSync(projectEnv)) {
  dotenvConfig({ path: projectEnv });
}

// Import commands
import { loginCommand, logoutCommand, whoamiCommand } from './commands/session.js';
import { contribsCommand, historyCommand, lagCommand, logCommand } from './commands/read.js';
import { deleteCommand, editCommand, rollbackCommand } from './commands/write.js';
import { parseLimit, parseNamespaceId } from './utils/format.js';

const program = new Command();

program
  .name('wikibot')
  .description('Command-line client for MediaWiki sites')
  .version(VERSION);

// Session
program
  .command('login')
  .description('Log in and save the session (password from WIKI_BOT_PASS)')
  .option('-u, --user <name>', 'Account name (default: WIKI_BOT_USER)')
  .action(loginCommand);

program
  .command('logout')
  .description('Forget the saved session')
  .option('--everywhere', 'Also end the session on the server')
  .action(logoutCommand);

program
  .command('whoami')
  .description('Show the logged-in account')
  .action(whoamiCommand);

// Reads
program
  .command('contribs <user>')
  .description('List contributions of a user')
  .option('-n, --namespace <id>', 'Only this namespace', parseNamespaceId)
  .option('-l, --limit <n>', 'Limit results', parseLimit, 50)
  .action(contribsCommand);

program
  .command('history <title>')
  .description('List revisions of a page, newest first')
  .option('-l, --limit <n>', 'Limit results', parseLimit, 50)
  .action(historyCommand);

program
  .command('log')
  .description('List log entries, newest first')
  .option('--type <type>', 'Log type (delete, move, block, ...)')
  .option('--user <name>', 'Only actions by this user')
  .option('--target <title>', 'Only actions on this page')
  .option('-l, --limit <n>', 'Limit results', parseLimit, 50)
  .action(logCommand);

program
  .command('lag')
  .description('Show current database replication lag')
  .action(lagCommand);

// Writes
program
  .command('edit <title>')
  .description('Replace the text of a page (requires authentication)')
  .requiredOption('-s, --summary <text>', 'Edit summary (required)')
  .option('-f, --file <path>', 'Read new text from a file')
  .option('-t, --text <text>', 'New text')
  .option('--minor', 'Mark as a minor edit')
  .action(editCommand);

program
  .command('delete <title>')
  .description('Delete a page from the wiki (requires authentication)')
  .requiredOption('--reason <text>', 'Reason for deletion (required)')
  .option('--dry-run', 'Preview deletion without making changes')
  .action(deleteCommand);

program
  .command('rollback <title>')
  .description('Revert the latest run of edits by one user (requires authentication)')
  .option('--user <name>', 'Only roll back if this user made the latest edit')
  .option('-s, --summary <text>', 'Rollback summary')
  .action(rollbackCommand);

await program.parseAsync();

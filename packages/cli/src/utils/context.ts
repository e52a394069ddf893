/**
 * CLI context utilities
 *
 * Builds the client for a command: resumes a saved session when one exists,
 * otherwise starts from the WIKI_* environment. Logged-in sessions are
 * written back after the command so later invocations skip the login.
 */

import { dirname, resolve } from 'node:path';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import {
  WikiClient,
  createClientFromEnv,
  createLogger,
} from '@wikibot/core';

/** CLI context with all dependencies */
export interface CliContext {
  client: WikiClient;
  sessionPath: string;
}

/**
 * Where the session snapshot lives: WIKIBOT_SESSION, or .wikibot/session.json
 * under the working directory
 */
export function sessionFilePath(): string {
  return process.env.WIKIBOT_SESSION
    ? resolve(process.env.WIKIBOT_SESSION)
    : resolve(process.cwd(), '.wikibot', 'session.json');
}

/**
 * Load the saved session, or null when there is none
 */
export function loadSession(path: string = sessionFilePath()): WikiClient | null {
  if (!existsSync(path)) return null;
  const data: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return WikiClient.restore(data, { logger: createLogger('cli') });
}

/**
 * Save a session snapshot with owner-only permissions
 */
export function saveSession(client: WikiClient, path: string = sessionFilePath()): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(client.snapshot(), null, 2), { encoding: 'utf-8', mode: 0o600 });
}

export function clearSession(path: string = sessionFilePath()): void {
  rmSync(path, { force: true });
}

/**
 * Create CLI context
 *
 * @param requireAuth Log in from WIKI_BOT_USER / WIKI_BOT_PASS when no
 *   logged-in session was saved
 */
export async function createContext(options: { requireAuth?: boolean } = {}): Promise<CliContext> {
  const sessionPath = sessionFilePath();
  const client = loadSession(sessionPath) ?? createClientFromEnv();

  if (options.requireAuth && !client.isLoggedIn) {
    const username = process.env.WIKI_BOT_USER;
    const password = process.env.WIKI_BOT_PASS;
    if (!username || !password) {
      throw new Error('Not logged in: run `wikibot login` or set WIKI_BOT_USER and WIKI_BOT_PASS');
    }
    await client.login(username, password);
  }

  return { client, sessionPath };
}

/**
 * Run a command with context management
 */
export async function withContext<T>(
  fn: (ctx: CliContext) => Promise<T>,
  options: { requireAuth?: boolean } = {}
): Promise<T> {
  const ctx = await createContext(options);
  try {
    return await fn(ctx);
  } finally {
    if (ctx.client.isLoggedIn) {
      saveSession(ctx.client, ctx.sessionPath);
    }
  }
}

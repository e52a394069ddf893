/**
 * Client configuration from environment variables
 */

import { ValidationError } from '../api/errors.js';
import type { Assertion } from '../api/types.js';
import type { ClientConfig } from '../api/client.js';

const ASSERTION_NAMES: Record<string, Assertion> = {
  'logged-in': 'logged-in',
  user: 'logged-in',
  bot: 'bot',
  'no-messages': 'no-messages',
};

function readInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Parse a comma-separated assertion list such as `logged-in,bot`
 */
export function parseAssertions(raw: string | undefined): Assertion[] {
  const assertions: Assertion[] = [];
  for (const part of (raw ?? '').split(',')) {
    const name = part.trim().toLowerCase();
    if (!name) continue;
    const assertion = ASSERTION_NAMES[name];
    if (!assertion) {
      throw new ValidationError(`Unknown assertion "${part.trim()}"; use logged-in, bot or no-messages`);
    }
    if (!assertions.includes(assertion)) assertions.push(assertion);
  }
  return assertions;
}

/**
 * Read WIKI_* variables into a client configuration
 */
export function loadClientConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const domain = env.WIKI_DOMAIN;
  if (!domain) {
    throw new ValidationError('WIKI_DOMAIN environment variable required');
  }

  const timeout = readInt(env, 'WIKI_HTTP_TIMEOUT_MS');
  const family = env.WIKI_FAMILY === 'wikimedia' ? 'wikimedia' : 'mediawiki';

  return {
    domain,
    family,
    scriptPath: env.WIKI_SCRIPT_PATH || undefined,
    userAgent: env.WIKI_USER_AGENT || undefined,
    throttleMs: readInt(env, 'WIKI_THROTTLE_MS'),
    maxLag: readInt(env, 'WIKI_MAXLAG'),
    statusCheckInterval: readInt(env, 'WIKI_STATUS_INTERVAL'),
    assertions: parseAssertions(env.WIKI_ASSERT),
    connectTimeoutMs: timeout,
  };
}

/**
 * Login, logout and session snapshots
 */

import type { ApiContext } from '../api/context.js';
import { AuthenticationError, ProtocolError, ValidationError, type AuthenticationFailure } from '../api/errors.js';
import { normalizeTitle } from '../models/namespace.js';
import type { UserQueries } from '../query/users.js';
import type { SiteCapabilities } from '../site/capabilities.js';
import type { StatusChecker } from '../status/checker.js';
import { attr, decodeError, decodeToken } from '../wire/decode.js';
import { firstElement } from '../wire/fragments.js';
import { Identity } from './identity.js';
import { SNAPSHOT_VERSION, type SessionSnapshot } from './snapshot.js';

export interface SessionManagerOptions {
  /** Pause after a failed login before reporting it */
  loginCooldownMs: number;
  userAgent: string;
}

/**
 * Map a failed login response to a failure reason
 */
export function loginFailure(result: string, reason: string): AuthenticationFailure {
  if (result === 'WrongPass' || result === 'WrongPluginPass' || /password/i.test(reason)) {
    return 'bad-credentials';
  }
  if (result === 'NotExists' || /does not exist|no such user/i.test(reason)) {
    return 'unknown-account';
  }
  return 'unknown';
}

export class SessionManager {
  constructor(
    private readonly ctx: ApiContext,
    private readonly site: SiteCapabilities,
    private readonly users: UserQueries,
    private readonly status: StatusChecker,
    private readonly options: SessionManagerOptions
  ) {}

  /**
   * Log in. Rejects with an AuthenticationError after the login cool-down
   * when the server refuses.
   */
  async login(username: string, password: string): Promise<void> {
    const name = normalizeTitle(username);
    if (!name) {
      throw new ValidationError('Username must not be empty');
    }

    const { session, api, clock, logger } = this.ctx;
    await session.exclusive(async () => {
      const tokenXml = await api.read({ action: 'query', meta: 'tokens', type: 'login' }, { harvest: 'both' });
      const token = decodeToken(tokenXml, 'login');
      if (!token) {
        throw new ProtocolError('No login token returned', tokenXml);
      }

      const xml = await api.write({ action: 'login', lgname: name, lgpassword: password, lgtoken: token }, 'both');
      const login = firstElement(xml, 'login');
      const result = login ? attr(login.attrs, 'result') ?? '' : '';

      if (login && result === 'Success') {
        const identity = new Identity(attr(login.attrs, 'lgusername') ?? name);
        identity.update(await this.users.getCurrentUserInfo());
        session.identity = identity;
        session.watchlist = null;
        session.writesBlocked = false;
        session.statusCounter = 0;
        logger.info(`Successfully logged in as ${identity.name}, page size ${session.pageSize}`);
        return;
      }

      const reason = (login && attr(login.attrs, 'reason')) ?? decodeError(xml)?.info ?? '';
      logger.warn(`Failed to log in as ${name}: ${result || 'no result'} ${reason}`.trim());
      await clock.sleep(this.options.loginCooldownMs);
      throw new AuthenticationError(
        `Login as ${name} failed: ${reason || result || 'unknown response'}`,
        loginFailure(result, reason),
        result || undefined
      );
    });
  }

  /**
   * Forget the login locally. The server-side session stays valid.
   */
  async logout(): Promise<void> {
    const { session, logger } = this.ctx;
    await session.exclusive(async () => {
      const name = session.identity?.name;
      session.reset();
      logger.info(name ? `Logged out ${name}` : 'Logged out');
    });
  }

  /**
   * End the session on the server as well, invalidating every snapshot of it
   */
  async logoutEverywhere(): Promise<void> {
    const { session, api, logger } = this.ctx;
    await session.exclusive(async () => {
      try {
        if (!session.identity) return;
        const tokenXml = await api.read({ action: 'query', meta: 'tokens', type: 'csrf' }, { harvest: 'refresh-write' });
        const token = decodeToken(tokenXml, 'csrf');
        if (!token) {
          throw new ProtocolError('No token returned for logout', tokenXml);
        }
        const xml = await api.write({ action: 'logout', token });
        const error = decodeError(xml);
        if (error) {
          throw new ProtocolError(`logout failed: ${error.code}: ${error.info}`, xml, error.code);
        }
        logger.info(`Logged out ${session.identity.name} on the server`);
      } finally {
        session.reset();
      }
    });
  }

  /**
   * Re-read the logged-in account's rights and groups
   */
  async refreshIdentity(): Promise<void> {
    await this.ctx.session.exclusive(() => this.status.refresh());
  }

  snapshot(): SessionSnapshot {
    const { session } = this.ctx;
    return {
      version: SNAPSHOT_VERSION,
      site: {
        family: this.site.family,
        domain: this.site.domain,
        scriptPath: this.site.scriptPath,
        protocol: this.site.protocol,
      },
      username: session.identity?.name ?? null,
      cookies: session.cookies.toJSON(),
      throttleMs: session.throttleMs,
      maxLag: session.maxLag,
      statusCheckInterval: session.statusCheckInterval,
      assertions: [...session.assertions],
      namespaces: session.namespaces?.toRecord() ?? null,
      userAgent: this.options.userAgent,
    };
  }
}

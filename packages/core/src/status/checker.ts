/**
 * Periodic identity refresh and assertion checks run before mutations.
 * Always called from inside the session's exclusive section.
 */

import type { ApiContext } from '../api/context.js';
import { AssertionError } from '../api/errors.js';
import type { UserQueries } from '../query/users.js';

export class StatusChecker {
  constructor(
    private readonly ctx: ApiContext,
    private readonly users: UserQueries
  ) {}

  /**
   * Count one mutation. Every `statusCheckInterval` mutations (or when the
   * identity has no cached rights) re-read rights and, under the
   * no-messages assertion, the new-message flag. Then check assertions.
   */
  async check(): Promise<void> {
    const { session } = this.ctx;
    const { identity } = session;

    if (identity && (session.statusCounter >= session.statusCheckInterval || !identity.loaded)) {
      await this.refresh();
    } else {
      session.statusCounter++;
    }

    this.checkAssertions();
  }

  /**
   * Re-read the logged-in account's rights and groups now
   */
  async refresh(): Promise<void> {
    const { session, logger } = this.ctx;
    const { identity } = session;
    if (!identity) return;

    identity.update(await this.users.getCurrentUserInfo());
    session.statusCounter = 0;
    logger.debug(`Refreshed rights of ${identity.name}`);

    if (session.assertions.has('no-messages') && (await this.users.hasNewMessages())) {
      throw new AssertionError(`${identity.name} has new messages`, 'no-messages');
    }
  }

  private checkAssertions(): void {
    const { session } = this.ctx;
    const { identity, assertions } = session;

    if (assertions.has('logged-in') && !identity) {
      throw new AssertionError('Not logged in', 'logged-in');
    }
    if (assertions.has('bot') && !identity?.isA('bot')) {
      throw new AssertionError(`${identity?.name ?? 'Anonymous user'} is not a bot`, 'bot');
    }
  }
}

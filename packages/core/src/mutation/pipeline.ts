/**
 * Mutation pipeline
 *
 * Every write runs the same steps inside the session's exclusive section:
 * status check, capability check, token fetch, protection check, dispatch,
 * classification, and finally the throttle. A retryable failure re-runs the
 * steps from the token fetch once; a second failure is thrown.
 */

import type { ApiContext } from '../api/context.js';
import { PermissionError, SessionError, isWikiError } from '../api/errors.js';
import type { MutationOutcome, PageTokens } from '../api/types.js';
import { pageTokenParams } from '../query/pages.js';
import type { RateGovernor } from '../session/governor.js';
import type { StatusChecker } from '../status/checker.js';
import { decodePageTokens } from '../wire/decode.js';
import { classifyResponse, type SuccessMarker } from './classify.js';
import { evaluateProtection, type ProtectedAction } from './permissions.js';

/** Attempts per mutation; upload uses 1 */
const MAX_ATTEMPTS = 2;

export interface MutationPlan {
  /** Operation name for logs and errors */
  action: string;
  /** Page whose tokens and protection are checked */
  title: string;
  /** How protection applies, or null when it does not (e-mail) */
  protectedAs: ProtectedAction | null;
  /** User right the logged-in account must hold */
  right?: string;
  /** Allow a second attempt after a retryable failure (default true) */
  retry?: boolean;
  /**
   * Inspect the fresh tokens before sending. Returning a string skips the
   * mutation with that note; nothing is sent.
   */
  prepare?: (tokens: PageTokens) => Promise<string | null>;
  /** Send the mutating request; returns the raw response */
  send: (tokens: PageTokens) => Promise<string>;
  success: SuccessMarker;
  /** Server error codes that end the mutation without an error */
  ignorable?: readonly string[];
}

export class MutationPipeline {
  constructor(
    private readonly ctx: ApiContext,
    private readonly governor: RateGovernor,
    private readonly status: StatusChecker
  ) {}

  /**
   * Run a mutation. Resolves with the outcome or rejects with a WikiError.
   */
  run(plan: MutationPlan): Promise<MutationOutcome> {
    const { session, clock } = this.ctx;
    return session.exclusive(async () => {
      const startedAt = clock.now();
      try {
        return await this.execute(plan);
      } finally {
        await this.governor.throttle(startedAt);
      }
    });
  }

  private async execute(plan: MutationPlan): Promise<MutationOutcome> {
    const { session, logger } = this.ctx;

    if (session.writesBlocked) {
      throw new SessionError(`${session.identity?.name ?? 'Session'} is blocked from editing`, 'blocked');
    }

    await this.status.check();
    this.requireRight(plan);

    const attempts = plan.retry === false ? 1 : MAX_ATTEMPTS;
    for (let attempt = 1; ; attempt++) {
      try {
        const tokens = await this.fetchTokens(plan.title);
        this.checkPermission(plan, tokens);

        const skip = plan.prepare ? await plan.prepare(tokens) : null;
        if (skip !== null) {
          logger.info(`Skipped ${plan.action} of ${plan.title}: ${skip}`);
          return { action: plan.action, title: plan.title, status: 'skipped', note: skip };
        }

        const raw = await plan.send(tokens);
        const result = classifyResponse(raw, plan.action, plan.success, plan.ignorable);
        if (result.outcome === 'ignored') {
          logger.info(`Server declined ${plan.action} of ${plan.title}: ${result.code}`);
          return { action: plan.action, title: plan.title, status: 'skipped', note: result.code };
        }

        logger.info(`Successfully completed ${plan.action} of ${plan.title}`);
        return { action: plan.action, title: plan.title, status: 'done' };
      } catch (error) {
        if (error instanceof SessionError && error.reason === 'blocked') {
          session.writesBlocked = true;
          session.cookies.clearWrite();
          logger.error(`Cannot ${plan.action} ${plan.title}: ${error.message}`);
        }
        if (isWikiError(error) && error.retryable && attempt < attempts) {
          logger.warn(`${plan.action} of ${plan.title} failed (${error.message}), retrying`);
          continue;
        }
        throw error;
      }
    }
  }

  /**
   * Fresh token bundle for the target. Rebuilds the write cookie jar, so it
   * only runs inside the exclusive section.
   */
  private async fetchTokens(title: string): Promise<PageTokens> {
    const xml = await this.ctx.api.read(pageTokenParams(title), { harvest: 'refresh-write' });
    return decodePageTokens(xml, title);
  }

  private requireRight(plan: MutationPlan): void {
    if (!plan.right) return;
    const { identity } = this.ctx.session;
    if (!identity?.isAllowedTo(plan.right)) {
      throw new PermissionError(
        `${identity?.name ?? 'Anonymous user'} does not have the ${plan.right} right`,
        'missing-right',
        plan.title
      );
    }
  }

  private checkPermission(plan: MutationPlan, tokens: PageTokens): void {
    const { session, logger } = this.ctx;
    const { identity } = session;

    if (identity && session.cookies.isEmpty('write')) {
      logger.error(`Cookies have expired for ${identity.name}`);
      session.reset();
      throw new SessionError('Session cookies have expired, log in again', 'expired');
    }

    if (!plan.protectedAs) return;
    const verdict = evaluateProtection(
      tokens.protection,
      tokens.cascade,
      { loggedIn: identity !== null, admin: identity?.isAdmin ?? false },
      plan.protectedAs
    );
    if (!verdict.allowed) {
      const level = tokens.cascade ? 'cascading protection' : `${tokens.protection} protection`;
      throw new PermissionError(`Cannot ${plan.action} ${plan.title}: ${level}`, verdict.reason, plan.title);
    }
  }
}

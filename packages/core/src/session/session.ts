/**
 * Per-site session state
 *
 * Cookies, identity and the namespace/watchlist caches are the only state
 * shared between concurrent operations. Logins, logouts and mutations run
 * one at a time through `exclusive`; the database-lag probe has its own lock.
 */

import { ValidationError } from '../api/errors.js';
import type { Assertion } from '../api/types.js';
import type { NamespaceTable } from '../models/namespace.js';
import { CookieStore } from '../transport/cookies.js';
import { Mutex } from '../utils/mutex.js';
import type { Identity } from './identity.js';

/** Page size for list queries */
export const DEFAULT_PAGE_SIZE = 500;
/** Page size for accounts with the apihighlimits right */
export const HIGH_PAGE_SIZE = 5000;

export interface SessionSettings {
  throttleMs: number;
  maxLag: number;
  statusCheckInterval: number;
  assertions: Iterable<Assertion>;
}

export class Session {
  readonly cookies: CookieStore;
  readonly lagLock = new Mutex();
  private readonly writeLock = new Mutex();

  identity: Identity | null = null;
  namespaces: NamespaceTable | null = null;
  watchlist: string[] | null = null;
  /** Set once the server reports the account blocked */
  writesBlocked = false;

  lastLagCheck = 0;
  statusCounter = 0;

  private throttle = 0;
  private lag = 0;
  private interval = 1;
  readonly assertions: Set<Assertion>;

  constructor(settings: SessionSettings, cookies: CookieStore = new CookieStore()) {
    this.cookies = cookies;
    this.throttleMs = settings.throttleMs;
    this.maxLag = settings.maxLag;
    this.statusCheckInterval = settings.statusCheckInterval;
    this.assertions = new Set(settings.assertions);
  }

  /** Run `fn` with no other login, logout or mutation in flight */
  exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.writeLock.runExclusive(fn);
  }

  get throttleMs(): number {
    return this.throttle;
  }

  set throttleMs(ms: number) {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new ValidationError(`Throttle must be a non-negative number of milliseconds, got ${ms}`);
    }
    this.throttle = ms;
  }

  /** Maximum tolerated replication lag in seconds; below 1 disables the check */
  get maxLag(): number {
    return this.lag;
  }

  set maxLag(seconds: number) {
    if (!Number.isFinite(seconds)) {
      throw new ValidationError(`Max lag must be a number, got ${seconds}`);
    }
    this.lag = seconds;
  }

  get statusCheckInterval(): number {
    return this.interval;
  }

  set statusCheckInterval(calls: number) {
    if (!Number.isInteger(calls) || calls < 1) {
      throw new ValidationError(`Status check interval must be a positive integer, got ${calls}`);
    }
    this.interval = calls;
  }

  get loggedIn(): boolean {
    return this.identity !== null;
  }

  get pageSize(): number {
    return this.identity?.isAllowedTo('apihighlimits') ? HIGH_PAGE_SIZE : DEFAULT_PAGE_SIZE;
  }

  /** Make the next mutation re-check identity and assertions first */
  forceStatusCheck(): void {
    this.statusCounter = this.interval;
  }

  /** Forget the account; the next write needs a new login */
  reset(): void {
    this.identity = null;
    this.watchlist = null;
    this.writesBlocked = false;
    this.cookies.clear();
  }
}

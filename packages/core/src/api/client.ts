/**
 * Wiki API Client
 *
 * Stateful client for one wiki: a session (cookies, identity, caches),
 * lag-aware reads, paginated lists, and serialized, throttled mutations.
 */

import { loadClientConfigFromEnv } from '../config/env.js';
import { NamespaceTable } from '../models/namespace.js';
import { Mutations } from '../mutation/actions.js';
import { MutationPipeline } from '../mutation/pipeline.js';
import { ListQueries } from '../query/lists.js';
import { PageQueries } from '../query/pages.js';
import { RevisionQueries } from '../query/revisions.js';
import { SiteQueries } from '../query/site.js';
import { UserQueries } from '../query/users.js';
import { standardCapabilities, wikimediaCapabilities, type SiteCapabilities } from '../site/capabilities.js';
import { RateGovernor } from '../session/governor.js';
import { Identity } from '../session/identity.js';
import { SessionManager } from '../session/manager.js';
import { Session } from '../session/session.js';
import { parseSnapshot, type SessionSnapshot } from '../session/snapshot.js';
import { StatusChecker } from '../status/checker.js';
import { CookieStore } from '../transport/cookies.js';
import { HttpTransport, type FetchLike } from '../transport/http.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { decodeLag } from '../wire/decode.js';
import { ApiCaller } from './caller.js';
import type { ApiContext } from './context.js';
import { ValidationError } from './errors.js';
import type {
  Assertion,
  EditOptions,
  EmailOptions,
  MoveOptions,
  MutationOutcome,
  Revision,
  RollbackOptions,
  SiteEntry,
  UndoOptions,
} from './types.js';

/** Client configuration */
export interface ClientConfig {
  /** Site host name, e.g. en.wikipedia.org */
  domain: string;
  /** Path holding api.php */
  scriptPath?: string;
  protocol?: 'http' | 'https';
  /** Site family; 'wikimedia' enables the site matrix */
  family?: 'mediawiki' | 'wikimedia';
  /** User agent string */
  userAgent?: string;
  /** Minimum time between the starts of consecutive mutations (ms) */
  throttleMs?: number;
  /** Replication lag (s) above which requests wait; below 1 disables the check */
  maxLag?: number;
  /** Minimum time between lag probes (ms) */
  lagCheckIntervalMs?: number;
  /** Wait between lag probes while lag is too high (ms) */
  lagWaitMs?: number;
  /** Mutations between identity refreshes */
  statusCheckInterval?: number;
  assertions?: Assertion[];
  /** Ask for gzip-compressed responses */
  compressed?: boolean;
  /** Time allowed until response headers arrive (ms) */
  connectTimeoutMs?: number;
  /** Time allowed for the response body (ms) */
  readTimeoutMs?: number;
  /** Pause after a failed login (ms) */
  loginCooldownMs?: number;
  fetch?: FetchLike;
  clock?: Clock;
  logger?: Logger;
}

type ResolvedConfig = Required<Omit<ClientConfig, 'logger'>> & { logger?: Logger };

/** Default configuration */
const DEFAULT_CONFIG: Required<Omit<ClientConfig, 'domain' | 'fetch' | 'clock' | 'logger'>> = {
  scriptPath: '/w',
  protocol: 'https',
  family: 'mediawiki',
  userAgent: 'wikibot/0.1 (+https://www.mediawiki.org/wiki/API:Etiquette)',
  throttleMs: 10000,
  maxLag: 5,
  lagCheckIntervalMs: 30000,
  lagWaitMs: 30000,
  statusCheckInterval: 100,
  assertions: [],
  compressed: true,
  connectTimeoutMs: 30000,
  readTimeoutMs: 180000,
  loginCooldownMs: 20000,
};

function resolveConfig(config: ClientConfig): ResolvedConfig {
  const defaults = DEFAULT_CONFIG;
  return {
    domain: config.domain,
    scriptPath: config.scriptPath ?? defaults.scriptPath,
    protocol: config.protocol ?? defaults.protocol,
    family: config.family ?? defaults.family,
    userAgent: config.userAgent ?? defaults.userAgent,
    throttleMs: config.throttleMs ?? defaults.throttleMs,
    maxLag: config.maxLag ?? defaults.maxLag,
    lagCheckIntervalMs: config.lagCheckIntervalMs ?? defaults.lagCheckIntervalMs,
    lagWaitMs: config.lagWaitMs ?? defaults.lagWaitMs,
    statusCheckInterval: config.statusCheckInterval ?? defaults.statusCheckInterval,
    assertions: config.assertions ?? defaults.assertions,
    compressed: config.compressed ?? defaults.compressed,
    connectTimeoutMs: config.connectTimeoutMs ?? defaults.connectTimeoutMs,
    readTimeoutMs: config.readTimeoutMs ?? defaults.readTimeoutMs,
    loginCooldownMs: config.loginCooldownMs ?? defaults.loginCooldownMs,
    fetch: config.fetch ?? ((input, init) => fetch(input, init)),
    clock: config.clock ?? systemClock,
    logger: config.logger,
  };
}

/**
 * Wiki API Client
 */
export class WikiClient {
  readonly capabilities: SiteCapabilities;
  readonly session: Session;
  readonly logger: Logger;

  readonly site: SiteQueries;
  readonly pages: PageQueries;
  readonly revisions: RevisionQueries;
  readonly users: UserQueries;
  readonly lists: ListQueries;

  readonly config: Readonly<ResolvedConfig>;
  private readonly context: ApiContext;
  private readonly transport: HttpTransport;
  private readonly sessions: SessionManager;
  private readonly status: StatusChecker;
  private readonly mutations: Mutations;

  constructor(config: ClientConfig, cookies: CookieStore = new CookieStore()) {
    const resolved = resolveConfig(config);
    this.config = resolved;

    this.capabilities =
      resolved.family === 'wikimedia'
        ? wikimediaCapabilities(resolved.domain)
        : standardCapabilities(resolved.domain, resolved.scriptPath, resolved.protocol);
    this.logger = resolved.logger ?? createLogger(resolved.domain);

    this.session = new Session(
      {
        throttleMs: resolved.throttleMs,
        maxLag: resolved.maxLag,
        statusCheckInterval: resolved.statusCheckInterval,
        assertions: resolved.assertions,
      },
      cookies
    );

    this.transport = new HttpTransport({
      apiUrl: this.capabilities.apiUrl,
      userAgent: resolved.userAgent,
      compressed: resolved.compressed,
      connectTimeoutMs: resolved.connectTimeoutMs,
      readTimeoutMs: resolved.readTimeoutMs,
      fetch: resolved.fetch,
      cookies: this.session.cookies,
      logger: this.logger,
    });

    const governor = new RateGovernor(this.session, resolved.clock, this.logger, () => this.probeLag(), {
      lagCheckIntervalMs: resolved.lagCheckIntervalMs,
      lagWaitMs: resolved.lagWaitMs,
    });

    this.context = {
      session: this.session,
      api: new ApiCaller(this.transport, governor),
      clock: resolved.clock,
      logger: this.logger,
    };

    this.site = new SiteQueries(this.context);
    this.pages = new PageQueries(this.context, this.site);
    this.revisions = new RevisionQueries(this.context);
    this.users = new UserQueries(this.context);
    this.lists = new ListQueries(this.context, this.site);
    this.status = new StatusChecker(this.context, this.users);
    this.sessions = new SessionManager(this.context, this.capabilities, this.users, this.status, {
      loginCooldownMs: resolved.loginCooldownMs,
      userAgent: resolved.userAgent,
    });

    const pipeline = new MutationPipeline(this.context, governor, this.status);
    this.mutations = new Mutations(this.context, pipeline, this.site, this.pages, this.revisions, this.users);
  }

  /**
   * Resume a session from a snapshot. The first mutation afterwards
   * re-reads the account's rights.
   */
  static restore(snapshot: unknown, overrides: Partial<ClientConfig> = {}): WikiClient {
    const data: SessionSnapshot = parseSnapshot(snapshot);
    const client = new WikiClient(
      {
        domain: data.site.domain,
        scriptPath: data.site.scriptPath,
        protocol: data.site.protocol,
        family: data.site.family,
        userAgent: data.userAgent,
        throttleMs: data.throttleMs,
        maxLag: data.maxLag,
        statusCheckInterval: data.statusCheckInterval,
        assertions: data.assertions,
        ...overrides,
      },
      new CookieStore(data.cookies)
    );

    const { session } = client;
    session.identity = data.username ? new Identity(data.username) : null;
    session.namespaces = data.namespaces ? NamespaceTable.fromRecord(data.namespaces) : null;
    session.forceStatusCheck();
    client.logger.info(`Restored session${data.username ? ` for ${data.username}` : ''}`);
    return client;
  }

  // ===========================================================================
  // Session
  // ===========================================================================

  get domain(): string {
    return this.capabilities.domain;
  }

  get username(): string | null {
    return this.session.identity?.name ?? null;
  }

  get isLoggedIn(): boolean {
    return this.session.loggedIn;
  }

  login(username: string, password: string): Promise<void> {
    return this.sessions.login(username, password);
  }

  logout(): Promise<void> {
    return this.sessions.logout();
  }

  logoutEverywhere(): Promise<void> {
    return this.sessions.logoutEverywhere();
  }

  refreshIdentity(): Promise<void> {
    return this.sessions.refreshIdentity();
  }

  snapshot(): SessionSnapshot {
    return this.sessions.snapshot();
  }

  get throttleMs(): number {
    return this.session.throttleMs;
  }

  set throttleMs(ms: number) {
    this.session.throttleMs = ms;
  }

  get maxLag(): number {
    return this.session.maxLag;
  }

  set maxLag(seconds: number) {
    this.session.maxLag = seconds;
  }

  get statusCheckInterval(): number {
    return this.session.statusCheckInterval;
  }

  set statusCheckInterval(calls: number) {
    this.session.statusCheckInterval = calls;
  }

  setAssertions(assertions: Iterable<Assertion>): void {
    this.session.assertions.clear();
    for (const assertion of assertions) this.session.assertions.add(assertion);
  }

  // ===========================================================================
  // Site
  // ===========================================================================

  /**
   * Current replication lag in seconds, read without waiting on it
   */
  getCurrentDatabaseLag(): Promise<number> {
    return this.probeLag();
  }

  listSites(): Promise<SiteEntry[]> {
    return this.capabilities.listSites(this.context);
  }

  private async probeLag(): Promise<number> {
    const xml = await this.transport.request({
      method: 'GET',
      params: { action: 'query', meta: 'siteinfo', siprop: 'dbrepllag' },
      send: 'read',
    });
    return decodeLag(xml);
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  edit(title: string, text: string, summary: string, options?: EditOptions): Promise<MutationOutcome> {
    return this.mutations.edit(title, text, summary, options);
  }

  newSection(title: string, heading: string, text: string, options?: EditOptions): Promise<MutationOutcome> {
    return this.mutations.newSection(title, heading, text, options);
  }

  prepend(title: string, text: string, summary?: string, options?: EditOptions): Promise<MutationOutcome> {
    return this.mutations.prepend(title, text, summary, options);
  }

  delete(title: string, reason: string): Promise<MutationOutcome> {
    return this.mutations.delete(title, reason);
  }

  move(title: string, newTitle: string, reason: string, options?: MoveOptions): Promise<MutationOutcome> {
    return this.mutations.move(title, newTitle, reason, options);
  }

  rollback(revision: Revision, options?: RollbackOptions): Promise<MutationOutcome> {
    return this.mutations.rollback(revision, options);
  }

  undo(newest: Revision, oldest?: Revision, options?: UndoOptions): Promise<MutationOutcome> {
    return this.mutations.undo(newest, oldest, options);
  }

  upload(data: Uint8Array, filename: string, description: string, reason?: string): Promise<MutationOutcome> {
    return this.mutations.upload(data, filename, description, reason);
  }

  emailUser(user: string, subject: string, message: string, options?: EmailOptions): Promise<MutationOutcome> {
    return this.mutations.emailUser(user, subject, message, options);
  }

  purge(...titles: string[]): Promise<void> {
    return this.mutations.purge(...titles);
  }

  watch(...titles: string[]): Promise<void> {
    return this.mutations.watch(...titles);
  }

  unwatch(...titles: string[]): Promise<void> {
    return this.mutations.unwatch(...titles);
  }
}

/**
 * Create client from environment variables
 */
export function createClientFromEnv(env: NodeJS.ProcessEnv = process.env): WikiClient {
  return new WikiClient(loadClientConfigFromEnv(env));
}

/**
 * Create a client and log in
 */
export async function createAuthenticatedClient(env: NodeJS.ProcessEnv = process.env): Promise<WikiClient> {
  const client = createClientFromEnv(env);

  const username = env.WIKI_BOT_USER;
  const password = env.WIKI_BOT_PASS;

  if (!username || !password) {
    throw new ValidationError('WIKI_BOT_USER and WIKI_BOT_PASS environment variables required');
  }

  await client.login(username, password);
  return client;
}

/**
 * Wiki record and option type definitions
 */

import type { AssertionName } from './errors.js';

/** Request parameter value; arrays are sent pipe-joined, false/null/undefined are omitted */
export type ParamValue = string | number | boolean | Date | readonly (string | number)[] | null | undefined;

/** API request parameters */
export type RequestParams = Record<string, ParamValue>;

/** One revision of a page. Redacted fields are null. */
export interface Revision {
  readonly id: number;
  readonly parentId: number | null;
  readonly timestamp: Date;
  readonly title: string | null;
  readonly summary: string | null;
  readonly user: string | null;
  readonly minor: boolean;
  readonly bot: boolean;
  readonly isNew: boolean;
  /** Page size in bytes after this revision */
  readonly size: number;
  /** Recent-changes ID, only present on recent-changes records */
  readonly rcid?: number;
  /** Only present when fetched with a rollback token */
  readonly rollbackToken?: string;
}

/** Protection states a page can be in */
export type ProtectionLevel =
  | 'none'
  | 'semi'
  | 'full'
  | 'move-only'
  | 'semi+move'
  | 'create-protected'
  | 'upload-protected';

export interface BlockParameters {
  readonly anonOnly: boolean;
  readonly noCreate: boolean;
  readonly noAutoblock: boolean;
  readonly noEmail: boolean;
  readonly noUserTalk: boolean;
  /** Duration or expiry exactly as the server reports it */
  readonly duration: string;
}

/**
 * Per-type payload of a log entry.
 * `new-title` is the move destination (for `move_prot`, the title protection came from).
 */
export type LogDetails =
  | { readonly kind: 'new-title'; readonly title: string }
  | { readonly kind: 'rename'; readonly newName: string }
  | { readonly kind: 'block'; readonly block: BlockParameters }
  | { readonly kind: 'rights'; readonly groups: readonly string[] }
  | { readonly kind: 'protection'; readonly level: ProtectionLevel | null; readonly description: string }
  | { readonly kind: 'none' };

export interface LogEntry {
  readonly id: number | null;
  readonly type: string;
  /** Null when the action is hidden */
  readonly action: string | null;
  readonly reason: string | null;
  readonly performer: string | null;
  readonly target: string | null;
  readonly timestamp: Date;
  readonly details: LogDetails;
}

/** State needed to attempt a mutation on one page */
export interface PageTokens {
  readonly title: string;
  readonly exists: boolean;
  readonly protection: ProtectionLevel;
  readonly cascade: boolean;
  /** Edit (CSRF) token, also valid for move/delete/upload/email */
  readonly token: string;
  readonly lastRevisionId: number | null;
  readonly size: number | null;
  readonly touched: Date | null;
  readonly namespace: number;
}

export type Gender = 'male' | 'female' | 'unknown';

export interface UserInfo {
  readonly name: string;
  readonly exists: boolean;
  readonly blocked: boolean;
  readonly emailable: boolean;
  readonly editCount: number;
  readonly gender: Gender;
  readonly registration: Date | null;
  readonly groups: readonly string[];
  readonly rights: readonly string[];
}

export interface SiteStatistics {
  readonly pages: number;
  readonly articles: number;
  readonly edits: number;
  readonly images: number;
  readonly users: number;
  readonly activeUsers: number;
  readonly admins: number;
}

export interface SearchHit {
  readonly title: string;
  readonly snippet: string;
  readonly sectionTitle: string | null;
}

export interface ExternalLink {
  readonly title: string;
  readonly url: string;
}

export interface InterwikiBacklink {
  /** Local page containing the link */
  readonly title: string;
  readonly prefix: string;
  /** Linked title on the other wiki */
  readonly target: string;
}

export interface SiteEntry {
  readonly dbName: string;
  readonly url: string;
  readonly code: string;
}

/** Options shared by every paginated read */
export interface ListOptions {
  /** Stop after this many results (default: everything) */
  limit?: number;
  /** Results requested per page (default: the session's page size) */
  pageSize?: number;
}

export interface ContribsOptions extends ListOptions {
  namespace?: number;
  /** Start from this time and go backwards */
  start?: Date;
}

export interface HistoryOptions extends ListOptions {
  /** Newest revision time to include */
  start?: Date;
  /** Oldest revision time to include */
  end?: Date;
}

export interface LogQuery extends ListOptions {
  type?: string;
  user?: string;
  target?: string;
  /** Newest entry time (the list runs backwards from here) */
  start?: Date;
  /** Oldest entry time */
  end?: Date;
  namespace?: number;
}

export interface BlockListQuery extends ListOptions {
  user?: string;
  start?: Date;
  end?: Date;
}

export type RecentChangesHide = 'anon' | 'bot' | 'self' | 'minor' | 'patrolled' | 'redirect';

export interface RecentChangesOptions extends ListOptions {
  namespace?: number | readonly number[];
  hide?: readonly RecentChangesHide[];
}

export interface ListPagesOptions extends ListOptions {
  prefix?: string;
  namespace?: number;
  protection?: ProtectionLevel;
  /** Minimum size in bytes */
  minimum?: number;
  /** Maximum size in bytes */
  maximum?: number;
}

export interface EditOptions {
  minor?: boolean;
  /** Request the bot flag; only honoured when the account has the bot right */
  bot?: boolean;
  /** Section number, or 'new' to append a section */
  section?: number | 'new';
  /** Heading for a new section */
  sectionTitle?: string;
}

export interface MoveOptions {
  noRedirect?: boolean;
  moveTalk?: boolean;
  moveSubpages?: boolean;
}

export interface RollbackOptions {
  bot?: boolean;
  reason?: string;
}

export interface UndoOptions {
  reason?: string;
  minor?: boolean;
  bot?: boolean;
}

export interface EmailOptions {
  ccMe?: boolean;
}

/** What a mutation call ended in; failures are thrown instead */
export interface MutationOutcome {
  readonly action: string;
  readonly title: string;
  readonly status: 'done' | 'skipped';
  /** Why a skipped mutation sent nothing */
  readonly note?: string;
}

export type Assertion = AssertionName;

export interface SiteInfo {
  readonly siteName: string;
  readonly mainPage: string;
  readonly base: string;
  /** MediaWiki version string, e.g. "MediaWiki 1.41.0" */
  readonly generator: string;
  readonly language: string;
  readonly timezone: string;
}

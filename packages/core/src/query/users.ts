/**
 * User reads: account info, contributions, blocks
 */

import type { ApiContext } from '../api/context.js';
import { ProtocolError, ValidationError } from '../api/errors.js';
import type { BlockListQuery, ContribsOptions, ListOptions, LogEntry, Revision, UserInfo } from '../api/types.js';
import { attr, decodeBlockListEntry, decodeRevision, decodeUserInfo, flag } from '../wire/decode.js';
import { firstElement } from '../wire/fragments.js';
import { elementsOf, paginate } from './paginate.js';

const USER_PROPS = ['editcount', 'groups', 'rights', 'emailable', 'blockinfo', 'gender', 'registration'];
const CONTRIB_PROPS = ['ids', 'title', 'timestamp', 'flags', 'comment', 'size'];

/**
 * Common prefix of every address in an IPv4 range
 * (`10.1.0.0/16` → `10.1.`). Only /8, /16, /24 and /32 are supported.
 */
export function rangePrefix(range: string): { prefix: string; exact: boolean } {
  const match = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/.exec(range.trim());
  if (!match || match.slice(1, 5).some(octet => Number(octet) > 255)) {
    throw new ValidationError(`Not an IPv4 range: ${range}`);
  }
  const octets = match.slice(1, 5);
  switch (match[5]) {
    case '8':
      return { prefix: `${octets[0]}.`, exact: false };
    case '16':
      return { prefix: `${octets.slice(0, 2).join('.')}.`, exact: false };
    case '24':
      return { prefix: `${octets.slice(0, 3).join('.')}.`, exact: false };
    case '32':
      return { prefix: octets.join('.'), exact: true };
    default:
      throw new ValidationError(`Unsupported range size /${match[5]}; use /8, /16, /24 or /32`);
  }
}

export class UserQueries {
  constructor(private readonly ctx: ApiContext) {}

  /**
   * Account information for a user name
   */
  async getUserInfo(name: string): Promise<UserInfo> {
    const xml = await this.ctx.api.read({
      action: 'query',
      list: 'users',
      usprop: USER_PROPS,
      ususers: name,
    });
    const user = firstElement(xml, 'user');
    if (!user) {
      throw new ProtocolError(`No user record for ${name}`, xml);
    }
    return decodeUserInfo(user);
  }

  async userExists(name: string): Promise<boolean> {
    return (await this.getUserInfo(name)).exists;
  }

  /** Account information, or null for an unregistered name */
  async getUser(name: string): Promise<UserInfo | null> {
    const info = await this.getUserInfo(name);
    return info.exists ? info : null;
  }

  /**
   * Rights, groups and edit count of the account the session is logged in as
   */
  async getCurrentUserInfo(): Promise<UserInfo> {
    const xml = await this.ctx.api.read({
      action: 'query',
      meta: 'userinfo',
      uiprop: ['rights', 'groups', 'editcount', 'blockinfo', 'hasmsg'],
    });
    const info = firstElement(xml, 'userinfo');
    if (!info) {
      throw new ProtocolError('No userinfo in response', xml);
    }
    return decodeUserInfo(info);
  }

  /**
   * Whether the logged-in account has unread talk page messages
   */
  async hasNewMessages(): Promise<boolean> {
    const xml = await this.ctx.api.read({ action: 'query', meta: 'userinfo', uiprop: 'hasmsg' });
    const info = firstElement(xml, 'userinfo');
    return info ? flag(info.attrs, 'messages') : false;
  }

  /**
   * Registered user names in alphabetical order, from `start`
   */
  async allUsers(start = '', options: ListOptions = {}): Promise<string[]> {
    return paginate(
      this.ctx,
      {
        params: { action: 'query', list: 'allusers', aufrom: start || undefined },
        continueParam: 'aufrom',
        limitParam: 'aulimit',
        extract: elementsOf('u', u => attr(u.attrs, 'name') ?? null),
      },
      options
    );
  }

  /**
   * Contributions of a user, newest first
   */
  async contribs(user: string, options: ContribsOptions = {}): Promise<Revision[]> {
    return this.queryContribs({ ucuser: user }, options);
  }

  /**
   * Contributions of every user whose name starts with `prefix`
   */
  async contribsByPrefix(prefix: string, options: ContribsOptions = {}): Promise<Revision[]> {
    if (!prefix) {
      throw new ValidationError('Contribution prefix must not be empty');
    }
    return this.queryContribs({ ucuserprefix: prefix }, options);
  }

  /**
   * Contributions from an IPv4 range such as `192.0.2.0/24`
   */
  async rangeContribs(range: string, options: ContribsOptions = {}): Promise<Revision[]> {
    const { prefix, exact } = rangePrefix(range);
    return exact ? this.contribs(prefix, options) : this.contribsByPrefix(prefix, options);
  }

  /**
   * Current blocks, newest first. `start` is the newest time and `end` the oldest.
   */
  async getIPBlockList(query: BlockListQuery = {}): Promise<LogEntry[]> {
    const { start, end } = query;
    if (start && end && start.getTime() < end.getTime()) {
      throw new ValidationError('Block list start must not be earlier than its end');
    }
    return paginate(
      this.ctx,
      {
        params: {
          action: 'query',
          list: 'blocks',
          bkprop: ['id', 'user', 'by', 'timestamp', 'expiry', 'reason', 'flags'],
          bkusers: query.user,
          bkstart: start,
          bkend: end,
        },
        continueParam: 'bkcontinue',
        limitParam: 'bklimit',
        extract: elementsOf('block', decodeBlockListEntry),
      },
      query
    );
  }

  private queryContribs(who: { ucuser?: string; ucuserprefix?: string }, options: ContribsOptions): Promise<Revision[]> {
    return paginate(
      this.ctx,
      {
        params: {
          action: 'query',
          list: 'usercontribs',
          ucprop: CONTRIB_PROPS,
          ...who,
          ucnamespace: options.namespace,
          ucstart: options.start,
        },
        continueParam: 'uccontinue',
        limitParam: 'uclimit',
        extract: elementsOf('item', item => decodeRevision(item)),
      },
      options
    );
  }
}

/**
 * Record decoders
 *
 * Each decoder reads the attributes it knows from one fragment. A missing
 * attribute, or one the server flags as hidden (`userhidden`,
 * `commenthidden`, `actionhidden`), decodes to null; only a missing ID or
 * timestamp makes a record undecodable.
 */

import { ProtocolError } from '../api/errors.js';
import type {
  BlockParameters,
  Gender,
  LogDetails,
  LogEntry,
  PageTokens,
  ProtectionLevel,
  Revision,
  UserInfo,
} from '../api/types.js';
import { Namespace, NamespaceTable } from '../models/namespace.js';
import { childTexts, firstElement, scanElements, textOf, type Fragment } from './fragments.js';
import { parseTimestamp } from './params.js';

type Attrs = Record<string, string>;

/** Attribute value, or undefined when absent */
export function attr(attrs: Attrs, name: string): string | undefined {
  return Object.hasOwn(attrs, name) ? attrs[name] : undefined;
}

/** Presence of a flag attribute */
export function flag(attrs: Attrs, name: string): boolean {
  return Object.hasOwn(attrs, name);
}

export function intAttr(attrs: Attrs, name: string): number | null {
  const value = attr(attrs, name);
  if (value === undefined || value === '') return null;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : null;
}

function requireTimestamp(fragment: Fragment, name = 'timestamp'): Date {
  const timestamp = parseTimestamp(attr(fragment.attrs, name));
  if (!timestamp) {
    throw new ProtocolError(`Record without a usable ${name}: ${fragment.raw}`, fragment.raw);
  }
  return timestamp;
}

// ============================================================================
// Revisions
// ============================================================================

/**
 * Decode a `<rev>`, `<item>` (contributions) or `<rc>` element.
 * `titleHint` supplies the title when the element sits inside a `<page>`.
 */
export function decodeRevision(fragment: Fragment, titleHint: string | null = null): Revision {
  const a = fragment.attrs;
  const id = intAttr(a, 'revid');
  if (id === null) {
    throw new ProtocolError(`Revision without an ID: ${fragment.raw}`, fragment.raw);
  }

  const rcid = intAttr(a, 'rcid');
  const rollbackToken = attr(a, 'rollbacktoken');

  return {
    id,
    parentId: intAttr(a, 'parentid') ?? intAttr(a, 'old_revid'),
    timestamp: requireTimestamp(fragment),
    title: attr(a, 'title') ?? titleHint,
    summary: flag(a, 'commenthidden') ? null : attr(a, 'comment') ?? null,
    user: flag(a, 'userhidden') ? null : attr(a, 'user') ?? null,
    minor: flag(a, 'minor'),
    bot: flag(a, 'bot'),
    isNew: flag(a, 'new') || attr(a, 'type') === 'new',
    size: intAttr(a, 'newlen') ?? intAttr(a, 'size') ?? 0,
    ...(rcid !== null ? { rcid } : {}),
    ...(rollbackToken ? { rollbackToken } : {}),
  };
}

/**
 * Every revision in a `prop=revisions` response, titled from the enclosing page
 */
export function decodePageRevisions(xml: string): Revision[] {
  const revisions: Revision[] = [];
  for (const page of scanElements(xml, 'page')) {
    const title = attr(page.attrs, 'title') ?? null;
    for (const rev of scanElements(page.inner, 'rev')) {
      revisions.push(decodeRevision(rev, title));
    }
  }
  return revisions;
}

/** Revisions are ordered by timestamp, then ID */
export function compareRevisions(a: Revision, b: Revision): number {
  return a.timestamp.getTime() - b.timestamp.getTime() || a.id - b.id;
}

export function sameRevision(a: Revision, b: Revision): boolean {
  return a.id === b.id;
}

// ============================================================================
// Log entries
// ============================================================================

/**
 * Map a protection description such as
 * `[edit=autoconfirmed] (indefinite) [move=sysop] (indefinite)` to a level
 */
export function parseProtectionDescription(description: string): ProtectionLevel | null {
  if (description.includes('create=sysop')) return 'create-protected';
  if (description.includes('edit=sysop')) return 'full';
  if (description.includes('move=autoconfirmed')) return 'semi';
  if (description.includes('edit=autoconfirmed')) return 'semi+move';
  if (description.includes('move=sysop')) return 'move-only';
  if (description.includes('upload=sysop')) return 'upload-protected';
  return null;
}

function legacyParam(fragment: Fragment): string | undefined {
  const param = firstElement(fragment.inner, 'param');
  return param ? textOf(param) : undefined;
}

function splitFlags(flags: string | undefined): Set<string> {
  return new Set(
    (flags ?? '')
      .split(',')
      .map(f => f.trim())
      .filter(Boolean)
  );
}

function decodeLogDetails(fragment: Fragment, type: string, action: string): LogDetails {
  const params = firstElement(fragment.inner, 'params')?.attrs ?? {};

  switch (type) {
    case 'move': {
      const legacy = firstElement(fragment.inner, 'move');
      const title = (legacy && attr(legacy.attrs, 'new_title')) ?? attr(params, 'target_title');
      return title ? { kind: 'new-title', title } : { kind: 'none' };
    }
    case 'protect': {
      if (action === 'unprotect') {
        return { kind: 'protection', level: 'none', description: '' };
      }
      if (action === 'move_prot') {
        const title = legacyParam(fragment) ?? attr(params, 'oldtitle_title');
        return title ? { kind: 'new-title', title } : { kind: 'none' };
      }
      const description = legacyParam(fragment) ?? attr(params, 'description') ?? '';
      return { kind: 'protection', level: parseProtectionDescription(description), description };
    }
    case 'block': {
      if (action === 'unblock') return { kind: 'none' };
      const legacy = firstElement(fragment.inner, 'block');
      const source = legacy?.attrs ?? params;
      const flags = splitFlags(attr(source, 'flags'));
      for (const f of childTexts(fragment.inner, 'f')) flags.add(f.trim());
      const block: BlockParameters = {
        anonOnly: flags.has('anononly'),
        noCreate: flags.has('nocreate'),
        noAutoblock: flags.has('noautoblock'),
        noEmail: flags.has('noemail'),
        noUserTalk: flags.has('nousertalk'),
        duration: attr(source, 'duration') ?? '',
      };
      return { kind: 'block', block };
    }
    case 'rights': {
      const legacy = firstElement(fragment.inner, 'rights');
      if (legacy) {
        return { kind: 'rights', groups: [...splitFlags(attr(legacy.attrs, 'new'))] };
      }
      const newGroups = firstElement(fragment.inner, 'newgroups');
      return { kind: 'rights', groups: newGroups ? childTexts(newGroups.inner, 'g') : [] };
    }
    case 'renameuser': {
      const newName = attr(params, 'newuser') ?? legacyParam(fragment);
      return newName ? { kind: 'rename', newName } : { kind: 'none' };
    }
    default:
      return { kind: 'none' };
  }
}

/**
 * Decode a `list=logevents` `<item>`
 */
export function decodeLogEntry(fragment: Fragment): LogEntry {
  const a = fragment.attrs;
  const type = attr(a, 'type') ?? '';
  const commentHidden = flag(a, 'commenthidden');
  const actionHidden = flag(a, 'actionhidden');
  const action = actionHidden ? null : attr(a, 'action') ?? null;

  let reason: string | null = null;
  if (!commentHidden) {
    // account creations carry no comment
    reason = attr(a, 'comment') ?? (type === 'newusers' ? '' : null);
  }

  return {
    id: intAttr(a, 'logid'),
    type,
    action,
    reason,
    performer: flag(a, 'userhidden') ? null : attr(a, 'user') ?? null,
    target: actionHidden ? null : attr(a, 'title') ?? null,
    timestamp: requireTimestamp(fragment),
    details: commentHidden || action === null ? { kind: 'none' } : decodeLogDetails(fragment, type, action),
  };
}

/**
 * Decode a `list=blocks` `<block>` as a block log entry
 */
export function decodeBlockListEntry(fragment: Fragment): LogEntry {
  const a = fragment.attrs;
  const id = intAttr(a, 'id');
  return {
    id,
    type: 'block',
    action: 'block',
    reason: attr(a, 'reason') ?? null,
    performer: attr(a, 'by') ?? null,
    // autoblocks hide the address and are listed by block ID
    target: attr(a, 'user') ?? (id !== null ? `#${id}` : null),
    timestamp: requireTimestamp(fragment),
    details: {
      kind: 'block',
      block: {
        anonOnly: flag(a, 'anononly'),
        noCreate: flag(a, 'nocreate'),
        noAutoblock: !flag(a, 'autoblock'),
        noEmail: flag(a, 'noemail'),
        noUserTalk: !flag(a, 'allowusertalk'),
        duration: attr(a, 'expiry') ?? '',
      },
    },
  };
}

// ============================================================================
// Users
// ============================================================================

function decodeGender(value: string | undefined): Gender {
  return value === 'male' || value === 'female' ? value : 'unknown';
}

/**
 * Decode a `list=users` `<user>` or a `meta=userinfo` `<userinfo>`
 */
export function decodeUserInfo(fragment: Fragment): UserInfo {
  const a = fragment.attrs;
  const groups = firstElement(fragment.inner, 'groups');
  const rights = firstElement(fragment.inner, 'rights');

  return {
    name: attr(a, 'name') ?? '',
    exists: !flag(a, 'missing') && !flag(a, 'invalid') && !flag(a, 'anon'),
    blocked: flag(a, 'blockedby') || flag(a, 'blockid'),
    emailable: flag(a, 'emailable'),
    editCount: intAttr(a, 'editcount') ?? 0,
    gender: decodeGender(attr(a, 'gender')),
    registration: parseTimestamp(attr(a, 'registration')),
    groups: groups ? childTexts(groups.inner, 'g') : [],
    rights: rights ? childTexts(rights.inner, 'r') : [],
  };
}

// ============================================================================
// Pages
// ============================================================================

interface ProtectionRecord {
  type: string;
  level: string;
}

export function computeProtection(exists: boolean, records: readonly ProtectionRecord[]): ProtectionLevel {
  const levelOf = (type: string): string | undefined => records.find(r => r.type === type)?.level;

  if (!exists) {
    return levelOf('create') === 'sysop' ? 'create-protected' : 'none';
  }

  const edit = levelOf('edit');
  const move = levelOf('move');
  if (edit) {
    if (edit !== 'autoconfirmed') return 'full';
    return move === 'sysop' ? 'semi+move' : 'semi';
  }
  if (move === 'sysop') return 'move-only';
  if (levelOf('upload') === 'sysop') return 'upload-protected';
  return 'none';
}

/**
 * Decode a `prop=info&inprop=protection` page together with its CSRF token
 */
export function decodePageTokens(xml: string, title: string): PageTokens {
  const page = firstElement(xml, 'page');
  if (!page) {
    throw new ProtocolError(`No page record for ${title}`, xml);
  }
  const a = page.attrs;
  if (flag(a, 'invalid')) {
    throw new ProtocolError(`Invalid title: ${title}`, xml, 'invalidtitle');
  }

  const token = attr(a, 'edittoken') ?? decodeToken(xml, 'csrf');
  if (!token) {
    throw new ProtocolError(`No edit token returned for ${title}`, xml);
  }

  const records: ProtectionRecord[] = [];
  let cascade = false;
  for (const pr of scanElements(page.inner, 'pr')) {
    // `source` marks protection inherited from a cascading page
    if (flag(pr.attrs, 'source') || flag(pr.attrs, 'cascade')) cascade = true;
    records.push({
      type: attr(pr.attrs, 'type') ?? '',
      level: attr(pr.attrs, 'level') ?? '',
    });
  }

  const exists = !flag(a, 'missing');
  return {
    title: attr(a, 'title') ?? title,
    exists,
    protection: computeProtection(exists, records),
    cascade,
    token,
    lastRevisionId: intAttr(a, 'lastrevid'),
    size: intAttr(a, 'length'),
    touched: parseTimestamp(attr(a, 'touched')),
    namespace: intAttr(a, 'ns') ?? Namespace.Main,
  };
}

/** Token of a given type from a `meta=tokens` response */
export function decodeToken(xml: string, type: string): string | undefined {
  const tokens = firstElement(xml, 'tokens');
  return tokens ? attr(tokens.attrs, `${type}token`) : undefined;
}

// ============================================================================
// Site
// ============================================================================

/**
 * Build the namespace table from `meta=siteinfo&siprop=namespaces|namespacealiases`
 */
export function decodeNamespaces(xml: string): NamespaceTable {
  const entries: Array<[number, string]> = [];
  const aliases: Array<[string, number]> = [];

  const section = firstElement(xml, 'namespaces');
  for (const ns of section ? scanElements(section.inner, 'ns') : []) {
    const id = intAttr(ns.attrs, 'id');
    if (id === null) continue;
    entries.push([id, textOf(ns)]);
    const canonical = attr(ns.attrs, 'canonical');
    if (canonical) aliases.push([canonical, id]);
  }

  const aliasSection = firstElement(xml, 'namespacealiases');
  for (const ns of aliasSection ? scanElements(aliasSection.inner, 'ns') : []) {
    const id = intAttr(ns.attrs, 'id');
    if (id !== null) aliases.push([textOf(ns), id]);
  }

  if (entries.length === 0) {
    throw new ProtocolError('Site info carried no namespaces', xml);
  }
  return new NamespaceTable(entries, aliases);
}

/** Largest replication lag reported by `siprop=dbrepllag`, in seconds */
export function decodeLag(xml: string): number {
  let max = 0;
  for (const db of scanElements(xml, 'db')) {
    const lag = Number(attr(db.attrs, 'lag'));
    if (Number.isFinite(lag) && lag > max) max = lag;
  }
  return max;
}

// ============================================================================
// Envelope
// ============================================================================

export interface ApiErrorMarker {
  code: string;
  info: string;
}

export function decodeError(xml: string): ApiErrorMarker | null {
  const error = firstElement(xml, 'error');
  if (!error) return null;
  return {
    code: attr(error.attrs, 'code') ?? '',
    info: attr(error.attrs, 'info') ?? '',
  };
}

/**
 * Parameters to send with the next request of a paginated query,
 * or null when `param` is no longer being continued
 */
export function decodeContinuation(xml: string, param: string): Record<string, string> | null {
  const modern = firstElement(xml, 'continue');
  if (modern && flag(modern.attrs, param)) {
    return { ...modern.attrs };
  }

  const legacy = firstElement(xml, 'query-continue');
  if (legacy) {
    for (const child of scanElements(legacy.inner)) {
      const value = attr(child.attrs, param);
      if (value !== undefined) return { [param]: value };
    }
  }
  return null;
}

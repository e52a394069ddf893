/**
 * Revision reads
 */

import type { ApiContext } from '../api/context.js';
import { ValidationError } from '../api/errors.js';
import type { HistoryOptions, Revision } from '../api/types.js';
import { normalizeTitle } from '../models/namespace.js';
import { decodePageRevisions, decodeToken } from '../wire/decode.js';
import { firstElement, scanElements, textOf } from '../wire/fragments.js';
import { paginate } from './paginate.js';

/** Revision properties requested for every Revision record */
export const REVISION_PROPS = ['ids', 'timestamp', 'user', 'comment', 'flags', 'size'];

export class RevisionQueries {
  constructor(private readonly ctx: ApiContext) {}

  /**
   * A revision by ID, or null if the server does not know it
   */
  async getRevision(id: number): Promise<Revision | null> {
    const xml = await this.ctx.api.read({
      action: 'query',
      prop: 'revisions',
      rvprop: REVISION_PROPS,
      revids: id,
    });
    if (scanElements(xml, 'badrevids').length > 0) return null;
    return decodePageRevisions(xml)[0] ?? null;
  }

  /**
   * Current revision of a page with a rollback token attached,
   * or null if the page does not exist
   */
  async getTopRevision(title: string): Promise<Revision | null> {
    const xml = await this.ctx.api.read({
      action: 'query',
      prop: 'revisions',
      rvprop: REVISION_PROPS,
      rvlimit: 1,
      meta: 'tokens',
      type: 'rollback',
      titles: normalizeTitle(title),
    });
    const top = decodePageRevisions(xml)[0];
    if (!top) return null;
    const rollbackToken = top.rollbackToken ?? decodeToken(xml, 'rollback');
    return rollbackToken ? { ...top, rollbackToken } : top;
  }

  /** Oldest revision of a page, or null if it does not exist */
  async getFirstRevision(title: string): Promise<Revision | null> {
    const xml = await this.ctx.api.read({
      action: 'query',
      prop: 'revisions',
      rvprop: REVISION_PROPS,
      rvlimit: 1,
      rvdir: 'newer',
      titles: normalizeTitle(title),
    });
    return decodePageRevisions(xml)[0] ?? null;
  }

  /** User who created a page */
  async getPageCreator(title: string): Promise<string | null> {
    return (await this.getFirstRevision(title))?.user ?? null;
  }

  /**
   * Revisions of a page, newest first. `start` is the newest time to
   * include and `end` the oldest.
   */
  async getPageHistory(title: string, options: HistoryOptions = {}): Promise<Revision[]> {
    const { start, end } = options;
    if (start && end && start.getTime() < end.getTime()) {
      throw new ValidationError('History start must not be earlier than its end');
    }
    return paginate(
      this.ctx,
      {
        params: {
          action: 'query',
          prop: 'revisions',
          rvprop: REVISION_PROPS,
          titles: normalizeTitle(title),
          rvstart: start,
          rvend: end,
        },
        continueParam: 'rvcontinue',
        limitParam: 'rvlimit',
        extract: decodePageRevisions,
      },
      options
    );
  }

  /**
   * Wikitext as of a revision, or null if the revision is unknown or its text hidden
   */
  async getRevisionText(id: number): Promise<string | null> {
    const xml = await this.ctx.api.read({
      action: 'query',
      prop: 'revisions',
      rvprop: 'content',
      rvslots: 'main',
      revids: id,
    });
    if (scanElements(xml, 'badrevids').length > 0) return null;
    const rev = firstElement(xml, 'rev');
    if (!rev || Object.hasOwn(rev.attrs, 'texthidden')) return null;
    return textOf(firstElement(rev.inner, 'slot') ?? rev);
  }
}

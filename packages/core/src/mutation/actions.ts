/**
 * Write operations. Each builds a MutationPlan and runs it through the
 * pipeline; local preconditions are checked before the pipeline starts.
 */

import type { ApiContext } from '../api/context.js';
import { PermissionError, ProtocolError, ValidationError } from '../api/errors.js';
import type {
  EditOptions,
  EmailOptions,
  MoveOptions,
  MutationOutcome,
  Revision,
  RollbackOptions,
  UndoOptions,
} from '../api/types.js';
import { Namespace, isTalkNamespace, normalizeTitle } from '../models/namespace.js';
import type { PageQueries } from '../query/pages.js';
import type { RevisionQueries } from '../query/revisions.js';
import type { SiteQueries } from '../query/site.js';
import type { UserQueries } from '../query/users.js';
import { compareRevisions, decodeError, decodeToken, sameRevision } from '../wire/decode.js';
import type { MutationPipeline } from './pipeline.js';

export class Mutations {
  constructor(
    private readonly ctx: ApiContext,
    private readonly pipeline: MutationPipeline,
    private readonly site: SiteQueries,
    private readonly pages: PageQueries,
    private readonly revisions: RevisionQueries,
    private readonly users: UserQueries
  ) {}

  /** True when the logged-in account holds `right` */
  private can(right: string): boolean {
    return this.ctx.session.identity?.isAllowedTo(right) ?? false;
  }

  /**
   * Replace the text of a page (or one section of it)
   */
  async edit(title: string, text: string, summary: string, options: EditOptions = {}): Promise<MutationOutcome> {
    const target = normalizeTitle(title);
    return this.pipeline.run({
      action: 'edit',
      title: target,
      protectedAs: 'edit',
      send: tokens =>
        this.ctx.api.write({
          action: 'edit',
          title: target,
          text,
          summary,
          token: tokens.token,
          minor: options.minor,
          bot: (options.bot ?? true) && this.can('bot'),
          section: options.section,
          sectiontitle: options.section === 'new' ? options.sectionTitle : undefined,
        }),
      success: { element: 'edit', result: 'Success' },
    });
  }

  /**
   * Append a new section with a heading
   */
  async newSection(title: string, heading: string, text: string, options: EditOptions = {}): Promise<MutationOutcome> {
    return this.edit(title, text, heading, { ...options, section: 'new', sectionTitle: heading });
  }

  /**
   * Put text at the top of a page
   */
  async prepend(title: string, text: string, summary?: string, options: EditOptions = {}): Promise<MutationOutcome> {
    const current = (await this.pages.getPageText(title)) ?? '';
    return this.edit(title, text + current, summary ?? `+${text}`, options);
  }

  /**
   * Delete a page. A page that does not exist is left alone.
   */
  async delete(title: string, reason: string): Promise<MutationOutcome> {
    const target = normalizeTitle(title);
    return this.pipeline.run({
      action: 'delete',
      title: target,
      protectedAs: 'edit',
      right: 'delete',
      prepare: async tokens => (tokens.exists ? null : 'page does not exist'),
      send: tokens => this.ctx.api.write({ action: 'delete', title: target, reason, token: tokens.token }),
      success: { element: 'delete' },
    });
  }

  /**
   * Rename a page. Files and categories cannot be moved.
   */
  async move(title: string, newTitle: string, reason: string, options: MoveOptions = {}): Promise<MutationOutcome> {
    const from = normalizeTitle(title);
    const to = normalizeTitle(newTitle);
    const namespace = await this.site.namespace(from);
    if (namespace === Namespace.File || namespace === Namespace.Category) {
      throw new ValidationError(`Cannot move files or categories: ${from}`);
    }
    if (from === to) {
      throw new ValidationError(`Cannot move ${from} onto itself`);
    }

    return this.pipeline.run({
      action: 'move',
      title: from,
      protectedAs: 'move',
      right: 'move',
      prepare: async tokens => {
        if (!tokens.exists) {
          throw new ValidationError(`Cannot move nonexistent page ${from}`);
        }
        return null;
      },
      send: tokens =>
        this.ctx.api.write({
          action: 'move',
          from,
          to,
          reason,
          token: tokens.token,
          movetalk: options.moveTalk && !isTalkNamespace(namespace),
          noredirect: options.noRedirect && this.can('suppressredirect'),
          movesubpages: options.moveSubpages && this.can('move-subpages'),
        }),
      success: { element: 'move' },
    });
  }

  /**
   * Revert all consecutive edits by the author of `revision`. Does nothing
   * when `revision` is no longer the page's current revision.
   */
  async rollback(revision: Revision, options: RollbackOptions = {}): Promise<MutationOutcome> {
    const { title, user } = revision;
    if (!title) {
      throw new ValidationError(`Revision ${revision.id} has no title`);
    }
    if (!user) {
      throw new ValidationError(`Revision ${revision.id} has a hidden author and cannot be rolled back`);
    }

    let rollbackToken: string | undefined;
    return this.pipeline.run({
      action: 'rollback',
      title,
      protectedAs: 'edit',
      right: 'rollback',
      prepare: async () => {
        const top = await this.revisions.getTopRevision(title);
        if (!top || !sameRevision(top, revision)) {
          return `revision ${revision.id} is not the current revision`;
        }
        if (!top.rollbackToken) {
          throw new PermissionError(`No rollback token issued for ${title}`, 'missing-right', title);
        }
        rollbackToken = top.rollbackToken;
        return null;
      },
      send: () =>
        this.ctx.api.write({
          action: 'rollback',
          title,
          user,
          token: rollbackToken,
          summary: options.reason,
          markbot: options.bot && this.can('markbotedits'),
        }),
      success: { element: 'rollback' },
      ignorable: ['alreadyrolled', 'onlyauthor'],
    });
  }

  /**
   * Undo one revision, or every revision from `oldest` to `newest` inclusive.
   * Both must belong to the same page.
   */
  async undo(newest: Revision, oldest?: Revision, options: UndoOptions = {}): Promise<MutationOutcome> {
    const title = newest.title;
    if (!title) {
      throw new ValidationError(`Revision ${newest.id} has no title`);
    }

    let undoAfter: number | undefined;
    if (oldest && !sameRevision(oldest, newest)) {
      if (oldest.title !== title) {
        throw new ValidationError(
          `Cannot undo across pages: ${oldest.id} is on ${oldest.title ?? 'an unknown page'}, ${newest.id} is on ${title}`
        );
      }
      if (compareRevisions(oldest, newest) > 0) {
        throw new ValidationError(`Revision ${oldest.id} is newer than ${newest.id}`);
      }
      if (!oldest.parentId) {
        throw new ValidationError(`Revision ${oldest.id} created the page and cannot be undone`);
      }
      undoAfter = oldest.parentId;
    }

    return this.pipeline.run({
      action: 'undo',
      title,
      protectedAs: 'edit',
      send: tokens =>
        this.ctx.api.write({
          action: 'edit',
          title,
          undo: newest.id,
          undoafter: undoAfter,
          summary: options.reason,
          minor: options.minor,
          bot: (options.bot ?? true) && this.can('bot'),
          token: tokens.token,
        }),
      success: { element: 'edit', result: 'Success' },
    });
  }

  /**
   * Upload a file. Never retried.
   */
  async upload(data: Uint8Array, filename: string, description: string, reason = ''): Promise<MutationOutcome> {
    const table = await this.site.namespaces();
    const name = table.stripNamespace(filename);
    if (!name) {
      throw new ValidationError('Upload needs a file name');
    }
    const title = table.inNamespace(Namespace.File, name);

    return this.pipeline.run({
      action: 'upload',
      title,
      protectedAs: 'upload',
      right: 'upload',
      retry: false,
      send: tokens => {
        const form = new FormData();
        form.append('action', 'upload');
        form.append('filename', name);
        form.append('text', description);
        if (reason) form.append('comment', reason);
        form.append('ignorewarnings', '1');
        form.append('token', tokens.token);
        form.append('file', new Blob([data], { type: 'application/octet-stream' }), name);
        return this.ctx.api.writeForm({}, form);
      },
      success: { element: 'upload', result: 'Success' },
    });
  }

  /**
   * Send an e-mail through the wiki. A user who does not accept e-mail is skipped.
   */
  async emailUser(user: string, subject: string, message: string, options: EmailOptions = {}): Promise<MutationOutcome> {
    const name = normalizeTitle(user);
    const table = await this.site.namespaces();
    return this.pipeline.run({
      action: 'emailuser',
      title: table.inNamespace(Namespace.User, name),
      protectedAs: null,
      right: 'sendemail',
      prepare: async () => {
        const info = await this.users.getUserInfo(name);
        return info.emailable ? null : `${name} does not accept e-mail`;
      },
      send: tokens =>
        this.ctx.api.write({
          action: 'emailuser',
          target: name,
          subject,
          text: message,
          ccme: options.ccMe,
          token: tokens.token,
        }),
      success: { element: 'emailuser', result: 'Success' },
    });
  }

  /**
   * Clear the server's rendering cache for pages
   */
  async purge(...titles: string[]): Promise<void> {
    this.requireLogin('purge');
    await this.ctx.session.exclusive(async () => {
      const xml = await this.ctx.api.write({ action: 'purge', titles: titles.map(normalizeTitle) });
      throwIfError(xml, 'purge');
      this.ctx.logger.info(`Purged ${titles.length} page(s)`);
    });
  }

  async watch(...titles: string[]): Promise<void> {
    await this.setWatched(titles, true);
  }

  async unwatch(...titles: string[]): Promise<void> {
    await this.setWatched(titles, false);
  }

  private async setWatched(titles: string[], watched: boolean): Promise<void> {
    const action = watched ? 'watch' : 'unwatch';
    this.requireLogin(action);
    const normalized = titles.map(normalizeTitle);
    const table = await this.site.namespaces();

    await this.ctx.session.exclusive(async () => {
      const tokenXml = await this.ctx.api.read(
        { action: 'query', meta: 'tokens', type: 'watch' },
        { harvest: 'refresh-write' }
      );
      const token = decodeToken(tokenXml, 'watch');
      if (!token) {
        throw new ProtocolError('No watch token returned', tokenXml);
      }

      const xml = await this.ctx.api.write({
        action: 'watch',
        titles: normalized,
        unwatch: !watched,
        token,
      });
      throwIfError(xml, action);

      const { session } = this.ctx;
      if (session.watchlist) {
        const subjects = normalized.filter(title => !isTalkNamespace(table.namespaceOf(title)));
        session.watchlist = watched
          ? [...session.watchlist, ...subjects.filter(title => !session.watchlist?.includes(title))]
          : session.watchlist.filter(title => !subjects.includes(title));
      }
      this.ctx.logger.info(`${watched ? 'Watched' : 'Unwatched'} ${normalized.length} page(s)`);
    });
  }

  private requireLogin(action: string): void {
    if (!this.ctx.session.identity) {
      throw new ValidationError(`${action} needs a logged-in session`);
    }
  }
}

function throwIfError(xml: string, action: string): void {
  const error = decodeError(xml);
  if (error) {
    throw new ProtocolError(`${action} failed: ${error.code}: ${error.info}`, xml, error.code);
  }
}

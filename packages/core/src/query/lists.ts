/**
 * List queries: backlinks, category members, logs, recent changes,
 * searches and the watchlist. All go through the pagination engine.
 */

import type { ApiContext } from '../api/context.js';
import { ValidationError } from '../api/errors.js';
import type {
  ExternalLink,
  InterwikiBacklink,
  ListOptions,
  ListPagesOptions,
  LogEntry,
  LogQuery,
  RecentChangesOptions,
  Revision,
  SearchHit,
} from '../api/types.js';
import { Namespace, isTalkNamespace, normalizeTitle } from '../models/namespace.js';
import { attr, decodeLogEntry, decodeRevision, intAttr } from '../wire/decode.js';
import { decodeEntities } from '../wire/fragments.js';
import { elementsOf, paginate } from './paginate.js';
import { titlesOf } from './pages.js';
import type { SiteQueries } from './site.js';

const RC_PROPS = ['title', 'ids', 'user', 'timestamp', 'flags', 'comment', 'sizes'];

/** Strip the highlighting markup from a search snippet */
function cleanSnippet(snippet: string): string {
  return decodeEntities(snippet.replace(/<\/?span[^>]*>/g, ''));
}

export class ListQueries {
  constructor(
    private readonly ctx: ApiContext,
    private readonly site: SiteQueries
  ) {}

  /**
   * Pages in a category. `name` may be given with or without its namespace prefix.
   */
  async getCategoryMembers(name: string, options: ListOptions & { namespace?: number } = {}): Promise<string[]> {
    const table = await this.site.namespaces();
    const title =
      table.namespaceOf(name) === Namespace.Category
        ? normalizeTitle(name)
        : table.inNamespace(Namespace.Category, normalizeTitle(name));
    return paginate(
      this.ctx,
      {
        params: {
          action: 'query',
          list: 'categorymembers',
          cmprop: 'title',
          cmtitle: title,
          cmnamespace: options.namespace,
        },
        continueParam: 'cmcontinue',
        limitParam: 'cmlimit',
        extract: titlesOf('cm'),
      },
      options
    );
  }

  /**
   * Pages linking to a title; `redirects` limits the result to redirects
   */
  async whatLinksHere(
    title: string,
    options: ListOptions & { namespace?: number; redirects?: boolean } = {}
  ): Promise<string[]> {
    return paginate(
      this.ctx,
      {
        params: {
          action: 'query',
          list: 'backlinks',
          bltitle: normalizeTitle(title),
          blnamespace: options.namespace,
          blfilterredir: options.redirects ? 'redirects' : undefined,
        },
        continueParam: 'blcontinue',
        limitParam: 'bllimit',
        extract: titlesOf('bl'),
      },
      options
    );
  }

  /** Pages transcluding a title */
  async whatTranscludesHere(title: string, options: ListOptions & { namespace?: number } = {}): Promise<string[]> {
    return paginate(
      this.ctx,
      {
        params: {
          action: 'query',
          list: 'embeddedin',
          eititle: normalizeTitle(title),
          einamespace: options.namespace,
        },
        continueParam: 'eicontinue',
        limitParam: 'eilimit',
        extract: titlesOf('ei'),
      },
      options
    );
  }

  /** Pages using a file. `file` may omit its namespace prefix. */
  async imageUsage(file: string, options: ListOptions & { namespace?: number } = {}): Promise<string[]> {
    const table = await this.site.namespaces();
    const title =
      table.namespaceOf(file) === Namespace.File
        ? normalizeTitle(file)
        : table.inNamespace(Namespace.File, normalizeTitle(file));
    return paginate(
      this.ctx,
      {
        params: { action: 'query', list: 'imageusage', iutitle: title, iunamespace: options.namespace },
        continueParam: 'iucontinue',
        limitParam: 'iulimit',
        extract: titlesOf('iu'),
      },
      options
    );
  }

  /**
   * Subject pages on the logged-in account's watchlist. Cached on the
   * session until `refresh` is passed or the watchlist is changed.
   */
  async getRawWatchlist(refresh = false): Promise<string[]> {
    const { session } = this.ctx;
    if (!session.identity) {
      throw new ValidationError('The watchlist needs a logged-in session');
    }
    if (session.watchlist && !refresh) {
      return [...session.watchlist];
    }

    const watchlist = await paginate(this.ctx, {
      params: { action: 'query', list: 'watchlistraw' },
      continueParam: 'wrcontinue',
      limitParam: 'wrlimit',
      extract: elementsOf('wr', wr => {
        const ns = intAttr(wr.attrs, 'ns') ?? Namespace.Main;
        return isTalkNamespace(ns) ? null : attr(wr.attrs, 'title') ?? null;
      }),
    });
    session.watchlist = watchlist;
    return [...watchlist];
  }

  async isWatched(title: string): Promise<boolean> {
    const watchlist = await this.getRawWatchlist();
    return watchlist.includes(normalizeTitle(title));
  }

  /**
   * Log entries, newest first. `start` is the newest time and `end` the oldest.
   */
  async getLogEntries(query: LogQuery = {}): Promise<LogEntry[]> {
    const { start, end, namespace } = query;
    if (start && end && start.getTime() < end.getTime()) {
      throw new ValidationError('Log start must not be earlier than its end');
    }
    return paginate(
      this.ctx,
      {
        params: {
          action: 'query',
          list: 'logevents',
          leprop: ['ids', 'title', 'type', 'user', 'timestamp', 'comment', 'details'],
          letype: query.type,
          leuser: query.user,
          letitle: query.target ? normalizeTitle(query.target) : undefined,
          lestart: start,
          leend: end,
        },
        continueParam: 'lecontinue',
        limitParam: 'lelimit',
        extract: elementsOf('item', item => {
          if (namespace !== undefined && intAttr(item.attrs, 'ns') !== namespace) return null;
          return decodeLogEntry(item);
        }),
      },
      query
    );
  }

  /**
   * Recent changes, newest first, in the main namespace unless others are given
   */
  async recentChanges(options: RecentChangesOptions = {}): Promise<Revision[]> {
    return this.queryRecentChanges(options, false);
  }

  /** Page creations from recent changes, newest first */
  async newPages(options: RecentChangesOptions = {}): Promise<Revision[]> {
    return this.queryRecentChanges(options, true);
  }

  /**
   * Pages linking to external URLs matching `pattern` (`*.example.org`)
   */
  async linksearch(
    pattern: string,
    options: ListOptions & { namespace?: number; protocol?: string } = {}
  ): Promise<ExternalLink[]> {
    return paginate(
      this.ctx,
      {
        params: {
          action: 'query',
          list: 'exturlusage',
          euprop: ['title', 'url'],
          euquery: pattern,
          euprotocol: options.protocol ?? 'http',
          eunamespace: options.namespace,
        },
        continueParam: 'euoffset',
        limitParam: 'eulimit',
        extract: elementsOf('eu', eu => {
          const title = attr(eu.attrs, 'title');
          const url = attr(eu.attrs, 'url');
          return title && url ? { title, url } : null;
        }),
      },
      options
    );
  }

  /**
   * Local pages linking to another wiki through an interwiki prefix,
   * optionally to one title there
   */
  async getInterWikiBacklinks(prefix: string, title?: string, options: ListOptions = {}): Promise<InterwikiBacklink[]> {
    if (!prefix && title) {
      throw new ValidationError('An interwiki title needs a prefix');
    }
    return paginate(
      this.ctx,
      {
        params: {
          action: 'query',
          list: 'iwbacklinks',
          iwblprefix: prefix,
          iwbltitle: title,
          iwblprop: ['iwtitle', 'iwprefix'],
        },
        continueParam: 'iwblcontinue',
        limitParam: 'iwbllimit',
        extract: elementsOf('iw', iw => {
          const page = attr(iw.attrs, 'title');
          if (!page) return null;
          return {
            title: page,
            prefix: attr(iw.attrs, 'iwprefix') ?? prefix,
            target: attr(iw.attrs, 'iwtitle') ?? '',
          };
        }),
      },
      options
    );
  }

  /**
   * Full-text search; the main namespace unless others are given
   */
  async search(text: string, namespaces: readonly number[] = [], options: ListOptions = {}): Promise<SearchHit[]> {
    if (!text.trim()) {
      throw new ValidationError('Search text must not be empty');
    }
    return paginate(
      this.ctx,
      {
        params: {
          action: 'query',
          list: 'search',
          srsearch: text,
          srwhat: 'text',
          srprop: ['snippet', 'sectiontitle'],
          srnamespace: namespaces.length > 0 ? namespaces : Namespace.Main,
        },
        continueParam: 'sroffset',
        limitParam: 'srlimit',
        extract: elementsOf('p', p => {
          const title = attr(p.attrs, 'title');
          if (!title) return null;
          return {
            title,
            snippet: cleanSnippet(attr(p.attrs, 'snippet') ?? ''),
            sectionTitle: attr(p.attrs, 'sectiontitle') ?? null,
          };
        }),
      },
      options
    );
  }

  /** Pages whose full title starts with `prefix` */
  async prefixIndex(prefix: string, options: ListOptions = {}): Promise<string[]> {
    return this.listPages({ ...options, prefix });
  }

  /**
   * All pages in a namespace, optionally by title prefix, protection and size
   */
  async listPages(options: ListPagesOptions = {}): Promise<string[]> {
    let namespace = options.namespace ?? Namespace.Main;
    let prefix = options.prefix ? normalizeTitle(options.prefix) : undefined;
    if (prefix) {
      const table = await this.site.namespaces();
      const prefixNamespace = table.namespaceOf(prefix);
      if (prefixNamespace !== Namespace.Main) {
        namespace = prefixNamespace;
        prefix = table.stripNamespace(prefix) || undefined;
      }
    }

    return paginate(
      this.ctx,
      {
        params: {
          action: 'query',
          list: 'allpages',
          apprefix: prefix,
          apnamespace: namespace,
          ...protectionFilter(options.protection),
          apminsize: options.minimum,
          apmaxsize: options.maximum,
        },
        continueParam: 'apcontinue',
        limitParam: 'aplimit',
        extract: titlesOf('p'),
      },
      options
    );
  }

  private queryRecentChanges(options: RecentChangesOptions, newPagesOnly: boolean): Promise<Revision[]> {
    const hide = options.hide ?? [];
    return paginate(
      this.ctx,
      {
        params: {
          action: 'query',
          list: 'recentchanges',
          rcprop: RC_PROPS,
          rcnamespace: options.namespace ?? Namespace.Main,
          rctype: newPagesOnly ? 'new' : undefined,
          rcshow: hide.length > 0 ? hide.map(option => `!${option}`) : undefined,
        },
        continueParam: 'rccontinue',
        limitParam: 'rclimit',
        extract: elementsOf('rc', rc => decodeRevision(rc)),
      },
      options
    );
  }
}

function protectionFilter(level: ListPagesOptions['protection']): { apprtype?: string; apprlevel?: string } {
  switch (level) {
    case undefined:
    case 'none':
      return {};
    case 'semi':
      return { apprtype: 'edit', apprlevel: 'autoconfirmed' };
    case 'full':
      return { apprtype: 'edit', apprlevel: 'sysop' };
    case 'move-only':
      return { apprtype: 'move', apprlevel: 'sysop' };
    case 'upload-protected':
      return { apprtype: 'upload', apprlevel: 'sysop' };
    default:
      throw new ValidationError(`Cannot list pages by protection level ${level}`);
  }
}

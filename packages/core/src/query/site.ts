/**
 * Site-wide reads: site info, namespaces, statistics, parsing
 */

import type { ApiContext } from '../api/context.js';
import { ProtocolError, ValidationError } from '../api/errors.js';
import type { SiteInfo, SiteStatistics } from '../api/types.js';
import { Namespace, NamespaceTable, isTalkNamespace } from '../models/namespace.js';
import { attr, decodeNamespaces, intAttr } from '../wire/decode.js';
import { firstElement, textOf } from '../wire/fragments.js';

export class SiteQueries {
  constructor(private readonly ctx: ApiContext) {}

  /**
   * General site information. Also refreshes the namespace cache.
   */
  async getSiteInfo(): Promise<SiteInfo> {
    const xml = await this.ctx.api.read({
      action: 'query',
      meta: 'siteinfo',
      siprop: ['general', 'namespaces', 'namespacealiases'],
    });
    this.ctx.session.namespaces = decodeNamespaces(xml);

    const general = firstElement(xml, 'general');
    if (!general) {
      throw new ProtocolError('Site info without a general section', xml);
    }
    const a = general.attrs;
    return {
      siteName: attr(a, 'sitename') ?? '',
      mainPage: attr(a, 'mainpage') ?? '',
      base: attr(a, 'base') ?? '',
      generator: attr(a, 'generator') ?? '',
      language: attr(a, 'lang') ?? '',
      timezone: attr(a, 'timezone') ?? 'UTC',
    };
  }

  /** MediaWiki version string */
  async version(): Promise<string> {
    return (await this.getSiteInfo()).generator;
  }

  /**
   * Re-read the namespace names into the session cache
   */
  async refreshNamespaces(): Promise<NamespaceTable> {
    const xml = await this.ctx.api.read({
      action: 'query',
      meta: 'siteinfo',
      siprop: ['namespaces', 'namespacealiases'],
    });
    const table = decodeNamespaces(xml);
    this.ctx.session.namespaces = table;
    this.ctx.logger.debug(`Cached ${table.size} namespaces`);
    return table;
  }

  /** Cached namespace table, fetched on first use */
  async namespaces(): Promise<NamespaceTable> {
    return this.ctx.session.namespaces ?? this.refreshNamespaces();
  }

  /** Namespace ID of a title */
  async namespace(title: string): Promise<number> {
    return (await this.namespaces()).namespaceOf(title);
  }

  /** Local name of a namespace ID ('' for the main namespace) */
  async namespaceIdentifier(id: number): Promise<string> {
    const name = (await this.namespaces()).nameOf(id);
    if (name === undefined) {
      throw new ValidationError(`Unknown namespace: ${id}`);
    }
    return name;
  }

  /**
   * Title of the talk page belonging to a subject page
   */
  async getTalkPage(title: string): Promise<string> {
    const table = await this.namespaces();
    const ns = table.namespaceOf(title);
    if (ns < 0) {
      throw new ValidationError(`Special and media pages have no talk page: ${title}`);
    }
    if (isTalkNamespace(ns)) {
      throw new ValidationError(`Already a talk page: ${title}`);
    }
    return table.inNamespace(ns + 1, table.stripNamespace(title));
  }

  async getSiteStatistics(): Promise<SiteStatistics> {
    const xml = await this.ctx.api.read({ action: 'query', meta: 'siteinfo', siprop: 'statistics' });
    const stats = firstElement(xml, 'statistics');
    if (!stats) {
      throw new ProtocolError('Site info without statistics', xml);
    }
    const count = (name: string): number => intAttr(stats.attrs, name) ?? 0;
    return {
      pages: count('pages'),
      articles: count('articles'),
      edits: count('edits'),
      images: count('images'),
      users: count('users'),
      activeUsers: count('activeusers'),
      admins: count('admins'),
    };
  }

  /**
   * Render wikitext to HTML
   */
  async parse(markup: string, title?: string): Promise<string> {
    const xml = await this.ctx.api.read(
      { action: 'parse', prop: 'text', contentmodel: 'wikitext', text: markup, title },
      { post: true }
    );
    return parsedText(xml);
  }

  /**
   * Title of a random page, from the main namespace unless others are given
   */
  async random(namespaces: readonly number[] = [Namespace.Main]): Promise<string> {
    const xml = await this.ctx.api.read({
      action: 'query',
      list: 'random',
      rnnamespace: namespaces,
      rnlimit: 1,
    });
    const page = firstElement(firstElement(xml, 'random')?.inner ?? '', 'page');
    const title = page ? attr(page.attrs, 'title') : undefined;
    if (!title) {
      throw new ProtocolError('Random page query returned nothing', xml);
    }
    return title;
  }
}

/** HTML body of an `action=parse` response */
export function parsedText(xml: string): string {
  const text = firstElement(firstElement(xml, 'parse')?.inner ?? '', 'text');
  if (!text) {
    throw new ProtocolError('Parse result without text', xml);
  }
  return textOf(text);
}

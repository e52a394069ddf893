/**
 * Page reads: token bundles, existence, text, and per-page link lists
 */

import type { ApiContext } from '../api/context.js';
import { ValidationError } from '../api/errors.js';
import type { ListOptions, PageTokens, ProtectionLevel, RequestParams } from '../api/types.js';
import { normalizeTitle } from '../models/namespace.js';
import { attr, decodePageTokens, flag } from '../wire/decode.js';
import { firstElement, scanElements, textOf } from '../wire/fragments.js';
import { elementsOf, paginate } from './paginate.js';
import { parsedText, type SiteQueries } from './site.js';

/** Titles per request when checking existence */
const TITLE_BATCH = 50;

/** Extractor for elements that carry just a title */
export function titlesOf(tag: string): (xml: string) => string[] {
  return elementsOf(tag, fragment => attr(fragment.attrs, 'title') ?? null);
}

/** Content of the first revision in a response, or null for a missing page */
function revisionContent(xml: string): string | null {
  const page = firstElement(xml, 'page');
  if (!page || flag(page.attrs, 'missing')) return null;
  const rev = firstElement(page.inner, 'rev');
  if (!rev) return null;
  const slot = firstElement(rev.inner, 'slot');
  return textOf(slot ?? rev);
}

/** Request for a page's info, protection and CSRF token */
export function pageTokenParams(title: string): RequestParams {
  return {
    action: 'query',
    prop: 'info',
    inprop: 'protection',
    meta: 'tokens',
    type: 'csrf',
    titles: normalizeTitle(title),
  };
}

export class PageQueries {
  constructor(
    private readonly ctx: ApiContext,
    private readonly site: SiteQueries
  ) {}

  /**
   * Existence, protection and an edit token for a page. Session cookies are
   * left as they are; mutations fetch their own tokens.
   */
  async getPageInfo(title: string): Promise<PageTokens> {
    const xml = await this.ctx.api.read(pageTokenParams(title));
    return decodePageTokens(xml, title);
  }

  /**
   * Protection level of a page; cascading protection reads as full
   */
  async getProtectionLevel(title: string): Promise<ProtectionLevel> {
    const info = await this.getPageInfo(title);
    return info.cascade ? 'full' : info.protection;
  }

  /**
   * Whether each title exists, in the order given
   */
  async exists(...titles: string[]): Promise<boolean[]> {
    const found = new Map<string, boolean>();

    for (let i = 0; i < titles.length; i += TITLE_BATCH) {
      const batch = titles.slice(i, i + TITLE_BATCH).map(normalizeTitle);
      const xml = await this.ctx.api.read({ action: 'query', prop: 'info', titles: batch });

      const renamed = new Map<string, string>();
      for (const n of scanElements(xml, 'n')) {
        const from = attr(n.attrs, 'from');
        const to = attr(n.attrs, 'to');
        if (from && to) renamed.set(to, from);
      }
      for (const page of scanElements(xml, 'page')) {
        const title = attr(page.attrs, 'title');
        if (!title) continue;
        const exists = !flag(page.attrs, 'missing') && !flag(page.attrs, 'invalid');
        found.set(title, exists);
        const original = renamed.get(title);
        if (original) found.set(original, exists);
      }
    }

    return titles.map(title => found.get(normalizeTitle(title)) ?? false);
  }

  /**
   * Current wikitext of a page, or null if it does not exist
   */
  async getPageText(title: string): Promise<string | null> {
    await this.rejectVirtual(title);
    const xml = await this.ctx.api.read({
      action: 'query',
      prop: 'revisions',
      rvprop: 'content',
      rvslots: 'main',
      titles: normalizeTitle(title),
    });
    return revisionContent(xml);
  }

  /**
   * Wikitext of one section (0 is the lead)
   */
  async getSectionText(title: string, section: number): Promise<string | null> {
    if (!Number.isInteger(section) || section < 0) {
      throw new ValidationError(`Section number must be a non-negative integer, got ${section}`);
    }
    await this.rejectVirtual(title);
    const xml = await this.ctx.api.read({
      action: 'query',
      prop: 'revisions',
      rvprop: 'content',
      rvslots: 'main',
      rvsection: section,
      titles: normalizeTitle(title),
    });
    return revisionContent(xml);
  }

  /**
   * Rendered HTML of a page
   */
  async getRenderedText(title: string): Promise<string> {
    const xml = await this.ctx.api.read({ action: 'parse', prop: 'text', page: normalizeTitle(title) });
    return parsedText(xml);
  }

  async getCategories(title: string, options: ListOptions = {}): Promise<string[]> {
    return paginate(
      this.ctx,
      {
        params: { action: 'query', prop: 'categories', titles: normalizeTitle(title) },
        continueParam: 'clcontinue',
        limitParam: 'cllimit',
        extract: titlesOf('cl'),
      },
      options
    );
  }

  async getTemplates(title: string, options: ListOptions & { namespace?: number } = {}): Promise<string[]> {
    return paginate(
      this.ctx,
      {
        params: {
          action: 'query',
          prop: 'templates',
          titles: normalizeTitle(title),
          tlnamespace: options.namespace,
        },
        continueParam: 'tlcontinue',
        limitParam: 'tllimit',
        extract: titlesOf('tl'),
      },
      options
    );
  }

  async getLinksOnPage(title: string, options: ListOptions = {}): Promise<string[]> {
    return paginate(
      this.ctx,
      {
        params: { action: 'query', prop: 'links', titles: normalizeTitle(title) },
        continueParam: 'plcontinue',
        limitParam: 'pllimit',
        extract: titlesOf('pl'),
      },
      options
    );
  }

  async getImagesOnPage(title: string, options: ListOptions = {}): Promise<string[]> {
    return paginate(
      this.ctx,
      {
        params: { action: 'query', prop: 'images', titles: normalizeTitle(title) },
        continueParam: 'imcontinue',
        limitParam: 'imlimit',
        extract: titlesOf('im'),
      },
      options
    );
  }

  /** Special: and Media: pages have no stored text */
  private async rejectVirtual(title: string): Promise<void> {
    if ((await this.site.namespace(title)) < 0) {
      throw new ValidationError(`Cannot retrieve Special: or Media: pages: ${title}`);
    }
  }
}

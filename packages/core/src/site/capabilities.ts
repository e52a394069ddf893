/**
 * Site capability sets
 *
 * A client talks to one site through a SiteCapabilities value. Site families
 * with extra behaviour (the Wikimedia farm's site matrix) provide another
 * implementation of the same interface rather than a client subclass.
 */

import type { ApiContext } from '../api/context.js';
import { ValidationError } from '../api/errors.js';
import type { SiteEntry } from '../api/types.js';
import { elementsOf, paginate } from '../query/paginate.js';
import { attr, flag } from '../wire/decode.js';

export interface SiteCapabilities {
  readonly family: 'mediawiki' | 'wikimedia';
  readonly domain: string;
  readonly scriptPath: string;
  readonly protocol: 'http' | 'https';
  readonly apiUrl: string;
  readonly indexUrl: string;
  /** Every wiki reachable through this site's family */
  listSites(ctx: ApiContext): Promise<SiteEntry[]>;
}

function validateDomain(domain: string): void {
  if (!domain || /[\s/]/.test(domain)) {
    throw new ValidationError(`Invalid site domain: "${domain}"`);
  }
}

/**
 * A single stand-alone wiki
 */
export function standardCapabilities(
  domain: string,
  scriptPath = '/w',
  protocol: 'http' | 'https' = 'https'
): SiteCapabilities {
  validateDomain(domain);
  const base = `${protocol}://${domain}${scriptPath}`;
  return {
    family: 'mediawiki',
    domain,
    scriptPath,
    protocol,
    apiUrl: `${base}/api.php`,
    indexUrl: `${base}/index.php`,
    listSites: async () => [{ dbName: domain, url: `${protocol}://${domain}`, code: domain }],
  };
}

const SPECIAL_DATABASES: Record<string, string> = {
  commonswiki: 'commons.wikimedia.org',
  metawiki: 'meta.wikimedia.org',
  specieswiki: 'species.wikimedia.org',
  wikidatawiki: 'www.wikidata.org',
  mediawikiwiki: 'www.mediawiki.org',
};

/** Project suffixes, longest first so `wiki` is tried last */
const PROJECT_SUFFIXES: Array<[string, string]> = [
  ['wikiversity', 'wikiversity.org'],
  ['wiktionary', 'wiktionary.org'],
  ['wikivoyage', 'wikivoyage.org'],
  ['wikisource', 'wikisource.org'],
  ['wikibooks', 'wikibooks.org'],
  ['wikiquote', 'wikiquote.org'],
  ['wikinews', 'wikinews.org'],
  ['wiki', 'wikipedia.org'],
];

/**
 * Domain of a Wikimedia database name: `enwiki` → `en.wikipedia.org`,
 * `zh_min_nanwiktionary` → `zh-min-nan.wiktionary.org`
 */
export function dbNameToDomain(dbName: string): string {
  const special = SPECIAL_DATABASES[dbName];
  if (special) return special;

  for (const [suffix, project] of PROJECT_SUFFIXES) {
    if (dbName.endsWith(suffix) && dbName.length > suffix.length) {
      const language = dbName.slice(0, -suffix.length).replace(/_/g, '-');
      return `${language}.${project}`;
    }
  }
  throw new ValidationError(`Unrecognized database name: ${dbName}`);
}

/**
 * A wiki in the Wikimedia farm; `listSites` reads the site matrix and skips
 * closed, private and fishbowl wikis.
 */
export function wikimediaCapabilities(domain: string): SiteCapabilities {
  const base = standardCapabilities(domain, '/w', 'https');
  return {
    ...base,
    family: 'wikimedia',
    listSites: (ctx: ApiContext) =>
      paginate(ctx, {
        params: { action: 'sitematrix', smtype: ['language', 'special'] },
        continueParam: 'smcontinue',
        limitParam: 'smlimit',
        extract: xml => [
          ...elementsOf('site', decodeSite)(xml),
          ...elementsOf('special', decodeSite)(xml),
        ],
      }),
  };
}

function decodeSite(fragment: { attrs: Record<string, string> }): SiteEntry | null {
  const { attrs } = fragment;
  const dbName = attr(attrs, 'dbname');
  const url = attr(attrs, 'url');
  if (!dbName || !url) return null;
  if (flag(attrs, 'closed') || flag(attrs, 'private') || flag(attrs, 'fishbowl')) return null;
  return { dbName, url, code: attr(attrs, 'code') ?? '' };
}

/**
 * Continuation-token pagination
 *
 * A paginated query is a request template plus the name of the parameter the
 * server continues it with. Pages are fetched until the server stops
 * returning a continuation or the caller has enough results; a page is
 * always requested whole and trimmed locally.
 */

import type { ApiContext } from '../api/context.js';
import { ProtocolError, ValidationError } from '../api/errors.js';
import type { ListOptions, RequestParams } from '../api/types.js';
import { scanElements, firstElement, type Fragment } from '../wire/fragments.js';
import { decodeContinuation } from '../wire/decode.js';

export interface PaginatedQuery<T> {
  params: RequestParams;
  /** Parameter the server continues the query with, e.g. `uccontinue` */
  continueParam: string;
  /** Parameter carrying the page size, e.g. `uclimit` */
  limitParam: string;
  /** Results of one page, in server order */
  extract: (xml: string) => T[];
}

/**
 * Extractor for queries whose results are one element each.
 * A decoder returning null drops that element.
 */
export function elementsOf<T>(tag: string, decode: (fragment: Fragment) => T | null): (xml: string) => T[] {
  return (xml: string) => {
    const body = firstElement(xml, 'query')?.inner ?? xml;
    const results: T[] = [];
    for (const fragment of scanElements(body, tag)) {
      const value = decode(fragment);
      if (value !== null) results.push(value);
    }
    return results;
  };
}

function validateOptions(options: ListOptions): void {
  const { limit, pageSize } = options;
  if (limit !== undefined && limit !== Infinity && (!Number.isInteger(limit) || limit < 1)) {
    throw new ValidationError(`Result limit must be a positive integer, got ${limit}`);
  }
  if (pageSize !== undefined && (!Number.isInteger(pageSize) || pageSize < 1)) {
    throw new ValidationError(`Page size must be a positive integer, got ${pageSize}`);
  }
}

function sameContinuation(a: Record<string, string>, b: Record<string, string>): boolean {
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every(key => a[key] === b[key]);
}

/**
 * Yield the query's results one page at a time
 */
export async function* iteratePages<T>(
  ctx: ApiContext,
  query: PaginatedQuery<T>,
  options: ListOptions = {}
): AsyncGenerator<T[]> {
  validateOptions(options);
  const pageSize = options.pageSize ?? ctx.session.pageSize;
  let continuation: Record<string, string> = {};

  for (;;) {
    const params: RequestParams = {
      ...query.params,
      [query.limitParam]: pageSize,
      ...continuation,
    };
    const xml = await ctx.api.read(params);
    yield query.extract(xml);

    const next = decodeContinuation(xml, query.continueParam);
    if (!next) return;
    if (sameContinuation(next, continuation)) {
      throw new ProtocolError(`Server repeated continuation ${query.continueParam}`, xml);
    }
    continuation = next;
  }
}

/**
 * Collect the query's results, stopping once `options.limit` are gathered
 */
export async function paginate<T>(
  ctx: ApiContext,
  query: PaginatedQuery<T>,
  options: ListOptions = {}
): Promise<T[]> {
  validateOptions(options);
  const limit = options.limit ?? Infinity;
  const results: T[] = [];

  for await (const page of iteratePages(ctx, query, options)) {
    for (const item of page) {
      results.push(item);
      if (results.length >= limit) return results;
    }
  }
  return results;
}

/**
 * HTTP transport for the API endpoint
 *
 * GET for reads, url-encoded or multi-part POST for writes. Two timeouts:
 * `connectTimeoutMs` until response headers arrive, then `readTimeoutMs`
 * for the body.
 */

import { HttpError } from '../api/errors.js';
import type { RequestParams } from '../api/types.js';
import type { Logger } from '../utils/logger.js';
import { encodeParams } from '../wire/params.js';
import type { CookieScope, CookieStore } from './cookies.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/** What to do with cookies the server sets */
export type CookieHarvest = 'none' | 'both' | 'refresh-write';

export interface TransportConfig {
  apiUrl: string;
  userAgent: string;
  compressed: boolean;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  fetch: FetchLike;
  cookies: CookieStore;
  logger: Logger;
}

export interface TransportRequest {
  method: 'GET' | 'POST';
  params: RequestParams;
  /** Multi-part body; `params` then go into the query string */
  form?: FormData;
  /** Cookie jar to send */
  send: CookieScope;
  harvest?: CookieHarvest;
}

export class HttpTransport {
  constructor(private readonly config: TransportConfig) {}

  get apiUrl(): string {
    return this.config.apiUrl;
  }

  /**
   * Send one request and return the response body
   */
  async request(req: TransportRequest): Promise<string> {
    const { config } = this;
    const query = encodeParams(req.params);
    const headers: Record<string, string> = {
      'User-Agent': config.userAgent,
      'Accept-Encoding': config.compressed ? 'gzip' : 'identity',
    };

    const cookieHeader = config.cookies.header(req.send);
    if (cookieHeader) {
      headers['Cookie'] = cookieHeader;
    }

    let url = config.apiUrl;
    let body: string | FormData | undefined;

    if (req.method === 'GET') {
      url = `${url}?${query.toString()}`;
    } else if (req.form) {
      url = `${url}?${query.toString()}`;
      body = req.form;
    } else {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = query.toString();
    }

    config.logger.debug(`${req.method} ${describe(req.params)}`);

    const controller = new AbortController();
    let timeout = setTimeout(() => controller.abort(), config.connectTimeoutMs);

    try {
      const response = await config.fetch(url, {
        method: req.method,
        headers,
        body,
        signal: controller.signal,
      });

      clearTimeout(timeout);
      timeout = setTimeout(() => controller.abort(), config.readTimeoutMs);

      this.harvest(req.harvest ?? 'none', response);

      if (!response.ok) {
        await response.body?.cancel();
        throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status);
      }

      return await response.text();
    } catch (error) {
      if (error instanceof HttpError) throw error;
      if (controller.signal.aborted) {
        throw new HttpError(`Request timed out: ${describe(req.params)}`, 0, true);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new HttpError(`Request failed: ${message}`, 0);
    } finally {
      clearTimeout(timeout);
    }
  }

  private harvest(mode: CookieHarvest, response: Response): void {
    if (mode === 'none') return;
    const setCookies = response.headers.getSetCookie();
    if (mode === 'both') {
      this.config.cookies.store('read', setCookies);
      this.config.cookies.store('write', setCookies);
    } else {
      this.config.cookies.refreshWrite(setCookies);
    }
  }
}

/** Short request description for logs; never includes secrets */
function describe(params: RequestParams): string {
  const parts: string[] = [];
  for (const key of ['action', 'list', 'prop', 'meta', 'title', 'titles']) {
    const value = params[key];
    if (typeof value === 'string' || typeof value === 'number') parts.push(`${key}=${value}`);
  }
  return parts.join(' ');
}

/**
 * Request entry point shared by every operation: waits on the rate governor,
 * then hands the request to the transport.
 */

import type { RateGovernor } from '../session/governor.js';
import type { CookieHarvest, HttpTransport } from '../transport/http.js';
import { decodeError } from '../wire/decode.js';
import { ProtocolError } from './errors.js';
import type { RequestParams } from './types.js';

export interface ReadOptions {
  /** Send as a url-encoded POST (for long parameters); still a read */
  post?: boolean;
  harvest?: CookieHarvest;
}

export class ApiCaller {
  constructor(
    private readonly transport: HttpTransport,
    private readonly governor: RateGovernor
  ) {}

  /**
   * Read request. A server `<error>` is thrown as a ProtocolError.
   */
  async read(params: RequestParams, options: ReadOptions = {}): Promise<string> {
    await this.governor.awaitLag();
    const xml = await this.transport.request({
      method: options.post ? 'POST' : 'GET',
      params,
      send: 'read',
      harvest: options.harvest,
    });

    const error = decodeError(xml);
    if (error) {
      throw new ProtocolError(`${error.code}: ${error.info}`, xml, error.code);
    }
    return xml;
  }

  /**
   * Write request with the write cookie jar. The body is returned unchecked;
   * the caller classifies it.
   */
  async write(params: RequestParams, harvest: CookieHarvest = 'none'): Promise<string> {
    await this.governor.awaitLag();
    return this.transport.request({ method: 'POST', params, send: 'write', harvest });
  }

  /**
   * Multi-part write request (uploads)
   */
  async writeForm(params: RequestParams, form: FormData): Promise<string> {
    await this.governor.awaitLag();
    return this.transport.request({ method: 'POST', params, form, send: 'write' });
  }
}

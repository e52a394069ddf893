/**
 * Session cookie store
 *
 * Reads and writes keep separate jars. Reads send the `read` jar; writes
 * send the `write` jar, which is rebuilt whenever a write token is fetched.
 * Login fills both.
 */

import { Cookie } from 'tough-cookie';

export type CookieScope = 'read' | 'write';

interface ParsedCookie {
  name: string;
  value: string;
  expired: boolean;
}

/**
 * Parse one Set-Cookie header value. A `deleted` value, a non-positive
 * Max-Age or a past Expires marks the cookie for removal.
 */
export function parseSetCookie(header: string): ParsedCookie | null {
  const cookie = Cookie.parse(header);
  if (!cookie) return null;
  return {
    name: cookie.key,
    value: cookie.value,
    expired: cookie.value === 'deleted' || cookie.TTL() <= 0,
  };
}

export class CookieStore {
  private read: Map<string, string> = new Map();
  private write: Map<string, string> = new Map();

  constructor(initial: Record<string, string> = {}) {
    for (const [name, value] of Object.entries(initial)) {
      this.read.set(name, value);
      this.write.set(name, value);
    }
  }

  private jar(scope: CookieScope): Map<string, string> {
    return scope === 'read' ? this.read : this.write;
  }

  /**
   * Build cookie header for a scope
   */
  header(scope: CookieScope): string {
    const parts: string[] = [];
    for (const [key, value] of this.jar(scope)) {
      parts.push(`${key}=${value}`);
    }
    return parts.join('; ');
  }

  /**
   * Merge Set-Cookie values into a scope
   */
  store(scope: CookieScope, setCookies: readonly string[]): void {
    const jar = this.jar(scope);
    for (const header of setCookies) {
      const cookie = parseSetCookie(header);
      if (!cookie) continue;
      if (cookie.expired) {
        jar.delete(cookie.name);
      } else {
        jar.set(cookie.name, cookie.value);
      }
    }
  }

  /**
   * Replace the write jar with the cookies a write-token request returned,
   * then add the read jar on top; read cookies win on conflict.
   */
  refreshWrite(setCookies: readonly string[]): void {
    this.write.clear();
    this.store('write', setCookies);
    for (const [name, value] of this.read) {
      this.write.set(name, value);
    }
  }

  isEmpty(scope: CookieScope): boolean {
    return this.jar(scope).size === 0;
  }

  /** Drop the write jar so no further write can be sent */
  clearWrite(): void {
    this.write.clear();
  }

  clear(): void {
    this.read.clear();
    this.write.clear();
  }

  /** Read cookies, as persisted in a session snapshot */
  toJSON(): Record<string, string> {
    return Object.fromEntries(this.read);
  }
}

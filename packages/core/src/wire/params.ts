/**
 * Request parameter and timestamp encoding
 */

import type { ParamValue, RequestParams } from '../api/types.js';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Compact server timestamp: YYYYMMDDHHMMSS in UTC
 */
export function formatTimestamp(date: Date): string {
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}

/**
 * Parse an ISO-8601 or compact (YYYYMMDDHHMMSS) timestamp.
 * Returns null for anything else.
 */
export function parseTimestamp(value: string | undefined): Date | null {
  if (!value) return null;
  const compact = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/.exec(value);
  if (compact) {
    const [, y, mo, d, h, mi, s] = compact;
    return new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s)));
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * String form of one parameter value, or undefined when it should not be sent
 */
export function encodeParamValue(value: ParamValue): string | undefined {
  if (value === undefined || value === null || value === false) return undefined;
  if (value === true) return '1';
  if (value instanceof Date) return formatTimestamp(value);
  if (typeof value === 'string' || typeof value === 'number') return String(value);
  return value.map(String).join('|');
}

/**
 * Encode request parameters, always asking for XML output
 */
export function encodeParams(params: RequestParams): URLSearchParams {
  const search = new URLSearchParams();
  search.set('format', 'xml');
  for (const [key, value] of Object.entries(params)) {
    const encoded = encodeParamValue(value);
    if (encoded !== undefined) {
      search.set(key, encoded);
    }
  }
  return search;
}

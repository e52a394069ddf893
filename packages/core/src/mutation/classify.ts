/**
 * Classification of mutation responses into success, an ignorable server
 * refusal, or a typed error
 */

import {
  PermissionError,
  ProtocolError,
  SessionError,
  TransientError,
} from '../api/errors.js';
import { decodeError } from '../wire/decode.js';
import { firstElement } from '../wire/fragments.js';

/** Element (and optionally its `result` value) that marks a successful response */
export interface SuccessMarker {
  element: string;
  result?: string;
}

export type Classification = { outcome: 'success' } | { outcome: 'ignored'; code: string };

function matchesMarker(xml: string, marker: SuccessMarker): boolean {
  const element = firstElement(xml, marker.element);
  if (!element) return false;
  return marker.result === undefined || element.attrs.result === marker.result;
}

/**
 * Classify a mutation response. Returns on success or an ignorable error
 * code; throws otherwise. Unrecognized responses are retryable.
 */
export function classifyResponse(
  xml: string,
  action: string,
  marker: SuccessMarker,
  ignorable: readonly string[] = []
): Classification {
  if (!xml.trim()) {
    throw new ProtocolError(`Empty response to ${action}`, xml);
  }

  const error = decodeError(xml);
  if (!error) {
    if (matchesMarker(xml, marker)) return { outcome: 'success' };
    throw new ProtocolError(`Unrecognized response to ${action}`, xml, undefined, true);
  }

  const { code, info } = error;
  if (ignorable.includes(code)) {
    return { outcome: 'ignored', code };
  }

  switch (code) {
    case 'ratelimited':
      throw new TransientError(`Rate limited during ${action}: ${info}`, 'ratelimited');
    case 'readonly':
      throw new TransientError(`Database is read-only: ${info}`, 'readonly');
    case 'cascadeprotected':
      throw new PermissionError(`Cascade protected: ${info}`, 'cascade-protected');
    case 'protectedpage':
    case 'protectedtitle':
    case 'protectednamespace':
      throw new PermissionError(`Protected: ${info}`, 'protected');
    case 'cantsend':
    case 'permissiondenied':
      throw new PermissionError(`Not permitted to ${action}: ${info}`, 'missing-right');
    case 'unknownerror':
      throw new ProtocolError(`Unknown error during ${action}: ${info}`, xml, code);
  }

  if (code === 'autoblocked' || code.startsWith('blocked')) {
    throw new SessionError(`Account blocked: ${info}`, 'blocked');
  }

  throw new ProtocolError(`${action} failed: ${code}: ${info}`, xml, code, true);
}

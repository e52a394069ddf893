/**
 * Versioned session snapshot: everything needed to resume a logged-in
 * session without a new login, as plain JSON-compatible data.
 */

import { z } from 'zod';
import { ValidationError } from '../api/errors.js';

export const SNAPSHOT_VERSION = 1;

export const SiteSnapshotSchema = z.object({
  family: z.enum(['mediawiki', 'wikimedia']),
  domain: z.string(),
  scriptPath: z.string(),
  protocol: z.enum(['http', 'https']),
});

export type SiteSnapshot = z.infer<typeof SiteSnapshotSchema>;

export const SessionSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  site: SiteSnapshotSchema,
  username: z.string().nullable(),
  /** Read cookies; the write jar is rebuilt from them */
  cookies: z.record(z.string()),
  throttleMs: z.number().finite(),
  maxLag: z.number().finite(),
  statusCheckInterval: z.number().finite(),
  assertions: z.array(z.enum(['logged-in', 'bot', 'no-messages'])),
  /** Namespace name → ID, null if never fetched */
  namespaces: z.record(z.number().int()).nullable(),
  userAgent: z.string(),
});

export type SessionSnapshot = z.infer<typeof SessionSnapshotSchema>;

/**
 * Validate parsed JSON as a session snapshot
 */
export function parseSnapshot(data: unknown): SessionSnapshot {
  const result = SessionSnapshotSchema.safeParse(data);
  if (result.success) return result.data;

  const field = result.error.issues[0]?.path.join('.') ?? '';
  if (field === 'version') {
    const version = typeof data === 'object' && data !== null && 'version' in data ? data.version : undefined;
    throw new ValidationError(`Unsupported session snapshot version: ${String(version)}`);
  }
  throw new ValidationError(
    field ? `Invalid session snapshot: bad or missing ${field}` : 'Invalid session snapshot: not an object'
  );
}

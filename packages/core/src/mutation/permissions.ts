/**
 * Protection checks performed before a mutation is sent
 */

import type { ProtectionLevel } from '../api/types.js';

/** What a mutation does to its target, as far as protection is concerned */
export type ProtectedAction = 'edit' | 'move' | 'upload';

export interface Caller {
  loggedIn: boolean;
  admin: boolean;
}

export type PermissionVerdict =
  | { allowed: true }
  | { allowed: false; reason: 'protected' | 'cascade-protected' };

const ALLOWED: PermissionVerdict = { allowed: true };
const PROTECTED: PermissionVerdict = { allowed: false, reason: 'protected' };

/**
 * Whether `caller` may perform `action` on a page with the given protection.
 * Administrators always may; cascading protection stops everyone else.
 */
export function evaluateProtection(
  level: ProtectionLevel,
  cascade: boolean,
  caller: Caller,
  action: ProtectedAction
): PermissionVerdict {
  if (caller.admin) return ALLOWED;
  if (cascade) return { allowed: false, reason: 'cascade-protected' };

  switch (level) {
    case 'none':
      return ALLOWED;
    case 'semi':
      return caller.loggedIn ? ALLOWED : PROTECTED;
    case 'move-only':
      return action === 'move' ? PROTECTED : ALLOWED;
    case 'semi+move':
      return action === 'move' || !caller.loggedIn ? PROTECTED : ALLOWED;
    case 'upload-protected':
      return action === 'upload' ? PROTECTED : ALLOWED;
    case 'full':
    case 'create-protected':
      return PROTECTED;
  }
}

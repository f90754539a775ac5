/**
 * =============================================================================
 * ACCESS GATE
 * =============================================================================
 *
 * Pure authorization decision: (caller, policy, mode) -> allow | deny.
 *
 * Each policy is an allow-table keyed by access mode. Roles match exactly;
 * there is no hierarchy, so dispatcher, driver and rider get nothing the
 * table does not name.
 * =============================================================================
 */

import { UserRole } from '../../core/constants';

export enum AccessMode {
  READ = 'read',
  WRITE = 'write'
}

export enum AccessPolicy {
  ADMIN_ONLY = 'admin-only',
  ADMIN_WRITE_READ_ANY = 'admin-write-read-any',
  /** any authenticated caller, read and write */
  AUTHENTICATED = 'authenticated'
}

/**
 * An already-authenticated caller
 */
export interface Caller {
  userId: string;
  role: UserRole;
  email: string;
}

export type AccessDenial = 'unauthenticated' | 'forbidden';

export type AccessDecision =
  | { allowed: true }
  | { allowed: false; reason: AccessDenial };

type RoleRule = (role: UserRole) => boolean;

const ADMIN: RoleRule = role => role === UserRole.ADMIN;
const ANY: RoleRule = () => true;

export const ACCESS_TABLE: Readonly<Record<AccessPolicy, Readonly<Record<AccessMode, RoleRule>>>> = {
  [AccessPolicy.ADMIN_ONLY]: { [AccessMode.READ]: ADMIN, [AccessMode.WRITE]: ADMIN },
  [AccessPolicy.ADMIN_WRITE_READ_ANY]: { [AccessMode.READ]: ANY, [AccessMode.WRITE]: ADMIN },
  [AccessPolicy.AUTHENTICATED]: { [AccessMode.READ]: ANY, [AccessMode.WRITE]: ANY }
};

export function authorize(caller: Caller | null | undefined, policy: AccessPolicy, mode: AccessMode): AccessDecision {
  if (!caller) {
    return { allowed: false, reason: 'unauthenticated' };
  }
  return ACCESS_TABLE[policy][mode](caller.role)
    ? { allowed: true }
    : { allowed: false, reason: 'forbidden' };
}

const READ_METHODS = ['GET', 'HEAD', 'OPTIONS'];

export function accessModeForMethod(method: string): AccessMode {
  return READ_METHODS.includes(method.toUpperCase()) ? AccessMode.READ : AccessMode.WRITE;
}

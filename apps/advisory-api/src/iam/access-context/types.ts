// Import permission kind type
import type { PermissionKind } from '../permissions/permission-kind';
// Import role enum
import type { Role } from '../roles/role.enum';

/**
 * Per-kind answer for a resource-free check; GET /me fills in every catalog kind.
 * Used by clients to show/hide navigation and actions.
 *
 * Example:
 * { VIEW_CLIENT: true, CREATE_USER: false, ... }
 */
export type PermissionAccessMap = Partial<Record<PermissionKind, boolean>>;

/**
 * AccessContextUser - Minimal user info for display
 */
export interface AccessContextUser {
  /** User account id */
  id: number;
  /** Email address from the directory */
  email: string;
  /** Display name (first + last name, token `name` claim, or email fallback) */
  name: string;
  /** Account role */
  role: Role;
}

/**
 * AccessContext - Authorization snapshot returned by GET /me
 */
export interface AccessContext {
  user: AccessContextUser;
  /** Effective general permissions in catalog order */
  permissions: readonly PermissionKind[];
  /** Resource-free answer for every catalog kind */
  access: PermissionAccessMap;
}

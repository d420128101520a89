// Import Injectable decorator so the policy can be shared through Nest DI
import { Injectable } from '@nestjs/common';
// Import the permission catalog
import {
  ADMIN_ONLY_PERMISSION_KINDS,
  PERMISSION_KINDS,
  isPermissionKind,
  sortByCatalogOrder,
  type PermissionKind
} from '../permissions/permission-kind';
// Import role definitions
import { ROLES, Role, isRole } from './role.enum';

// Defaults every signed-in account receives, whatever its role
const ACCOUNT_DEFAULTS: readonly PermissionKind[] = [
  'VIEW_ACCOUNT',
  'EDIT_MY_DETAILS',
  'UPDATE_MY_PASSWORD',
  'CREATE_USER'
];

/**
 * NonAdminRole - Roles whose defaults are listed by hand
 * ADMIN is excluded: its set is derived from the catalog
 */
export type NonAdminRole = Exclude<Role, Role.ADMIN>;

/**
 * Hand-maintained default grants per non-admin role
 */
export const ROLE_DEFAULTS: Readonly<Record<NonAdminRole, readonly PermissionKind[]>> = {
  [Role.GUEST]: [...ACCOUNT_DEFAULTS, 'REQUEST_CLIENT_ACCOUNT'],
  [Role.CLIENT]: [...ACCOUNT_DEFAULTS, 'VIEW_INVESTMENT', 'MESSAGE_PARTNER'],
  [Role.EMPLOYEE]: [
    ...ACCOUNT_DEFAULTS,
    'CREATE_INVESTMENT',
    'EDIT_INVESTMENT',
    'CREATE_CLIENT',
    'EDIT_CLIENT',
    'VIEW_CLIENT',
    'VIEW_CLIENTS',
    'ASSIGN_CLIENT',
    'VIEW_EMPLOYEE',
    'VIEW_EMPLOYEES'
  ]
};

/**
 * Build and validate the role → permission table
 *
 * Invariants enforced here (construction fails rather than serving a bad table):
 * - every listed kind is in the catalog
 * - no non-admin role holds an admin-only kind
 * - ADMIN holds exactly the full catalog
 *
 * @param defaults - Default grants per non-admin role
 * @returns Frozen lookup table keyed by role
 * @throws Error describing the first violated invariant
 */
export function buildRoleTable(
  defaults: Readonly<Record<NonAdminRole, readonly PermissionKind[]>>
): ReadonlyMap<Role, ReadonlySet<PermissionKind>> {
  const table = new Map<Role, ReadonlySet<PermissionKind>>();

  for (const role of [Role.GUEST, Role.CLIENT, Role.EMPLOYEE] as const) {
    const kinds = defaults[role];
    for (const kind of kinds) {
      // Seeds may come from untyped sources, check membership at runtime as well
      if (!isPermissionKind(kind)) {
        throw new Error(`Role ${role} lists unknown permission kind: ${String(kind)}`);
      }
      if (ADMIN_ONLY_PERMISSION_KINDS.has(kind)) {
        throw new Error(`Role ${role} must not hold admin-only permission kind: ${kind}`);
      }
    }
    table.set(role, new Set(kinds));
  }

  // ADMIN always mirrors the catalog
  const admin = new Set<PermissionKind>(PERMISSION_KINDS);
  if (admin.size !== PERMISSION_KINDS.length) {
    throw new Error('Permission catalog contains duplicate kinds');
  }
  table.set(Role.ADMIN, admin);

  return table;
}

/**
 * RolePolicy - Pure mapping from role to its default permission set
 * Built once at process start and read-only afterwards, so it is shared by all requests
 */
@Injectable()
export class RolePolicy {
  // Validated lookup table
  private readonly table: ReadonlyMap<Role, ReadonlySet<PermissionKind>>;

  constructor() {
    this.table = buildRoleTable(ROLE_DEFAULTS);
  }

  /**
   * Default permission set of a role
   * A fresh copy is returned on every call, so a caller mutating it never affects later calls
   *
   * @param role - Role to look up; null, undefined or an unknown value yields an empty set
   * @returns Default kinds of the role (never null)
   */
  permissionsFor(role: Role | null | undefined): ReadonlySet<PermissionKind> {
    if (!isRole(role)) return new Set<PermissionKind>();
    return new Set(this.table.get(role));
  }

  /**
   * Membership check without copying the set
   * @param role - Role to look up
   * @param kind - Kind to test
   */
  grants(role: Role | null | undefined, kind: PermissionKind): boolean {
    if (!isRole(role)) return false;
    return this.table.get(role)?.has(kind) ?? false;
  }

  // Roles in privilege order
  roles(): readonly Role[] {
    return ROLES;
  }

  /**
   * Snapshot of every role's defaults, in catalog order
   * Used by the catalog endpoint
   */
  defaults(): { role: Role; permissions: PermissionKind[] }[] {
    return ROLES.map((role) => ({ role, permissions: sortByCatalogOrder(this.permissionsFor(role)) }));
  }
}

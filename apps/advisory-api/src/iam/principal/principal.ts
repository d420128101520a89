// Import permission kind type
import type { PermissionKind } from '../permissions/permission-kind';
// Import role enum
import type { Role } from '../roles/role.enum';

/**
 * Principal - Identity and permission state of the acting user for one evaluation
 *
 * Built per request by PrincipalService from already-loaded directory data.
 * Evaluators read it and never mutate or retain it.
 */
export interface Principal {
  /** User account id */
  readonly id: number;

  /** Account role */
  readonly role: Role;

  /** Additive grants on top of the role defaults (never subtracts) */
  readonly customGrants: ReadonlySet<PermissionKind>;

  /**
   * Employee profile bound to this user (employees only)
   * Compared with ClientRef.assignedEmployeeId for assignment checks
   */
  readonly employeeProfileId?: number | null;

  /**
   * Employee profile currently assigned to this user's client profile (clients only)
   * Pre-resolved relationship used by MESSAGE_PARTNER; absent means unknown
   */
  readonly partnerEmployeeId?: number | null;
}

/**
 * Convenience constructor used by services and tests
 * @param init - Principal fields, grants as any iterable
 * @returns Principal with grants copied into a fresh set
 */
export function createPrincipal(init: {
  id: number;
  role: Role;
  customGrants?: Iterable<PermissionKind>;
  employeeProfileId?: number | null;
  partnerEmployeeId?: number | null;
}): Principal {
  return {
    id: init.id,
    role: init.role,
    customGrants: new Set(init.customGrants ?? []),
    employeeProfileId: init.employeeProfileId ?? null,
    partnerEmployeeId: init.partnerEmployeeId ?? null
  };
}

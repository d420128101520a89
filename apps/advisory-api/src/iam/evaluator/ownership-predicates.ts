// Import permission kind type and admin-only subset
import { isAdminOnly, type PermissionKind } from '../permissions/permission-kind';
// Import principal type
import type { Principal } from '../principal/principal';
// Import resource reference union and variants
import type { ClientRef, InvestmentRef, ResourceRef, UserAccountRef } from '../resources/resource-ref';
// Import role enum
import { Role } from '../roles/role.enum';

// Kinds a user may exercise on their own account
const SELF_ACCOUNT_KINDS: ReadonlySet<PermissionKind> = new Set<PermissionKind>([
  'EDIT_MY_DETAILS',
  'UPDATE_MY_PASSWORD'
]);

// Kinds a client may exercise on their own client profile
const SELF_CLIENT_KINDS: ReadonlySet<PermissionKind> = new Set<PermissionKind>(['VIEW_CLIENT']);

/**
 * Null-safe id comparison
 * Both sides must be known; two unknown ids never match
 */
function idsMatch(a: number | null | undefined, b: number | null | undefined): boolean {
  return typeof a === 'number' && typeof b === 'number' && a === b;
}

/**
 * Principal is the employee identified by `assignedEmployeeId`
 */
function isAssignedEmployee(principal: Principal, assignedEmployeeId: number | null | undefined): boolean {
  return principal.role === Role.EMPLOYEE && idsMatch(principal.employeeProfileId, assignedEmployeeId);
}

/**
 * Client profile: the assigned employee for any granted kind; the client user for self-view only
 */
export function ownsClient(principal: Principal, kind: PermissionKind, ref: ClientRef): boolean {
  if (isAssignedEmployee(principal, ref.assignedEmployeeId)) return true;
  return SELF_CLIENT_KINDS.has(kind) && ref.owningUserId === principal.id;
}

/**
 * Investment: the owning client, or the employee assigned to that client
 */
export function ownsInvestment(principal: Principal, ref: InvestmentRef): boolean {
  return ref.owningClientUserId === principal.id || isAssignedEmployee(principal, ref.assignedEmployeeId);
}

/**
 * User account: EDIT_MY_DETAILS and UPDATE_MY_PASSWORD on the principal's own account
 */
export function ownsUserAccount(principal: Principal, kind: PermissionKind, ref: UserAccountRef): boolean {
  return SELF_ACCOUNT_KINDS.has(kind) && ref.id === principal.id;
}

/**
 * MESSAGE_PARTNER: the resource must be the principal's currently assigned counterpart
 *
 * - client → employee: relies on the pre-resolved `partnerEmployeeId`
 * - employee → client: the client must be assigned to the principal
 *
 * An unknown relationship denies.
 */
export function isAssignedPartner(principal: Principal, ref: ResourceRef): boolean {
  switch (ref.kind) {
    case 'employee':
      return principal.role === Role.CLIENT && idsMatch(principal.partnerEmployeeId, ref.id);
    case 'client':
      return isAssignedEmployee(principal, ref.assignedEmployeeId);
    default:
      return false;
  }
}

/**
 * Select and apply the ownership predicate for a resource
 * The switch is exhaustive over ResourceRef; anything else (an untyped caller) denies.
 * Admin-only kinds have no predicate: a non-admin holding one as a custom grant is denied here.
 * Employee profiles are reachable only through MESSAGE_PARTNER.
 *
 * @param principal - Non-admin, non-guest principal holding the base grant
 * @param kind - Requested kind
 * @param ref - Target resource
 */
export function checkOwnership(principal: Principal, kind: PermissionKind, ref: ResourceRef): boolean {
  if (isAdminOnly(kind)) return false;
  if (kind === 'MESSAGE_PARTNER') return isAssignedPartner(principal, ref);

  switch (ref.kind) {
    case 'client':
      return ownsClient(principal, kind, ref);
    case 'investment':
      return ownsInvestment(principal, ref);
    case 'userAccount':
      return ownsUserAccount(principal, kind, ref);
    case 'employee':
      return false;
    default: {
      const unknownRef: never = ref;
      void unknownRef;
      return false;
    }
  }
}

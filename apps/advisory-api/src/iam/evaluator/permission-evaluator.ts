// Import permission catalog
import { PERMISSION_KINDS, isPermissionKind, type PermissionKind } from '../permissions/permission-kind';
// Import principal type
import type { Principal } from '../principal/principal';
// Import resource reference union
import type { ResourceRef } from '../resources/resource-ref';
// Import role enum and policy
import { Role, isRole } from '../roles/role.enum';
import type { RolePolicy } from '../roles/role-policy';

/**
 * PermissionEvaluator - Contract shared by both evaluators
 *
 * Semantics:
 * - resource absent: general (resource-free) check
 * - resource present: general check plus an ownership predicate for the resource's kind
 * - denial is `false`, never an exception
 */
export interface PermissionEvaluator {
  hasPermission(
    principal: Principal | null | undefined,
    kind: PermissionKind | null | undefined,
    resource?: ResourceRef | null
  ): boolean;
}

/**
 * Narrow principal and kind to evaluable values
 * Fails closed on absent principal, absent kind, kinds outside the catalog and unknown roles
 *
 * @param principal - Acting principal (may be absent)
 * @param kind - Requested kind (may be absent or untrusted)
 * @returns true when both can be evaluated
 */
export function isEvaluable(
  principal: Principal | null | undefined,
  kind: PermissionKind | null | undefined
): principal is Principal {
  if (!principal) return false;
  if (!isRole(principal.role)) return false;
  return isPermissionKind(kind);
}

/**
 * General permission set of a principal: role defaults ∪ custom grants
 * ADMIN resolves to the whole catalog. Grants outside the catalog are ignored.
 *
 * @param rolePolicy - Role default table
 * @param principal - Acting principal (may be absent)
 * @returns Fresh set; empty for an absent principal
 */
export function resolveGeneralPermissions(
  rolePolicy: RolePolicy,
  principal: Principal | null | undefined
): Set<PermissionKind> {
  if (!principal || !isRole(principal.role)) return new Set<PermissionKind>();
  if (principal.role === Role.ADMIN) return new Set<PermissionKind>(PERMISSION_KINDS);

  const general = new Set(rolePolicy.permissionsFor(principal.role));
  for (const grant of principal.customGrants ?? []) {
    if (isPermissionKind(grant)) general.add(grant);
  }
  return general;
}

/**
 * Membership test for the general permission set, without building it
 * @param rolePolicy - Role default table
 * @param principal - Acting principal
 * @param kind - Requested kind
 */
export function holdsGeneralPermission(rolePolicy: RolePolicy, principal: Principal, kind: PermissionKind): boolean {
  return rolePolicy.grants(principal.role, kind) || (principal.customGrants?.has(kind) ?? false);
}

// Import Injectable decorator
import { Injectable } from '@nestjs/common';
// Import permission kind type
import type { PermissionKind } from '../permissions/permission-kind';
// Import principal type
import type { Principal } from '../principal/principal';
// Import resource union and kind guard
import { isResourceKind, type ResourceRef } from '../resources/resource-ref';
// Import role enum and policy
import { Role } from '../roles/role.enum';
import { RolePolicy } from '../roles/role-policy';
// Import ownership predicates
import { checkOwnership } from './ownership-predicates';
// Import shared evaluator contract and helpers
import { holdsGeneralPermission, isEvaluable, type PermissionEvaluator } from './permission-evaluator';

/**
 * EntityPermissionEvaluator - Resource-scoped permission checks
 *
 * Normally reached through UserPermissionEvaluator, which has already short-circuited
 * absent inputs and ADMIN. Those checks are repeated here so direct callers get the same answer.
 *
 * Flow:
 * 1. GUEST → deny, even with a matching custom grant
 * 2. Base grant (role defaults ∪ custom grants) must contain the kind
 * 3. Admin-only kinds deny, even when granted as custom grants
 * 4. Ownership predicate selected by the resource's kind (and, for accounts and
 *    client profiles, by the requested kind) must hold
 * 5. Unknown resource shapes deny
 */
@Injectable()
export class EntityPermissionEvaluator implements PermissionEvaluator {
  /**
   * Constructor - injects the role default table
   * @param rolePolicy - Immutable role → permission mapping
   */
  constructor(private readonly rolePolicy: RolePolicy) {}

  /**
   * Evaluate a permission against a specific resource
   * @param principal - Acting principal
   * @param kind - Requested permission kind
   * @param resource - Target resource; absent resources are not entity checks and deny here
   * @returns true only when every rule above passes
   */
  hasPermission(
    principal: Principal | null | undefined,
    kind: PermissionKind | null | undefined,
    resource?: ResourceRef | null
  ): boolean {
    if (!isEvaluable(principal, kind) || !kind) return false;
    if (principal.role === Role.ADMIN) return true;

    // Entity checks only; resource-free questions belong to UserPermissionEvaluator
    if (!resource || !isResourceKind(resource.kind)) return false;

    // Resource-scoped actions are client/employee/admin territory
    if (principal.role === Role.GUEST) return false;

    // Ownership never substitutes for the base grant
    if (!holdsGeneralPermission(this.rolePolicy, principal, kind)) return false;

    return checkOwnership(principal, kind, resource);
  }
}

// Import Injectable decorator
import { Injectable } from '@nestjs/common';
// Import permission kind type
import type { PermissionKind } from '../permissions/permission-kind';
// Import principal type
import type { Principal } from '../principal/principal';
// Import resource union
import type { ResourceRef } from '../resources/resource-ref';
// Import role enum and policy
import { Role } from '../roles/role.enum';
import { RolePolicy } from '../roles/role-policy';
// Import entity-scoped evaluator for delegation
import { EntityPermissionEvaluator } from './entity-permission.evaluator';
// Import shared evaluator contract and helpers
import {
  holdsGeneralPermission,
  isEvaluable,
  resolveGeneralPermissions,
  type PermissionEvaluator
} from './permission-evaluator';

/**
 * UserPermissionEvaluator - Entry point for every permission question
 *
 * Decision order:
 * 1. Absent principal → false
 * 2. Absent (or unknown) kind → false
 * 3. ADMIN → true, without consulting the role table, grants or the resource
 * 4. No resource → kind ∈ role defaults ∪ custom grants
 * 5. Resource present → delegated to EntityPermissionEvaluator (no fallback here)
 *
 * Pure: the result depends only on the arguments and the immutable role table.
 */
@Injectable()
export class UserPermissionEvaluator implements PermissionEvaluator {
  /**
   * Constructor - injects dependencies
   * @param rolePolicy - Immutable role → permission mapping
   * @param entityEvaluator - Resource-scoped evaluator
   */
  constructor(
    private readonly rolePolicy: RolePolicy,
    private readonly entityEvaluator: EntityPermissionEvaluator
  ) {}

  /**
   * Check whether a principal may perform `kind`, optionally against `resource`
   * @param principal - Acting principal (absent denies)
   * @param kind - Requested kind (absent denies)
   * @param resource - Target entity; absent means a general check
   * @returns true if permitted
   */
  hasPermission(
    principal: Principal | null | undefined,
    kind: PermissionKind | null | undefined,
    resource?: ResourceRef | null
  ): boolean {
    if (!isEvaluable(principal, kind) || !kind) return false;

    // Fast path; also bypasses resource checks
    if (principal.role === Role.ADMIN) return true;

    if (resource === null || resource === undefined) {
      return holdsGeneralPermission(this.rolePolicy, principal, kind);
    }

    return this.entityEvaluator.hasPermission(principal, kind, resource);
  }

  /**
   * True if the principal holds at least one of the kinds (resource-free)
   * An empty list denies
   * @param principal - Acting principal
   * @param kinds - Candidate kinds
   */
  hasAnyPermission(principal: Principal | null | undefined, ...kinds: PermissionKind[]): boolean {
    if (!principal || kinds.length === 0) return false;
    return kinds.some((kind) => this.hasPermission(principal, kind));
  }

  /**
   * True if the principal holds every one of the kinds (resource-free)
   * An empty list denies
   * @param principal - Acting principal
   * @param kinds - Required kinds
   */
  hasAllPermissions(principal: Principal | null | undefined, ...kinds: PermissionKind[]): boolean {
    if (!principal || kinds.length === 0) return false;
    return kinds.every((kind) => this.hasPermission(principal, kind));
  }

  /**
   * Effective general permission set (role defaults ∪ custom grants; full catalog for ADMIN)
   * @param principal - Acting principal
   * @returns Fresh set; empty for an absent principal
   */
  generalPermissions(principal: Principal | null | undefined): ReadonlySet<PermissionKind> {
    return resolveGeneralPermissions(this.rolePolicy, principal);
  }
}

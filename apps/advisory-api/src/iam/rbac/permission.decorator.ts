// Import SetMetadata to attach custom metadata to routes
import { SetMetadata } from '@nestjs/common';
// Import permission kind type
import type { PermissionKind } from '../permissions/permission-kind';

// Metadata key for storing permission requirements on routes
export const PERMISSIONS_KEY = 'iam:requiredPermissions';

/**
 * PermissionRequirement - Route-level requirement read by RbacGuard
 * anyOf: the principal needs at least one of these kinds (OR semantics)
 */
export interface PermissionRequirement {
  readonly anyOf: readonly PermissionKind[];
}

/**
 * @RequirePermissions() decorator - Declares required permission kind(s) for a route handler
 *
 * Semantics: OR (any-of), checked without a resource.
 * Resource-scoped checks go through UserPermissionEvaluator in the handler (see AccessCheckService).
 *
 * Examples:
 *   @RequirePermissions('VIEW_ACCOUNTS')
 *   @RequirePermissions('VIEW_CLIENTS', 'ASSIGN_CLIENT')
 *
 * @param permissions - One or more permission kinds
 */
export function RequirePermissions(...permissions: readonly PermissionKind[]) {
  const requirement: PermissionRequirement = { anyOf: permissions };
  return SetMetadata(PERMISSIONS_KEY, requirement);
}

// Import Module decorator
import { Module } from '@nestjs/common';
// Import evaluators
import { EntityPermissionEvaluator } from '../evaluator/entity-permission.evaluator';
import { UserPermissionEvaluator } from '../evaluator/user-permission.evaluator';
// Import principal and resource resolution
import { PrincipalService } from '../principal/principal.service';
import { ResourceResolver } from '../resources/resource-resolver.service';
// Import role policy
import { RolePolicy } from '../roles/role-policy';
// Import route guard
import { RbacGuard } from './rbac.guard';

/**
 * RbacModule - Access control core
 * Provides the role policy, both evaluators, principal/resource resolution and the guard.
 * Relies on the global DirectoryModule for ADVISORY_DIRECTORY.
 */
@Module({
  providers: [
    RolePolicy,
    EntityPermissionEvaluator,
    UserPermissionEvaluator,
    PrincipalService,
    ResourceResolver,
    RbacGuard
  ],
  exports: [
    RolePolicy,
    EntityPermissionEvaluator,
    UserPermissionEvaluator,
    PrincipalService,
    ResourceResolver,
    RbacGuard
  ]
})
export class RbacModule {}

// Import NestJS decorators and exceptions
import { ForbiddenException, Injectable } from '@nestjs/common';
// Import evaluator entry point
import { UserPermissionEvaluator } from '../evaluator/user-permission.evaluator';
// Import permission kind type
import type { PermissionKind } from '../permissions/permission-kind';
// Import principal type and resolution
import type { Principal } from '../principal/principal';
import { PrincipalService } from '../principal/principal.service';
// Import resource resolution
import type { ResourceKind } from '../resources/resource-ref';
import { ResourceResolver } from '../resources/resource-resolver.service';

/**
 * AccessCheckResult - Response body of GET /access/:resourceType/:resourceId
 */
export interface AccessCheckResult {
  permission: PermissionKind;
  resourceType: ResourceKind;
  resourceId: number;
  allowed: boolean;
}

/**
 * AccessCheckService - Answers "may I do X on this entity?"
 */
@Injectable()
export class AccessCheckService {
  constructor(
    private readonly principals: PrincipalService,
    private readonly resources: ResourceResolver,
    private readonly evaluator: UserPermissionEvaluator
  ) {}

  /**
   * Check one permission against one entity
   *
   * A missing entity answers allowed=false, never 404.
   *
   * @param userId - Authenticated user id
   * @param permission - Requested kind
   * @param resourceType - Target entity kind
   * @param resourceId - Target entity id
   * @param cached - Principal already resolved for this request, if any
   * @throws ForbiddenException if the account is unknown or inactive
   */
  async check(
    userId: number,
    permission: PermissionKind,
    resourceType: ResourceKind,
    resourceId: number,
    cached?: Principal
  ): Promise<AccessCheckResult> {
    const principal = cached ?? (await this.principals.resolve(userId));
    if (!principal) throw new ForbiddenException('Forbidden');

    const resource = await this.resources.resolve(resourceType, resourceId);
    const allowed = resource !== null && this.evaluator.hasPermission(principal, permission, resource);

    return { permission, resourceType, resourceId, allowed };
  }
}

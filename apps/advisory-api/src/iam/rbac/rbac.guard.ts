// Import NestJS guards and exceptions
import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  UnauthorizedException
} from '@nestjs/common';
// Import Reflector to read decorator metadata
import { Reflector } from '@nestjs/core';
// Import Express Request type
import type { Request } from 'express';
// Import JSON logger
import { JsonLogger } from '../../logging/json-logger.service';
// Import evaluator entry point
import { UserPermissionEvaluator } from '../evaluator/user-permission.evaluator';
// Import principal resolution
import { PrincipalService } from '../principal/principal.service';
// Import permission decorator metadata
import { PERMISSIONS_KEY, type PermissionRequirement } from './permission.decorator';
// Request augmentation (user, principal)
import '../../types/express-request';

/**
 * RbacGuard - Route-level authorization
 *
 * Should be used AFTER JwtAuthGuard.
 *
 * Flow:
 * 1. Verify user is authenticated (from JwtAuthGuard)
 * 2. Read required kinds from @RequirePermissions() metadata
 * 3. Resolve the principal from the directory (cached per request)
 * 4. Allow if the principal holds at least one required kind
 *
 * Usage: @UseGuards(JwtAuthGuard, RbacGuard)
 */
@Injectable()
export class RbacGuard implements CanActivate {
  private readonly logger = new JsonLogger(RbacGuard.name);

  /**
   * Constructor - injects dependencies
   * @param reflector - To read decorator metadata
   * @param principals - To resolve the acting principal
   * @param evaluator - To decide
   */
  constructor(
    private readonly reflector: Reflector,
    private readonly principals: PrincipalService,
    private readonly evaluator: UserPermissionEvaluator
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();

    const user = request.user;
    if (!user) throw new UnauthorizedException('Unauthorized');

    // Method-level metadata overrides class-level
    const requirement = this.reflector.getAllAndOverride<PermissionRequirement | undefined>(PERMISSIONS_KEY, [
      context.getHandler(),
      context.getClass()
    ]);

    // Fail closed if permissions were not declared
    if (!requirement || requirement.anyOf.length === 0) {
      this.logger.debug('Route has no permission requirement', { userId: user.userId });
      throw new ForbiddenException('Forbidden');
    }

    if (!request.principal) {
      const resolved = await this.principals.resolve(user.userId);
      if (!resolved) {
        this.logger.debug('No active account for authenticated user', { userId: user.userId });
        throw new ForbiddenException('Forbidden');
      }
      request.principal = resolved;
    }

    const principal = request.principal;
    if (!this.evaluator.hasAnyPermission(principal, ...requirement.anyOf)) {
      this.logger.debug('Permission denied', {
        userId: principal.id,
        role: principal.role,
        required: requirement.anyOf
      });
      throw new ForbiddenException('Forbidden');
    }

    return true;
  }
}

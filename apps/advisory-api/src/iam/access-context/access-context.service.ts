// Import NestJS exception classes
import { ForbiddenException, Inject, Injectable } from '@nestjs/common';
// Import AuthenticatedUser interface from auth module
import type { AuthenticatedUser } from '../../auth/interfaces/authenticated-user';
// Import directory contract and DI token
import { ADVISORY_DIRECTORY, type AdvisoryDirectory } from '../../directory/advisory-directory';
// Import directory record type
import type { UserAccountRecord } from '../../directory/directory.types';
// Import evaluator entry point
import { UserPermissionEvaluator } from '../evaluator/user-permission.evaluator';
// Import permission catalog helpers
import { PERMISSION_KINDS, sortByCatalogOrder } from '../permissions/permission-kind';
// Import principal type and resolution
import type { Principal } from '../principal/principal';
import { PrincipalService } from '../principal/principal.service';
// Import access context types
import type { AccessContext, PermissionAccessMap } from './types';

/**
 * Type guard to check if value is a non-empty string
 * @param value - Value to check
 * @returns true if value is string with content after trimming
 */
function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Display name in priority order:
 * 1. Directory first + last name
 * 2. Token `name` claim
 * 3. Email
 */
export function getDisplayName(account: UserAccountRecord, authUser: AuthenticatedUser): string {
  const fullName = [account.firstName, account.lastName]
    .filter(isNonEmptyString)
    .map((part) => part.trim())
    .join(' ');
  if (fullName.length > 0) return fullName;

  const claimName = authUser.claims.name;
  if (isNonEmptyString(claimName)) return claimName.trim();

  return account.email;
}

/**
 * AccessContextService - Builds the authorization snapshot for GET /me
 */
@Injectable()
export class AccessContextService {
  constructor(
    @Inject(ADVISORY_DIRECTORY) private readonly directory: AdvisoryDirectory,
    private readonly principals: PrincipalService,
    private readonly evaluator: UserPermissionEvaluator
  ) {}

  /**
   * Get the access context of the authenticated user
   * @param authUser - Authenticated user from JwtAuthGuard
   * @param cached - Principal already resolved for this request, if any
   * @throws ForbiddenException if the account is unknown or inactive
   */
  async getMe(authUser: AuthenticatedUser, cached?: Principal): Promise<AccessContext> {
    const account = await this.directory.findUser(authUser.userId);
    const principal = cached ?? (await this.principals.resolve(authUser.userId));
    if (!account || !principal) {
      // Token is valid but no active account backs it
      throw new ForbiddenException('Forbidden');
    }

    const access: PermissionAccessMap = {};
    for (const kind of PERMISSION_KINDS) {
      access[kind] = this.evaluator.hasPermission(principal, kind);
    }

    return {
      user: {
        id: account.id,
        email: account.email,
        name: getDisplayName(account, authUser),
        role: principal.role
      },
      permissions: sortByCatalogOrder(this.evaluator.generalPermissions(principal)),
      access
    };
  }
}

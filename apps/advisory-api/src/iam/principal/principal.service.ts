// Import NestJS decorators
import { Inject, Injectable } from '@nestjs/common';
// Import directory contract and DI token
import { ADVISORY_DIRECTORY, type AdvisoryDirectory } from '../../directory/advisory-directory';
// Import permission kind guard
import { isPermissionKind } from '../permissions/permission-kind';
// Import role enum
import { Role } from '../roles/role.enum';
// Import principal type and constructor
import { createPrincipal, type Principal } from './principal';

/**
 * PrincipalService - Builds the Principal for an authenticated user
 *
 * All I/O needed by the evaluators happens here, before evaluation:
 * - role and custom grants come from the user account
 * - employees get their employee profile binding
 * - clients get their currently assigned partner (for MESSAGE_PARTNER)
 */
@Injectable()
export class PrincipalService {
  /**
   * Constructor - injects the directory
   * @param directory - Read-only entity lookups
   */
  constructor(@Inject(ADVISORY_DIRECTORY) private readonly directory: AdvisoryDirectory) {}

  /**
   * Resolve a principal by user account id
   * @param userId - Authenticated user id
   * @returns Principal, or null when the account is unknown or inactive
   */
  async resolve(userId: number): Promise<Principal | null> {
    const account = await this.directory.findUser(userId);
    if (!account || !account.active) return null;

    let employeeProfileId: number | null = null;
    let partnerEmployeeId: number | null = null;

    if (account.role === Role.EMPLOYEE) {
      const employee = await this.directory.findEmployeeByUserId(account.id);
      employeeProfileId = employee?.id ?? null;
    } else if (account.role === Role.CLIENT) {
      const client = await this.directory.findClientByUserId(account.id);
      partnerEmployeeId = client?.assignedEmployeeId ?? null;
    }

    return createPrincipal({
      id: account.id,
      role: account.role,
      // Stored grants outside the catalog are ignored, never widened
      customGrants: account.customGrants.filter(isPermissionKind),
      employeeProfileId,
      partnerEmployeeId
    });
  }
}

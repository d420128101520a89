// Import NestJS controller decorators
import { Controller, Get, UseGuards } from '@nestjs/common';
// Import Swagger decorators for API documentation
import { ApiBearerAuth, ApiOkResponse, ApiTags } from '@nestjs/swagger';
// Import authentication guard
import { JwtAuthGuard } from '../../auth/jwt-auth.guard';
// Import permission catalog
import {
  PERMISSION_DESCRIPTIONS,
  PERMISSION_KINDS,
  isAdminOnly,
  type PermissionKind
} from '../permissions/permission-kind';
// Import RBAC decorator and guard
import { RequirePermissions } from '../rbac/permission.decorator';
import { RbacGuard } from '../rbac/rbac.guard';
// Import role policy
import type { Role } from '../roles/role.enum';
import { RolePolicy } from '../roles/role-policy';

/**
 * PermissionCatalogEntry - One catalog kind as listed by GET /permissions
 */
export interface PermissionCatalogEntry {
  key: PermissionKind;
  description: string;
  /** Only ADMIN holds it by default and no non-admin role can */
  adminOnly: boolean;
}

/**
 * RoleDefaults - One role's default permission set as listed by GET /roles
 */
export interface RoleDefaults {
  role: Role;
  permissions: PermissionKind[];
}

/**
 * CatalogController - Read-only views of the permission catalog and role defaults
 *
 * Routes: /permissions, /roles
 * All endpoints require JWT + VIEW_ACCOUNTS
 */
@ApiTags('iam')
@ApiBearerAuth('bearer')
@Controller()
@UseGuards(JwtAuthGuard, RbacGuard)
@RequirePermissions('VIEW_ACCOUNTS')
export class CatalogController {
  constructor(private readonly rolePolicy: RolePolicy) {}

  @Get('permissions')
  @ApiOkResponse({ description: 'Every permission kind in catalog order' })
  permissions(): PermissionCatalogEntry[] {
    return PERMISSION_KINDS.map((key) => ({
      key,
      description: PERMISSION_DESCRIPTIONS[key],
      adminOnly: isAdminOnly(key)
    }));
  }

  @Get('roles')
  @ApiOkResponse({ description: 'Default permissions of every role, lowest privilege first' })
  roles(): RoleDefaults[] {
    return this.rolePolicy.defaults();
  }
}

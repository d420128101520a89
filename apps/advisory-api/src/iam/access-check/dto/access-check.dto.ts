// Import Swagger property decorator
import { ApiProperty } from '@nestjs/swagger';
// Import transformation decorator (path params arrive as strings)
import { Type } from 'class-transformer';
// Import validation decorators
import { IsIn, IsInt, IsPositive } from 'class-validator';
// Import permission catalog
import { PERMISSION_KINDS, type PermissionKind } from '../../permissions/permission-kind';
// Import resource kinds
import { RESOURCE_KINDS, type ResourceKind } from '../../resources/resource-ref';

/**
 * AccessCheckParamsDto - Path parameters of GET /access/:resourceType/:resourceId
 */
export class AccessCheckParamsDto {
  /** Kind of the target entity */
  @ApiProperty({ enum: RESOURCE_KINDS })
  @IsIn(RESOURCE_KINDS)
  resourceType!: ResourceKind;

  /** Id of the target entity (positive integer) */
  @ApiProperty({ example: 7 })
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  resourceId!: number;
}

/**
 * AccessCheckQueryDto - Query string of GET /access/:resourceType/:resourceId
 */
export class AccessCheckQueryDto {
  /** Permission kind to check; must be a catalog member */
  @ApiProperty({ enum: PERMISSION_KINDS, example: 'VIEW_CLIENT' })
  @IsIn(PERMISSION_KINDS)
  permission!: PermissionKind;
}

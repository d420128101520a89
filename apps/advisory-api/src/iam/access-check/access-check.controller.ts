// Import NestJS controller decorators
import { Controller, Get, Param, Query, Req, UnauthorizedException, UseGuards } from '@nestjs/common';
// Import Express Request type
import type { Request } from 'express';
// Import Swagger decorators for API documentation
import { ApiBearerAuth, ApiOkResponse, ApiTags } from '@nestjs/swagger';
// Import authentication guard
import { JwtAuthGuard } from '../../auth/jwt-auth.guard';
// Import DTOs
import { AccessCheckParamsDto, AccessCheckQueryDto } from './dto/access-check.dto';
// Import access check service
import { AccessCheckService, type AccessCheckResult } from './access-check.service';
// Request augmentation (user, principal)
import '../../types/express-request';

/**
 * AccessCheckController - Resource-scoped permission check
 *
 * Routes: /access/:resourceType/:resourceId?permission=KIND
 * Security: JWT only; the answer itself is the authorization decision.
 */
@ApiTags('iam')
@ApiBearerAuth('bearer')
@Controller('access')
@UseGuards(JwtAuthGuard)
export class AccessCheckController {
  constructor(private readonly accessCheck: AccessCheckService) {}

  @Get(':resourceType/:resourceId')
  @ApiOkResponse({ description: 'Whether the caller holds the permission on the entity' })
  async check(
    @Req() req: Request,
    @Param() params: AccessCheckParamsDto,
    @Query() query: AccessCheckQueryDto
  ): Promise<AccessCheckResult> {
    if (!req.user) throw new UnauthorizedException('Unauthorized');
    return this.accessCheck.check(req.user.userId, query.permission, params.resourceType, params.resourceId, req.principal);
  }
}

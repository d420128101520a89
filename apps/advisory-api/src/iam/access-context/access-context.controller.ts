// Import NestJS controller decorators
import { Controller, Get, Req, UnauthorizedException, UseGuards } from '@nestjs/common';
// Import Express Request type
import type { Request } from 'express';
// Import Swagger decorators for API documentation
import { ApiBearerAuth, ApiOkResponse, ApiTags } from '@nestjs/swagger';
// Import authentication guard
import { JwtAuthGuard } from '../../auth/jwt-auth.guard';
// Import access context service
import { AccessContextService } from './access-context.service';
// Import access context types
import type { AccessContext } from './types';
// Request augmentation (user, principal)
import '../../types/express-request';

/**
 * AccessContextController - Authorization snapshot for client bootstrap
 *
 * Routes: /me
 * Security: JWT only. No RbacGuard: every active account may read its own context.
 */
@ApiTags('iam')
@ApiBearerAuth('bearer')
@Controller()
@UseGuards(JwtAuthGuard)
export class AccessContextController {
  constructor(private readonly accessContext: AccessContextService) {}

  /**
   * GET /me - Identity, effective permissions and a per-kind access map
   * Called by clients on login/refresh to decide what to show.
   */
  @Get('me')
  @ApiOkResponse({ description: 'Access context of the authenticated user' })
  async me(@Req() req: Request): Promise<AccessContext> {
    if (!req.user) throw new UnauthorizedException('Unauthorized');
    return this.accessContext.getMe(req.user, req.principal);
  }
}

// Import NestJS Module decorator
import { Module } from '@nestjs/common';
// Import access control core
import { RbacModule } from '../rbac/rbac.module';
// Import access check controller and service
import { AccessCheckController } from './access-check.controller';
import { AccessCheckService } from './access-check.service';

/**
 * AccessCheckModule - Provides GET /access/:resourceType/:resourceId
 */
@Module({
  imports: [RbacModule],
  controllers: [AccessCheckController],
  providers: [AccessCheckService]
})
export class AccessCheckModule {}

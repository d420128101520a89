// Import NestJS Module decorator
import { Module } from '@nestjs/common';
// Import access control core
import { RbacModule } from '../rbac/rbac.module';
// Import access context controller
import { AccessContextController } from './access-context.controller';
// Import access context service
import { AccessContextService } from './access-context.service';

/**
 * AccessContextModule - Provides GET /me
 */
@Module({
  imports: [RbacModule],
  controllers: [AccessContextController],
  providers: [AccessContextService]
})
export class AccessContextModule {}

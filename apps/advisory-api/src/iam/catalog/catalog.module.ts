// Import NestJS Module decorator
import { Module } from '@nestjs/common';
// Import access control core
import { RbacModule } from '../rbac/rbac.module';
// Import catalog controller
import { CatalogController } from './catalog.controller';

/**
 * CatalogModule - Provides GET /permissions and GET /roles
 */
@Module({
  imports: [RbacModule],
  controllers: [CatalogController]
})
export class CatalogModule {}

// Import Module decorator
import { Module } from '@nestjs/common';
// Import IAM feature modules
import { RbacModule } from './rbac/rbac.module';
import { AccessContextModule } from './access-context/access-context.module';
import { AccessCheckModule } from './access-check/access-check.module';
import { CatalogModule } from './catalog/catalog.module';

/**
 * IamModule - Identity and Access Management module
 * Aggregates:
 * - Access control core (role policy, evaluators, RbacGuard)
 * - Access context inspection (/me)
 * - Resource-scoped checks (/access)
 * - Catalog views (/permissions, /roles)
 */
@Module({
  imports: [RbacModule, AccessContextModule, AccessCheckModule, CatalogModule],
  exports: [RbacModule]
})
export class IamModule {}

// Import Module decorator
import { Module } from '@nestjs/common';
// Import health check controller
import { HealthController } from './health.controller';

/**
 * HealthModule - Provides the public liveness endpoint
 */
@Module({
  controllers: [HealthController]
})
export class HealthModule {}

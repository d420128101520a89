// Import NestJS controller decorators
import { Controller, Get } from '@nestjs/common';
// Import Swagger decorators for API documentation
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';

/**
 * HealthResponse - Liveness payload
 */
export interface HealthResponse {
  status: 'ok';
  service: string;
  timestamp: string;
}

/**
 * HealthController - Liveness endpoint
 * Route: GET /health
 * Public: used by load balancers and monitoring to verify service availability
 */
@ApiTags('health')
@Controller('health')
export class HealthController {
  @Get()
  @ApiOkResponse({ description: 'Service is up' })
  health(): HealthResponse {
    return { status: 'ok', service: 'advisory-api', timestamp: new Date().toISOString() };
  }
}

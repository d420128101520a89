// Import reflect-metadata to enable TypeScript decorators and metadata reflection
// This is required for NestJS dependency injection and decorator functionality
import 'reflect-metadata';
// Import NestFactory to bootstrap the NestJS application
import { NestFactory } from '@nestjs/core';
// Import ValidationPipe for automatic DTO validation
import { ValidationPipe } from '@nestjs/common';
// Import ConfigService to read the validated environment
import { ConfigService } from '@nestjs/config';
// Import Swagger utilities for API documentation generation
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
// Import the root application module
import { AppModule } from './app.module';
// Import validated environment type
import type { AppEnv } from './config/env.validation';
// Import custom error filter to standardize HTTP error responses
import { HttpErrorFilter } from './common/filters/http-error.filter';
// Import middleware to attach unique request IDs for tracing and logging
import { requestIdMiddleware } from './common/request/request-id.middleware';
// Import structured logging
import { createHttpLoggingMiddleware } from './logging/http-logging.middleware';
import { JsonLogger, logLevelsFrom } from './logging/json-logger.service';

/**
 * Bootstrap function - Entry point for the NestJS application
 * Initializes the app, configures middleware, validation, error handling, and Swagger docs
 */
async function bootstrap() {
  const logger = new JsonLogger('bootstrap');

  // bufferLogs: true queues logs until a logger is attached, preventing loss during startup
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
    logger
  });
  app.useLogger(logger);

  const config = app.get<ConfigService<AppEnv, true>>(ConfigService);
  const env = config.get('NODE_ENV', { infer: true }) ?? 'development';
  const level = config.get('LOG_LEVEL', { infer: true }) ?? (env === 'production' ? 'log' : 'debug');
  logger.setLogLevels(logLevelsFrom(level));

  // DTO validation defaults (safe-by-default)
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,            // Strip properties that don't have decorators in the DTO
      forbidNonWhitelisted: true, // Reject unknown properties
      transform: true             // Transform payloads (and path/query params) to DTO instances
    })
  );

  // Correlation ID first, so every later log line carries it
  app.use(requestIdMiddleware);
  app.use(createHttpLoggingMiddleware(new JsonLogger('http')));

  // Auth-safe error shape - never leaks exception details
  app.useGlobalFilters(new HttpErrorFilter(new JsonLogger('HttpErrorFilter')));

  // CORS (disabled unless an allow-list is configured)
  const allowList = config.get('CORS_ORIGINS', { infer: true });
  const normalizeOrigin = (value: string) => value.trim().replace(/\/$/, '');
  const allowSet = new Set(allowList.map(normalizeOrigin));

  if (allowList.length > 0) {
    app.enableCors({
      origin: (
        origin: string | undefined,
        callback: (err: Error | null, allow?: boolean) => void
      ) => {
        // Allow non-browser clients (curl/Postman) which have no Origin header.
        if (!origin) return callback(null, true);
        if (allowSet.has(normalizeOrigin(origin))) return callback(null, true);
        logger.warn('CORS blocked origin', { origin, allowListCount: allowList.length });
        return callback(new Error(`CORS blocked origin: ${origin}`), false);
      },
      methods: ['GET', 'HEAD', 'OPTIONS'],
      optionsSuccessStatus: 204,
      maxAge: 86400
    });
    logger.log('CORS enabled', { allowList });
  }

  if (config.get('SWAGGER_ENABLED', { infer: true })) {
    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('Advisory Platform Access API')
        .setDescription('Role and ownership based access control for clients, employees and investments')
        .setVersion('1.0.0')
        .addBearerAuth(
          {
            type: 'http',
            scheme: 'bearer',
            bearerFormat: 'JWT',
            name: 'Authorization',
            in: 'header'
          },
          'bearer'  // Security scheme identifier used in @ApiBearerAuth() decorators
        )
        .build()
    );
    SwaggerModule.setup('docs', app, document, {
      swaggerOptions: { persistAuthorization: true }
    });
  }

  process.on('unhandledRejection', (reason) => {
    logger.error('unhandledRejection', { reason: reason instanceof Error ? reason.stack ?? reason.message : String(reason) });
  });

  const port = config.get('PORT', { infer: true });
  await app.listen(port);
  logger.log('advisory-api listening', { port, env });
}

bootstrap().catch((error: unknown) => {
  // Plain JSON line: the Nest logger may not exist yet
  console.error(JSON.stringify({ level: 'error', msg: 'bootstrap failed', error: String(error) }));
  process.exit(1);
});

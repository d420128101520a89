// Import NestJS Module decorator to define the root module
import { Module } from '@nestjs/common';
// Import ConfigModule to manage environment variables and configuration
import { ConfigModule } from '@nestjs/config';
// Import environment variable validation function
import { validateEnv } from './config/env.validation';
// Import authentication module for JWT verification
import { AuthModule } from './auth/auth.module';
// Import directory module (entity lookups for access control)
import { DirectoryModule } from './directory/directory.module';
// Import health check module for monitoring application status
import { HealthModule } from './health/health.module';
// Import IAM module (evaluators, guards, access endpoints)
import { IamModule } from './iam/iam.module';

/**
 * AppModule - Root module of the application
 * Orchestrates all feature modules and provides global configuration
 */
@Module({
  imports: [
    // Configure environment variable loading and validation
    ConfigModule.forRoot({
      isGlobal: true,  // Make ConfigService available globally without re-importing
      envFilePath: ['.env.local', '.env'],  // First file wins for a key defined in both
      validate: validateEnv  // Fail fast on missing/invalid configuration
    }),
    // JWT verification (global)
    AuthModule,
    // Directory lookups (global)
    DirectoryModule,
    // Identity and Access Management
    IamModule,
    // Health check endpoint for load balancers and monitoring
    HealthModule
  ]
})
export class AppModule {}

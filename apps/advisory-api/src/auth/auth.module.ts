// Import Global and Module decorators
import { Global, Module } from '@nestjs/common';
// Import JWT verification strategy
import { JwtStrategy } from './jwt.strategy';
// Import JWT authentication guard for protecting routes
import { JwtAuthGuard } from './jwt-auth.guard';

/**
 * AuthModule - Global authentication module
 * Marked as @Global so the guard is usable by every feature module without re-importing
 */
@Global()
@Module({
  providers: [JwtStrategy, JwtAuthGuard],
  exports: [JwtStrategy, JwtAuthGuard]
})
export class AuthModule {}

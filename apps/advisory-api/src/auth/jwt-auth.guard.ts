// Import NestJS guards and exceptions for route protection
import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
// Import Express Request type for type safety
import type { Request } from 'express';
// Import JWT verification strategy
import { JwtStrategy } from './jwt.strategy';
// Request augmentation (user)
import '../types/express-request';

/**
 * Extract and validate Bearer token from Authorization header
 * @param req - Express request object
 * @returns The extracted JWT token without the "Bearer " prefix
 * @throws UnauthorizedException if token is missing or malformed
 */
export function extractBearerToken(req: Request): string {
  // Get the Authorization header (case-insensitive)
  const header = req.header('authorization');
  if (!header) throw new UnauthorizedException('Unauthorized');

  // Split "Bearer <token>" into scheme and value
  const [scheme, value, ...rest] = header.trim().split(/\s+/);
  if (!scheme || !value || rest.length > 0) throw new UnauthorizedException('Unauthorized');
  // Verify the scheme is "Bearer" (case-insensitive)
  if (scheme.toLowerCase() !== 'bearer') throw new UnauthorizedException('Unauthorized');

  return value;
}

/**
 * JwtAuthGuard - Verifies the bearer token and attaches the authenticated user to the request
 * Use with @UseGuards(JwtAuthGuard) on controllers or routes, before RbacGuard
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  // Inject the JWT verification strategy
  constructor(private readonly strategy: JwtStrategy) {}

  /**
   * Guard activation method - called before route handler
   * @param context - Execution context containing request information
   * @returns true if authentication succeeds, throws UnauthorizedException otherwise
   */
  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();
    const token = extractBearerToken(request);

    // Verify signature, expiration, issuer and audience
    request.user = await this.strategy.verifyJwt(token);
    return true;
  }
}

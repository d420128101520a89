// Import NestJS decorators and exceptions
import { Injectable, UnauthorizedException } from '@nestjs/common';
// Import ConfigService to access validated environment
import { ConfigService } from '@nestjs/config';
// Import jose for JWT verification
import { errors as joseErrors, jwtVerify, type JWTPayload } from 'jose';
// Import validated environment type
import type { AppEnv } from '../config/env.validation';
// Import token payload interface
import type { AdvisoryJwtPayload } from './interfaces/jwt-payload';
// Import authenticated user interface
import type { AuthenticatedUser } from './interfaces/authenticated-user';

// Only algorithm accepted
const ACCEPTED_ALGORITHMS = ['HS256'];

// User ids are positive integers; `sub` must be their canonical decimal form
const USER_ID_PATTERN = /^[1-9][0-9]*$/;

/**
 * Type guard to check if value is a non-empty string
 * @param value - Value to check
 * @returns true if value is a string with content after trimming
 */
function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Parse the `sub` claim into a user account id
 * @param sub - Raw subject claim
 * @returns Positive integer id, or null when the claim is not a canonical id
 */
export function parseUserId(sub: unknown): number | null {
  if (typeof sub !== 'string' || !USER_ID_PATTERN.test(sub)) return null;
  const id = Number(sub);
  return Number.isSafeInteger(id) ? id : null;
}

/**
 * Convert generic JWT payload to the typed advisory payload
 * @param payload - Raw payload from jose
 * @returns Typed payload
 * @throws UnauthorizedException if `sub` is missing
 */
function toAdvisoryPayload(payload: JWTPayload): AdvisoryJwtPayload {
  const sub = payload.sub;
  if (!isNonEmptyString(sub)) {
    throw new UnauthorizedException('Unauthorized');
  }

  const email = isNonEmptyString(payload.email) ? payload.email : undefined;
  const name = isNonEmptyString(payload.name) ? payload.name : undefined;

  return { ...payload, sub, email, name };
}

/**
 * JwtStrategy - Verifies HS256 access tokens issued by the platform's identity service
 * Validates signature, issuer, audience, exp/nbf and the shape of `sub`
 */
@Injectable()
export class JwtStrategy {
  // Symmetric verification key derived from JWT_SECRET
  private readonly secret: Uint8Array;
  // Expected issuer claim
  private readonly issuer: string;
  // Expected audience claim
  private readonly audience: string;

  /**
   * Constructor - reads JWT settings from the validated environment
   * @param config - NestJS ConfigService
   * @throws Error if the secret is missing (fail-fast at startup)
   */
  constructor(private readonly config: ConfigService<AppEnv, true>) {
    const secret = this.config.get('JWT_SECRET', { infer: true });
    if (!isNonEmptyString(secret)) {
      throw new Error('Missing JWT configuration: JWT_SECRET');
    }

    this.secret = new TextEncoder().encode(secret);
    this.issuer = this.config.get('JWT_ISSUER', { infer: true });
    this.audience = this.config.get('JWT_AUDIENCE', { infer: true });
  }

  /**
   * Verifies a raw JWT string (without "Bearer " prefix)
   * @param token - Raw JWT
   * @returns Authenticated user
   * @throws UnauthorizedException for any verification failure
   */
  async verifyJwt(token: string): Promise<AuthenticatedUser> {
    try {
      const { payload } = await jwtVerify(token, this.secret, {
        issuer: this.issuer,
        audience: this.audience,
        algorithms: ACCEPTED_ALGORITHMS
      });

      const claims = toAdvisoryPayload(payload);
      const userId = parseUserId(claims.sub);
      if (userId === null) throw new UnauthorizedException('Unauthorized');

      return {
        userId,
        email: claims.email ?? '',
        claims
      };
    } catch (err: unknown) {
      if (err instanceof UnauthorizedException) throw err;
      // Expired, malformed, wrong signature or wrong claims all collapse to the same 401;
      // the jose error class is kept as the cause for server-side logs
      const cause = err instanceof joseErrors.JOSEError ? err.code : 'UNEXPECTED';
      throw new UnauthorizedException('Unauthorized', { cause });
    }
  }
}

// Import jose library's standard JWT payload interface
import type { JWTPayload } from 'jose';

/**
 * AdvisoryJwtPayload - Typed representation of the access token claims
 *
 * Signature, issuer, audience, expiration (exp) and not-before (nbf) are validated
 * by jose during verification. Role and grants are NOT read from the token:
 * they are loaded from the directory on every request.
 */
export interface AdvisoryJwtPayload extends JWTPayload {
  /** Subject claim - user account id as a decimal string (required) */
  readonly sub: string;

  /** Email address of the user (optional) */
  readonly email?: string;

  /** Display name (optional) */
  readonly name?: string;
}

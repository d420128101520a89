// Import token payload interface
import type { AdvisoryJwtPayload } from './jwt-payload';

/**
 * AuthenticatedUser - A verified caller, attached to the Express request by JwtAuthGuard
 * Carries identity only; permissions come from the Principal built by PrincipalService
 */
export interface AuthenticatedUser {
  /** User account id parsed from the `sub` claim */
  userId: number;

  /** Email address from the token (best-effort, may be empty) */
  email: string;

  /** Complete verified JWT payload */
  claims: AdvisoryJwtPayload;
}

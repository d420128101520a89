import type { AuthenticatedUser } from '../auth/interfaces/authenticated-user';
import type { Principal } from '../iam/principal/principal';

declare global {
  namespace Express {
    interface Request {
      /**
       * Populated by `JwtAuthGuard` after successful verification.
       * Undefined means unauthenticated.
       */
      user?: AuthenticatedUser;

      /** Correlation ID generated per request. */
      requestId?: string;

      /** Principal resolved from the directory, cached for the rest of the request. */
      principal?: Principal;
    }
  }
}

export {};

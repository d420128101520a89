// Import ErrorCode type from error codes constants
import type { ErrorCode } from './error-codes';

/**
 * ErrorResponseBody - Standardized structure for all HTTP error responses
 * Produced only by HttpErrorFilter
 */
export interface ErrorResponseBody {
  /** HTTP status code (e.g., 400, 401, 403, 500) */
  statusCode: number;

  /** Application-specific error code for client-side error handling */
  errorCode: ErrorCode;

  /** Human-readable error message (generic to avoid leaking internals) */
  message: string;

  /** ISO 8601 timestamp when the error occurred */
  timestamp: string;

  /** Request path that triggered the error, without query string */
  path: string;

  /** Request ID for log correlation (optional) */
  requestId?: string;
}

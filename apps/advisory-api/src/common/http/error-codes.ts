/**
 * ERROR_CODES - Machine-readable error identifiers returned to API clients
 * Using 'as const' makes the object readonly and enables precise type inference
 */
export const ERROR_CODES = {
  /** Request failed validation (malformed params, unknown permission kind) */
  BAD_REQUEST: 'BAD_REQUEST',

  /** User is not authenticated (missing or invalid JWT token) */
  UNAUTHENTICATED: 'UNAUTHENTICATED',

  /** User is authenticated but lacks the required permission */
  FORBIDDEN: 'FORBIDDEN',

  /** Route or entity does not exist */
  NOT_FOUND: 'NOT_FOUND',

  /** Internal server error or unexpected exception */
  INTERNAL: 'INTERNAL'
} as const;

/**
 * ErrorCode type - Union of all error code values
 * Example: 'BAD_REQUEST' | 'UNAUTHENTICATED' | 'FORBIDDEN' | 'NOT_FOUND' | 'INTERNAL'
 */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

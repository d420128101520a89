/**
 * Role enum - The four account roles of the advisory platform
 * Declared in privilege order; permission decisions use the explicit per-role sets of RolePolicy
 */
export enum Role {
  GUEST = 'GUEST',       // Signed up, may request an upgrade to client
  CLIENT = 'CLIENT',     // Views their own investments and account
  EMPLOYEE = 'EMPLOYEE', // Manages assigned clients and creates investments
  ADMIN = 'ADMIN'        // Full system access and user management
}

// Immutable list of all roles, lowest privilege first
export const ROLES: readonly Role[] = [Role.GUEST, Role.CLIENT, Role.EMPLOYEE, Role.ADMIN] as const;

/**
 * Type guard for untrusted role names (seed files, token claims)
 * @param value - Value to check
 * @returns true if value is a valid Role
 */
export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && (ROLES as readonly string[]).includes(value);
}

/**
 * PERMISSION_KINDS - The closed catalog of capabilities a principal can hold
 * Ordered by audience: account level, admin level, employee level, client level, guest level
 * Declared as a const tuple so the PermissionKind union and the runtime list never drift
 */
export const PERMISSION_KINDS = [
  // Account level (every signed-in user)
  'VIEW_ACCOUNT',
  'VIEW_ACCOUNTS',
  'EDIT_MY_DETAILS',
  'UPDATE_MY_PASSWORD',
  'CREATE_USER',
  'VIEW_USERS',

  // Admin level
  'EDIT_USER',
  'DELETE_USER',
  'EDIT_EMPLOYEE',
  'CREATE_EMPLOYEE',
  'UPDATE_OTHER_PASSWORD',

  // Employee level
  'CREATE_CLIENT',
  'EDIT_CLIENT',
  'VIEW_CLIENT',
  'VIEW_CLIENTS',
  'ASSIGN_CLIENT',
  'CREATE_INVESTMENT',
  'EDIT_INVESTMENT',
  'VIEW_EMPLOYEES',
  'VIEW_EMPLOYEE',

  // Client level
  'VIEW_INVESTMENT',
  'MESSAGE_PARTNER',

  // Guest level
  'REQUEST_CLIENT_ACCOUNT'
] as const;

/**
 * PermissionKind - One named capability from the catalog
 * Example: 'VIEW_CLIENT' | 'EDIT_MY_DETAILS' | ...
 */
export type PermissionKind = (typeof PERMISSION_KINDS)[number];

/**
 * Human-readable description for every kind
 * Typed as a full Record so adding a kind without a description fails to compile
 */
export const PERMISSION_DESCRIPTIONS: Readonly<Record<PermissionKind, string>> = {
  VIEW_ACCOUNT: 'View the details of your own user account.',
  VIEW_ACCOUNTS: 'View all user accounts and their details.',
  EDIT_MY_DETAILS: 'Edit the details of your own user account.',
  UPDATE_MY_PASSWORD: 'Update the password of your own user account.',
  CREATE_USER: 'Create a new user account.',
  VIEW_USERS: 'List the user directory.',
  EDIT_USER: 'Edit the details of a specific user account.',
  DELETE_USER: 'Remove a user account from the system.',
  EDIT_EMPLOYEE: 'Edit the details of a specific employee profile.',
  CREATE_EMPLOYEE: 'Create a new employee profile.',
  UPDATE_OTHER_PASSWORD: 'Update the password of another user account.',
  CREATE_CLIENT: 'Create a client profile by upgrading an existing guest account.',
  EDIT_CLIENT: 'Edit the details of an existing client profile.',
  VIEW_CLIENT: 'View the details of a specific client profile.',
  VIEW_CLIENTS: 'List all client profiles.',
  ASSIGN_CLIENT: 'Assign a client to an employee partner.',
  CREATE_INVESTMENT: 'Create a new investment for a specific client.',
  EDIT_INVESTMENT: 'Edit an existing investment of a specific client.',
  VIEW_EMPLOYEES: 'List all employee profiles.',
  VIEW_EMPLOYEE: 'View the details of a specific employee profile.',
  VIEW_INVESTMENT: 'View the details of a specific investment.',
  MESSAGE_PARTNER: 'Send a message to your assigned partner.',
  REQUEST_CLIENT_ACCOUNT: 'Request an upgrade to client status with the firm.'
};

/**
 * Kinds that only the ADMIN role receives by default
 * No non-admin role default may contain any of these (checked when the RolePolicy is built)
 */
export const ADMIN_ONLY_PERMISSION_KINDS: ReadonlySet<PermissionKind> = new Set<PermissionKind>([
  'EDIT_USER',
  'DELETE_USER',
  'EDIT_EMPLOYEE',
  'CREATE_EMPLOYEE',
  'UPDATE_OTHER_PASSWORD',
  'VIEW_ACCOUNTS'
]);

/**
 * Type guard for untrusted input (JWT claims, query strings, seed files)
 * @param value - Value to check
 * @returns true if value is one of the catalog kinds
 */
export function isPermissionKind(value: unknown): value is PermissionKind {
  return typeof value === 'string' && (PERMISSION_KINDS as readonly string[]).includes(value);
}

/**
 * Whether a kind belongs to the admin-only subset
 * @param kind - Permission kind to check
 */
export function isAdminOnly(kind: PermissionKind): boolean {
  return ADMIN_ONLY_PERMISSION_KINDS.has(kind);
}

/**
 * Sort kinds by their catalog position
 * Used wherever kinds are returned to clients so output is deterministic
 * @param kinds - Kinds in any order
 * @returns New array in catalog order
 */
export function sortByCatalogOrder(kinds: Iterable<PermissionKind>): PermissionKind[] {
  return Array.from(kinds).sort((a, b) => PERMISSION_KINDS.indexOf(a) - PERMISSION_KINDS.indexOf(b));
}

// Import permission kind type
import type { PermissionKind } from '../iam/permissions/permission-kind';
// Import role enum
import type { Role } from '../iam/roles/role.enum';

/**
 * UserAccountRecord - A user account as loaded from the directory
 */
export interface UserAccountRecord {
  readonly id: number;
  readonly email: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly role: Role;
  /** Additive grants beyond the role defaults */
  readonly customGrants: readonly PermissionKind[];
  /** Inactive accounts cannot act as principals */
  readonly active: boolean;
}

/**
 * ClientRecord - A client profile owned by a user account
 */
export interface ClientRecord {
  readonly id: number;
  readonly userId: number;
  /** Employee profile id, null when the client has no partner yet */
  readonly assignedEmployeeId: number | null;
}

/**
 * EmployeeRecord - An employee profile owned by a user account
 */
export interface EmployeeRecord {
  readonly id: number;
  readonly userId: number;
}

/**
 * InvestmentRecord - An investment held by a client profile
 */
export interface InvestmentRecord {
  readonly id: number;
  readonly clientId: number;
}

/**
 * DirectorySnapshot - Full directory content (seed file shape after validation)
 */
export interface DirectorySnapshot {
  readonly users: readonly UserAccountRecord[];
  readonly clients: readonly ClientRecord[];
  readonly employees: readonly EmployeeRecord[];
  readonly investments: readonly InvestmentRecord[];
}

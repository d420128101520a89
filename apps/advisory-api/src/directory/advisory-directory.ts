// Import directory record types
import type { ClientRecord, EmployeeRecord, InvestmentRecord, UserAccountRecord } from './directory.types';

// DI token for the directory implementation
export const ADVISORY_DIRECTORY = Symbol('ADVISORY_DIRECTORY');

/**
 * AdvisoryDirectory - Read-only lookups of the entities access control needs
 *
 * This is the persistence boundary: implementations may hit a database, the evaluators never do.
 * Every lookup resolves to null on a miss rather than throwing.
 */
export interface AdvisoryDirectory {
  findUser(id: number): Promise<UserAccountRecord | null>;
  findClient(id: number): Promise<ClientRecord | null>;
  /** Client profile owned by a user account */
  findClientByUserId(userId: number): Promise<ClientRecord | null>;
  findEmployee(id: number): Promise<EmployeeRecord | null>;
  /** Employee profile owned by a user account */
  findEmployeeByUserId(userId: number): Promise<EmployeeRecord | null>;
  findInvestment(id: number): Promise<InvestmentRecord | null>;
}

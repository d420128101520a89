// Import directory contract
import type { AdvisoryDirectory } from './advisory-directory';
// Import directory record types
import type {
  ClientRecord,
  DirectorySnapshot,
  EmployeeRecord,
  InvestmentRecord,
  UserAccountRecord
} from './directory.types';

/**
 * Index records by a numeric key
 * Later duplicates win, matching a plain upsert
 */
function indexBy<T>(records: readonly T[], key: (record: T) => number): Map<number, T> {
  const map = new Map<number, T>();
  for (const record of records) map.set(key(record), record);
  return map;
}

/**
 * InMemoryAdvisoryDirectory - Directory backed by a validated snapshot held in memory
 * Used for local runs (seed file) and tests
 */
export class InMemoryAdvisoryDirectory implements AdvisoryDirectory {
  private readonly users: Map<number, UserAccountRecord>;
  private readonly clients: Map<number, ClientRecord>;
  private readonly clientsByUser: Map<number, ClientRecord>;
  private readonly employees: Map<number, EmployeeRecord>;
  private readonly employeesByUser: Map<number, EmployeeRecord>;
  private readonly investments: Map<number, InvestmentRecord>;

  constructor(snapshot: DirectorySnapshot = { users: [], clients: [], employees: [], investments: [] }) {
    this.users = indexBy(snapshot.users, (u) => u.id);
    this.clients = indexBy(snapshot.clients, (c) => c.id);
    this.clientsByUser = indexBy(snapshot.clients, (c) => c.userId);
    this.employees = indexBy(snapshot.employees, (e) => e.id);
    this.employeesByUser = indexBy(snapshot.employees, (e) => e.userId);
    this.investments = indexBy(snapshot.investments, (i) => i.id);
  }

  async findUser(id: number): Promise<UserAccountRecord | null> {
    return this.users.get(id) ?? null;
  }

  async findClient(id: number): Promise<ClientRecord | null> {
    return this.clients.get(id) ?? null;
  }

  async findClientByUserId(userId: number): Promise<ClientRecord | null> {
    return this.clientsByUser.get(userId) ?? null;
  }

  async findEmployee(id: number): Promise<EmployeeRecord | null> {
    return this.employees.get(id) ?? null;
  }

  async findEmployeeByUserId(userId: number): Promise<EmployeeRecord | null> {
    return this.employeesByUser.get(userId) ?? null;
  }

  async findInvestment(id: number): Promise<InvestmentRecord | null> {
    return this.investments.get(id) ?? null;
  }

  /**
   * Counts per collection, logged at startup
   */
  stats(): Record<'users' | 'clients' | 'employees' | 'investments', number> {
    return {
      users: this.users.size,
      clients: this.clients.size,
      employees: this.employees.size,
      investments: this.investments.size
    };
  }
}

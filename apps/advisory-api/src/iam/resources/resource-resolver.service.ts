// Import NestJS decorators
import { Inject, Injectable } from '@nestjs/common';
// Import directory contract and DI token
import { ADVISORY_DIRECTORY, type AdvisoryDirectory } from '../../directory/advisory-directory';
// Import resource reference union and constructors
import {
  clientRef,
  employeeRef,
  investmentRef,
  userAccountRef,
  type ResourceKind,
  type ResourceRef
} from './resource-ref';

/**
 * ResourceResolver - Turns (resource kind, id) into a fully denormalized ResourceRef
 *
 * Reads the *current* relationships (e.g. which employee a client is assigned to) so the
 * evaluator can decide without lookups. A miss resolves to null; callers must treat that as deny.
 */
@Injectable()
export class ResourceResolver {
  constructor(@Inject(ADVISORY_DIRECTORY) private readonly directory: AdvisoryDirectory) {}

  /**
   * Resolve a reference
   * @param kind - Resource kind
   * @param id - Entity id
   * @returns Reference, or null when the entity (or one it depends on) is missing
   */
  async resolve(kind: ResourceKind, id: number): Promise<ResourceRef | null> {
    switch (kind) {
      case 'client': {
        const client = await this.directory.findClient(id);
        return client ? clientRef(client.id, client.userId, client.assignedEmployeeId) : null;
      }
      case 'employee': {
        const employee = await this.directory.findEmployee(id);
        return employee ? employeeRef(employee.id, employee.userId) : null;
      }
      case 'investment': {
        const investment = await this.directory.findInvestment(id);
        if (!investment) return null;
        // Ownership flows through the owning client profile
        const client = await this.directory.findClient(investment.clientId);
        return client ? investmentRef(investment.id, client.userId, client.assignedEmployeeId) : null;
      }
      case 'userAccount': {
        const user = await this.directory.findUser(id);
        return user ? userAccountRef(user.id) : null;
      }
    }
  }
}

import type { DirectorySnapshot } from '../../src/directory/directory.types';
import { Role } from '../../src/iam/roles/role.enum';

/**
 * Small advisory firm:
 * - employees 100 (user 10) and 101 (user 11)
 * - clients 200 (user 30, partner 100), 201 (user 31, partner 101), 202 (user 32, no partner)
 * - investments 300/301 held by client 200, 302 held by client 201
 */
export const directorySnapshot: DirectorySnapshot = {
  users: [
    { id: 1, email: 'admin@advisory.test', firstName: 'Ada', lastName: 'Admin', role: Role.ADMIN, customGrants: [], active: true },
    { id: 10, email: 'erin@advisory.test', firstName: 'Erin', lastName: 'Partner', role: Role.EMPLOYEE, customGrants: [], active: true },
    { id: 11, email: 'sam@advisory.test', firstName: 'Sam', lastName: '', role: Role.EMPLOYEE, customGrants: ['CREATE_CLIENT'], active: true },
    { id: 30, email: 'carla@example.test', firstName: 'Carla', lastName: 'Client', role: Role.CLIENT, customGrants: [], active: true },
    { id: 31, email: 'colin@example.test', firstName: '', lastName: '', role: Role.CLIENT, customGrants: [], active: true },
    { id: 32, email: 'nora@example.test', firstName: 'Nora', lastName: 'New', role: Role.CLIENT, customGrants: [], active: true },
    { id: 40, email: 'gina@example.test', firstName: 'Gina', lastName: 'Guest', role: Role.GUEST, customGrants: ['VIEW_CLIENT'], active: true },
    { id: 41, email: 'former@example.test', firstName: 'Former', lastName: 'Client', role: Role.CLIENT, customGrants: [], active: false }
  ],
  employees: [
    { id: 100, userId: 10 },
    { id: 101, userId: 11 }
  ],
  clients: [
    { id: 200, userId: 30, assignedEmployeeId: 100 },
    { id: 201, userId: 31, assignedEmployeeId: 101 },
    { id: 202, userId: 32, assignedEmployeeId: null }
  ],
  investments: [
    { id: 300, clientId: 200 },
    { id: 301, clientId: 200 },
    { id: 302, clientId: 201 }
  ]
};

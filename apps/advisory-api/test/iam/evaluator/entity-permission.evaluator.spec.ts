import { EntityPermissionEvaluator } from '../../../src/iam/evaluator/entity-permission.evaluator';
import { createPrincipal } from '../../../src/iam/principal/principal';
import {
  clientRef,
  employeeRef,
  investmentRef,
  userAccountRef,
  type ResourceRef
} from '../../../src/iam/resources/resource-ref';
import { Role } from '../../../src/iam/roles/role.enum';
import { RolePolicy } from '../../../src/iam/roles/role-policy';

describe('EntityPermissionEvaluator', () => {
  const evaluator = new EntityPermissionEvaluator(new RolePolicy());

  // Employee profile 100 is partner of client 200 (user 30); employee 101 of client 201 (user 31)
  const employee = createPrincipal({ id: 10, role: Role.EMPLOYEE, employeeProfileId: 100 });
  const client = createPrincipal({ id: 30, role: Role.CLIENT, partnerEmployeeId: 100 });
  const c1 = clientRef(200, 30, 100);
  const c2 = clientRef(201, 31, 101);

  describe('client profiles', () => {
    it('employee sees the assigned client only', () => {
      expect(evaluator.hasPermission(employee, 'VIEW_CLIENT', c1)).toBe(true);
      expect(evaluator.hasPermission(employee, 'EDIT_CLIENT', c1)).toBe(true);
      expect(evaluator.hasPermission(employee, 'VIEW_CLIENT', c2)).toBe(false);
    });

    it('unassigned clients belong to no employee', () => {
      expect(evaluator.hasPermission(employee, 'VIEW_CLIENT', clientRef(202, 32, null))).toBe(false);
    });

    it('an employee without a bound profile matches no client', () => {
      const unbound = createPrincipal({ id: 13, role: Role.EMPLOYEE });
      expect(evaluator.hasPermission(unbound, 'VIEW_CLIENT', clientRef(202, 32, null))).toBe(false);
    });

    it('ownership never substitutes for the base grant', () => {
      // Client owns profile 200 but CLIENT has no VIEW_CLIENT default
      expect(evaluator.hasPermission(client, 'VIEW_CLIENT', c1)).toBe(false);
    });

    it('a custom grant plus ownership allows', () => {
      const granted = createPrincipal({ id: 30, role: Role.CLIENT, customGrants: ['VIEW_CLIENT'] });
      expect(evaluator.hasPermission(granted, 'VIEW_CLIENT', c1)).toBe(true);
      expect(evaluator.hasPermission(granted, 'VIEW_CLIENT', c2)).toBe(false);
    });

    it('the client user may only view their own profile', () => {
      const granted = createPrincipal({
        id: 30,
        role: Role.CLIENT,
        customGrants: ['VIEW_CLIENT', 'EDIT_CLIENT', 'ASSIGN_CLIENT']
      });
      expect(evaluator.hasPermission(granted, 'VIEW_CLIENT', c1)).toBe(true);
      expect(evaluator.hasPermission(granted, 'EDIT_CLIENT', c1)).toBe(false);
      expect(evaluator.hasPermission(granted, 'ASSIGN_CLIENT', c1)).toBe(false);
    });

    it('the assigned employee may assign the client', () => {
      expect(evaluator.hasPermission(employee, 'ASSIGN_CLIENT', c1)).toBe(true);
    });
  });

  describe('investments', () => {
    it('client sees own investments only', () => {
      expect(evaluator.hasPermission(client, 'VIEW_INVESTMENT', investmentRef(300, 30, 100))).toBe(true);
      expect(evaluator.hasPermission(client, 'VIEW_INVESTMENT', investmentRef(302, 31, 101))).toBe(false);
    });

    it('assigned employee may edit the client investment', () => {
      expect(evaluator.hasPermission(employee, 'EDIT_INVESTMENT', investmentRef(301, 30, 100))).toBe(true);
      expect(evaluator.hasPermission(employee, 'EDIT_INVESTMENT', investmentRef(302, 31, 101))).toBe(false);
      expect(evaluator.hasPermission(employee, 'EDIT_INVESTMENT', investmentRef(303, 32))).toBe(false);
    });

    it('client cannot edit an owned investment without the grant', () => {
      expect(evaluator.hasPermission(client, 'EDIT_INVESTMENT', investmentRef(300, 30, 100))).toBe(false);
    });
  });

  describe('user accounts', () => {
    it('self only', () => {
      expect(evaluator.hasPermission(client, 'EDIT_MY_DETAILS', userAccountRef(30))).toBe(true);
      expect(evaluator.hasPermission(client, 'EDIT_MY_DETAILS', userAccountRef(31))).toBe(false);
      expect(evaluator.hasPermission(client, 'UPDATE_MY_PASSWORD', userAccountRef(30))).toBe(true);
    });

    it('only the self-service kinds apply to the own account', () => {
      expect(evaluator.hasPermission(client, 'CREATE_USER', userAccountRef(30))).toBe(false);
      expect(evaluator.hasPermission(client, 'VIEW_ACCOUNT', userAccountRef(30))).toBe(false);
    });

    it.each(['DELETE_USER', 'UPDATE_OTHER_PASSWORD', 'EDIT_USER'] as const)(
      'a client granted %s is still denied on their own account',
      (kind) => {
        const granted = createPrincipal({ id: 30, role: Role.CLIENT, customGrants: [kind] });
        expect(evaluator.hasPermission(granted, kind, userAccountRef(30))).toBe(false);
        expect(evaluator.hasPermission(granted, kind, userAccountRef(31))).toBe(false);
      }
    );

    it('an employee granted VIEW_ACCOUNTS is denied on any account', () => {
      const granted = createPrincipal({
        id: 10,
        role: Role.EMPLOYEE,
        employeeProfileId: 100,
        customGrants: ['VIEW_ACCOUNTS']
      });
      expect(evaluator.hasPermission(granted, 'VIEW_ACCOUNTS', userAccountRef(10))).toBe(false);
    });
  });

  describe('employee profiles', () => {
    it('deny every kind but MESSAGE_PARTNER, even the own profile', () => {
      expect(evaluator.hasPermission(employee, 'VIEW_EMPLOYEE', employeeRef(100, 10))).toBe(false);
      expect(evaluator.hasPermission(employee, 'VIEW_EMPLOYEE', employeeRef(101, 11))).toBe(false);
    });

    it('an employee granted EDIT_EMPLOYEE cannot edit their own profile', () => {
      const granted = createPrincipal({
        id: 10,
        role: Role.EMPLOYEE,
        employeeProfileId: 100,
        customGrants: ['EDIT_EMPLOYEE']
      });
      expect(evaluator.hasPermission(granted, 'EDIT_EMPLOYEE', employeeRef(100, 10))).toBe(false);
    });
  });

  describe('MESSAGE_PARTNER', () => {
    it('client may message the known assigned partner', () => {
      expect(evaluator.hasPermission(client, 'MESSAGE_PARTNER', employeeRef(100, 10))).toBe(true);
    });

    it('denies a different employee', () => {
      expect(evaluator.hasPermission(client, 'MESSAGE_PARTNER', employeeRef(101, 11))).toBe(false);
    });

    it('denies when the partner is unknown', () => {
      const unknown = createPrincipal({ id: 32, role: Role.CLIENT });
      expect(evaluator.hasPermission(unknown, 'MESSAGE_PARTNER', employeeRef(100, 10))).toBe(false);
    });

    it('denies targets that are not an employee or client', () => {
      expect(evaluator.hasPermission(client, 'MESSAGE_PARTNER', userAccountRef(10))).toBe(false);
      expect(evaluator.hasPermission(client, 'MESSAGE_PARTNER', investmentRef(300, 30, 100))).toBe(false);
    });

    it('employee needs the grant and the assignment', () => {
      expect(evaluator.hasPermission(employee, 'MESSAGE_PARTNER', c1)).toBe(false);
      const messaging = createPrincipal({
        id: 10,
        role: Role.EMPLOYEE,
        employeeProfileId: 100,
        customGrants: ['MESSAGE_PARTNER']
      });
      expect(evaluator.hasPermission(messaging, 'MESSAGE_PARTNER', c1)).toBe(true);
      expect(evaluator.hasPermission(messaging, 'MESSAGE_PARTNER', c2)).toBe(false);
    });
  });

  describe('fail closed', () => {
    it('guest with a VIEW_CLIENT grant is denied any resource', () => {
      const guest = createPrincipal({ id: 40, role: Role.GUEST, customGrants: ['VIEW_CLIENT'] });
      expect(evaluator.hasPermission(guest, 'VIEW_CLIENT', clientRef(200, 40, null))).toBe(false);
      expect(evaluator.hasPermission(guest, 'EDIT_MY_DETAILS', userAccountRef(40))).toBe(false);
    });

    it('unknown resource kinds deny', () => {
      const portfolio = { kind: 'portfolio', id: 1 } as unknown as ResourceRef;
      expect(evaluator.hasPermission(client, 'VIEW_INVESTMENT', portfolio)).toBe(false);
    });

    it('absent resource denies here', () => {
      expect(evaluator.hasPermission(client, 'VIEW_INVESTMENT')).toBe(false);
      expect(evaluator.hasPermission(client, 'VIEW_INVESTMENT', null)).toBe(false);
    });

    it('ADMIN is allowed regardless of ownership', () => {
      const admin = createPrincipal({ id: 1, role: Role.ADMIN });
      expect(evaluator.hasPermission(admin, 'DELETE_USER', userAccountRef(31))).toBe(true);
    });

    it('an unknown role denies', () => {
      const odd = createPrincipal({ id: 30, role: 'OWNER' as unknown as Role });
      expect(evaluator.hasPermission(odd, 'EDIT_MY_DETAILS', userAccountRef(30))).toBe(false);
    });
  });
});

import { ROLES, Role, isRole } from '../../../src/iam/roles/role.enum';

describe('Role', () => {
  it('lists roles lowest privilege first', () => {
    expect(ROLES).toEqual([Role.GUEST, Role.CLIENT, Role.EMPLOYEE, Role.ADMIN]);
  });

  it('isRole validates untrusted names', () => {
    expect(isRole('EMPLOYEE')).toBe(true);
    expect(isRole('employee')).toBe(false);
    expect(isRole(null)).toBe(false);
  });
});

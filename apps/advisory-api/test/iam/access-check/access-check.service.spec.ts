import { ForbiddenException } from '@nestjs/common';
import { InMemoryAdvisoryDirectory } from '../../../src/directory/in-memory-directory';
import { AccessCheckService } from '../../../src/iam/access-check/access-check.service';
import { EntityPermissionEvaluator } from '../../../src/iam/evaluator/entity-permission.evaluator';
import { UserPermissionEvaluator } from '../../../src/iam/evaluator/user-permission.evaluator';
import { PrincipalService } from '../../../src/iam/principal/principal.service';
import { ResourceResolver } from '../../../src/iam/resources/resource-resolver.service';
import { RolePolicy } from '../../../src/iam/roles/role-policy';
import { directorySnapshot } from '../../fixtures/directory.fixture';

describe('AccessCheckService', () => {
  const directory = new InMemoryAdvisoryDirectory(directorySnapshot);
  const policy = new RolePolicy();
  const service = new AccessCheckService(
    new PrincipalService(directory),
    new ResourceResolver(directory),
    new UserPermissionEvaluator(policy, new EntityPermissionEvaluator(policy))
  );

  it('allows the assigned employee to view the client', async () => {
    await expect(service.check(10, 'VIEW_CLIENT', 'client', 200)).resolves.toEqual({
      permission: 'VIEW_CLIENT',
      resourceType: 'client',
      resourceId: 200,
      allowed: true
    });
  });

  it('denies another employee client', async () => {
    const result = await service.check(10, 'VIEW_CLIENT', 'client', 201);
    expect(result.allowed).toBe(false);
  });

  it('checks investments through the owning client', async () => {
    expect((await service.check(30, 'VIEW_INVESTMENT', 'investment', 301)).allowed).toBe(true);
    expect((await service.check(30, 'VIEW_INVESTMENT', 'investment', 302)).allowed).toBe(false);
    expect((await service.check(11, 'EDIT_INVESTMENT', 'investment', 302)).allowed).toBe(true);
  });

  it('lets a client message the current partner only', async () => {
    expect((await service.check(30, 'MESSAGE_PARTNER', 'employee', 100)).allowed).toBe(true);
    expect((await service.check(30, 'MESSAGE_PARTNER', 'employee', 101)).allowed).toBe(false);
    expect((await service.check(32, 'MESSAGE_PARTNER', 'employee', 100)).allowed).toBe(false);
  });

  it('limits own-account checks to the self-service kinds', async () => {
    expect((await service.check(30, 'EDIT_MY_DETAILS', 'userAccount', 30)).allowed).toBe(true);
    expect((await service.check(30, 'CREATE_USER', 'userAccount', 30)).allowed).toBe(false);
  });

  it('denies an employee viewing their own employee profile', async () => {
    expect((await service.check(10, 'VIEW_EMPLOYEE', 'employee', 100)).allowed).toBe(false);
  });

  it('answers false for a missing entity, even for ADMIN', async () => {
    const result = await service.check(1, 'VIEW_CLIENT', 'client', 999);
    expect(result).toEqual({ permission: 'VIEW_CLIENT', resourceType: 'client', resourceId: 999, allowed: false });
  });

  it('denies a guest holding a VIEW_CLIENT grant', async () => {
    expect((await service.check(40, 'VIEW_CLIENT', 'client', 202)).allowed).toBe(false);
  });

  it('403 when the caller has no active account', async () => {
    await expect(service.check(41, 'VIEW_ACCOUNT', 'userAccount', 41)).rejects.toBeInstanceOf(ForbiddenException);
  });
});

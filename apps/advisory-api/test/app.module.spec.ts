import { ConfigModule } from '@nestjs/config';
import { Test, type TestingModule } from '@nestjs/testing';
import { join } from 'node:path';
import { AuthModule } from '../src/auth/auth.module';
import { JwtAuthGuard } from '../src/auth/jwt-auth.guard';
import { validateEnv } from '../src/config/env.validation';
import { ADVISORY_DIRECTORY, type AdvisoryDirectory } from '../src/directory/advisory-directory';
import { DirectoryModule } from '../src/directory/directory.module';
import { HealthController } from '../src/health/health.controller';
import { HealthModule } from '../src/health/health.module';
import { AccessCheckService } from '../src/iam/access-check/access-check.service';
import { AccessContextService } from '../src/iam/access-context/access-context.service';
import { UserPermissionEvaluator } from '../src/iam/evaluator/user-permission.evaluator';
import { IamModule } from '../src/iam/iam.module';
import { RbacGuard } from '../src/iam/rbac/rbac.guard';

// The sample seed shipped with the service
const SEED_PATH = join(__dirname, '..', 'data', 'directory.seed.json');

describe('module wiring', () => {
  let moduleRef: TestingModule;

  beforeAll(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          validate: () => validateEnv({ JWT_SECRET: 'test-secret-0123456789', DIRECTORY_SEED_PATH: SEED_PATH })
        }),
        AuthModule,
        DirectoryModule,
        IamModule,
        HealthModule
      ]
    }).compile();
  });

  afterAll(async () => {
    await moduleRef.close();
  });

  it('resolves guards and services', () => {
    expect(moduleRef.get(JwtAuthGuard)).toBeInstanceOf(JwtAuthGuard);
    expect(moduleRef.get(RbacGuard)).toBeInstanceOf(RbacGuard);
    expect(moduleRef.get(UserPermissionEvaluator)).toBeInstanceOf(UserPermissionEvaluator);
  });

  it('loads the seed into the directory', async () => {
    const directory = moduleRef.get<AdvisoryDirectory>(ADVISORY_DIRECTORY);
    await expect(directory.findClient(200)).resolves.toEqual({ id: 200, userId: 30, assignedEmployeeId: 100 });
  });

  it('answers access checks against the seed', async () => {
    const accessCheck = moduleRef.get(AccessCheckService);
    expect((await accessCheck.check(10, 'VIEW_CLIENT', 'client', 200)).allowed).toBe(true);
    expect((await accessCheck.check(10, 'VIEW_CLIENT', 'client', 201)).allowed).toBe(false);
  });

  it('builds the access context of a seeded user', async () => {
    const context = await moduleRef.get(AccessContextService).getMe({ userId: 40, email: '', claims: { sub: '40' } });
    expect(context.user).toEqual({ id: 40, email: 'gina@example.test', name: 'Gina Guest', role: 'GUEST' });
    expect(context.permissions).toEqual([
      'VIEW_ACCOUNT',
      'EDIT_MY_DETAILS',
      'UPDATE_MY_PASSWORD',
      'CREATE_USER',
      'REQUEST_CLIENT_ACCOUNT'
    ]);
  });

  it('reports health', () => {
    expect(moduleRef.get(HealthController).health()).toEqual({
      status: 'ok',
      service: 'advisory-api',
      timestamp: expect.any(String)
    });
  });
});

import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { AccessCheckParamsDto, AccessCheckQueryDto } from '../../../src/iam/access-check/dto/access-check.dto';

function errorProperties(errors: { property: string }[]): string[] {
  return errors.map((e) => e.property);
}

describe('access check DTOs', () => {
  it('converts the path id to a number', () => {
    const params = plainToInstance(AccessCheckParamsDto, { resourceType: 'investment', resourceId: '302' });
    expect(validateSync(params)).toEqual([]);
    expect(params.resourceId).toBe(302);
  });

  it('rejects unknown resource types and non-positive ids', () => {
    expect(errorProperties(validateSync(plainToInstance(AccessCheckParamsDto, { resourceType: 'portfolio', resourceId: '1' })))).toEqual([
      'resourceType'
    ]);
    expect(errorProperties(validateSync(plainToInstance(AccessCheckParamsDto, { resourceType: 'client', resourceId: 'abc' })))).toEqual([
      'resourceId'
    ]);
    expect(errorProperties(validateSync(plainToInstance(AccessCheckParamsDto, { resourceType: 'client', resourceId: '0' })))).toEqual([
      'resourceId'
    ]);
  });

  it('accepts catalog kinds only', () => {
    expect(validateSync(plainToInstance(AccessCheckQueryDto, { permission: 'MESSAGE_PARTNER' }))).toEqual([]);
    expect(errorProperties(validateSync(plainToInstance(AccessCheckQueryDto, { permission: 'view_client' })))).toEqual([
      'permission'
    ]);
    expect(errorProperties(validateSync(plainToInstance(AccessCheckQueryDto, {})))).toEqual(['permission']);
  });
});

import { rpcError } from '../../../test/rpc-error';
import { loadDepartmentDirectory, parseDepartmentDirectory } from './departments.config';
import { DepartmentsService } from './departments.service';

describe('DepartmentsService', () => {
  const service = new DepartmentsService(
    parseDepartmentDirectory({ Dairy: 'dairy.buyer', kitchen: 'chef.marsh', bar: 'bar.lead' }),
  );

  it('resolves the reviewer of a department', () => {
    expect(service.resolve('dairy')).toEqual({ department: 'dairy', reviewer: 'dairy.buyer' });
  });

  it('matches department names ignoring case and surrounding spaces', () => {
    expect(service.resolve('  KITCHEN ')).toEqual({ department: 'kitchen', reviewer: 'chef.marsh' });
  });

  it('rejects an unknown department, listing the valid ones', async () => {
    const error = await rpcError(Promise.resolve().then(() => service.resolve('seafood')));

    expect(error).toEqual({
      status: 400,
      message: 'Unknown department "seafood". Valid departments: bar, dairy, kitchen',
    });
  });

  it('lists the directory sorted by department', () => {
    expect(service.list()).toEqual([
      { department: 'bar', reviewer: 'bar.lead' },
      { department: 'dairy', reviewer: 'dairy.buyer' },
      { department: 'kitchen', reviewer: 'chef.marsh' },
    ]);
  });
});

describe('department directory', () => {
  it('rejects an empty directory', () => {
    expect(() => parseDepartmentDirectory({})).toThrow(/^Department directory validation error/);
  });

  it('rejects blank reviewers', () => {
    expect(() => parseDepartmentDirectory({ bar: '  ' })).toThrow(/^Department directory validation error/);
  });

  it('loads the shipped configuration file', () => {
    const directory = loadDepartmentDirectory('config/departments.json');

    expect(directory['dairy']).toBe('dairy.buyer');
  });
});

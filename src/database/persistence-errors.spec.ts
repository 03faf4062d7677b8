import { QueryFailedError } from 'typeorm';
import { classifyViolation, uniqueFieldFrom } from './persistence-errors';

function driverFailure(fields: { code: string; message: string; detail?: string }) {
  return new QueryFailedError('INSERT ...', [], Object.assign(new Error(fields.message), fields));
}

describe('uniqueFieldFrom', () => {
  test('postgres detail', () => {
    expect(uniqueFieldFrom('Key (email)=(a@example.com) already exists.')).toBe('email');
  });

  test('sqlite message', () => {
    expect(uniqueFieldFrom('UNIQUE constraint failed: currencies.code')).toBe('code');
  });

  test('unrecognised text', () => {
    expect(uniqueFieldFrom('something else')).toBe('unknown');
  });
});

describe('classifyViolation', () => {
  test('postgres unique violation names the column', () => {
    const error = driverFailure({
      code: '23505',
      message: 'duplicate key value violates unique constraint "UQ_users_email"',
      detail: 'Key (email)=(a@example.com) already exists.',
    });

    expect(classifyViolation(error)).toEqual({ kind: 'unique', field: 'email' });
  });

  test('postgres foreign key and check violations', () => {
    expect(classifyViolation(driverFailure({ code: '23503', message: 'fk' }))).toEqual({ kind: 'foreign_key' });
    expect(classifyViolation(driverFailure({ code: '23514', message: 'check' }))).toEqual({ kind: 'check' });
  });

  test('postgres not-null and numeric overflow are reported as check violations', () => {
    expect(classifyViolation(driverFailure({ code: '23502', message: 'null value in column "name"' }))).toEqual({
      kind: 'check',
    });
    expect(
      classifyViolation(driverFailure({ code: '22003', message: 'numeric field overflow' })),
    ).toEqual({ kind: 'check' });
  });

  test('sqlite constraint codes', () => {
    expect(
      classifyViolation(
        driverFailure({ code: 'SQLITE_CONSTRAINT_UNIQUE', message: 'UNIQUE constraint failed: categories.name' }),
      ),
    ).toEqual({ kind: 'unique', field: 'name' });
    expect(
      classifyViolation(driverFailure({ code: 'SQLITE_CONSTRAINT_FOREIGNKEY', message: 'FOREIGN KEY constraint failed' })),
    ).toEqual({ kind: 'foreign_key' });
    expect(
      classifyViolation(driverFailure({ code: 'SQLITE_CONSTRAINT_NOTNULL', message: 'NOT NULL constraint failed: goals.name' })),
    ).toEqual({ kind: 'check' });
  });

  test('anything else is not a violation', () => {
    expect(classifyViolation(new Error('connection reset'))).toEqual({ kind: 'none' });
    expect(classifyViolation(driverFailure({ code: '40001', message: 'serialization failure' }))).toEqual({
      kind: 'none',
    });
  });
});

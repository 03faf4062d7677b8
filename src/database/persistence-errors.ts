import { QueryFailedError } from 'typeorm';

export type ConstraintViolation =
  | { kind: 'unique'; field: string }
  | { kind: 'foreign_key' }
  | { kind: 'check' }
  | { kind: 'none' };

type DriverErrorFields = { code?: unknown; detail?: unknown; message?: unknown };

// PostgreSQL SQLSTATE codes
const PG_UNIQUE_VIOLATION = '23505';
const PG_FOREIGN_KEY_VIOLATION = '23503';
const PG_CHECK_VIOLATION = '23514';
const PG_NOT_NULL_VIOLATION = '23502';
const PG_NUMERIC_VALUE_OUT_OF_RANGE = '22003';

function driverFields(error: QueryFailedError): DriverErrorFields {
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) return {};
  return {
    code: Reflect.get(driverError, 'code'),
    detail: Reflect.get(driverError, 'detail'),
    message: Reflect.get(driverError, 'message'),
  };
}

/**
 * Column named by a unique violation.
 * postgres: `Key (code)=(USD) already exists.`
 * sqlite:   `UNIQUE constraint failed: currencies.code`
 */
export function uniqueFieldFrom(text: string): string {
  const pg = /Key \(([^)]+)\)=/.exec(text);
  if (pg) return pg[1];
  const sqlite = /UNIQUE constraint failed: ([\w.]+)/.exec(text);
  if (sqlite) return sqlite[1].split('.').pop() ?? sqlite[1];
  return 'unknown';
}

/** Maps a thrown persistence error onto the constraint it violated, if any. */
export function classifyViolation(error: unknown): ConstraintViolation {
  if (!(error instanceof QueryFailedError)) return { kind: 'none' };

  const { code, detail, message } = driverFields(error);
  const text = [detail, message].filter((v): v is string => typeof v === 'string').join(' ');

  switch (code) {
    case PG_UNIQUE_VIOLATION:
    case 'SQLITE_CONSTRAINT_UNIQUE':
    case 'SQLITE_CONSTRAINT_PRIMARYKEY':
      return { kind: 'unique', field: uniqueFieldFrom(text) };
    case PG_FOREIGN_KEY_VIOLATION:
    case 'SQLITE_CONSTRAINT_FOREIGNKEY':
      return { kind: 'foreign_key' };
    // rejected column values are reported together with CHECK failures
    case PG_CHECK_VIOLATION:
    case PG_NOT_NULL_VIOLATION:
    case PG_NUMERIC_VALUE_OUT_OF_RANGE:
    case 'SQLITE_CONSTRAINT_CHECK':
    case 'SQLITE_CONSTRAINT_NOTNULL':
      return { kind: 'check' };
    default:
      return { kind: 'none' };
  }
}

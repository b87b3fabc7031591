import postgres from 'postgres';
import { ConflictError, ConstraintViolationError, ContentionError } from '../errors.js';

const UNIQUE_VIOLATION = '23505';
const SERIALIZATION_FAILURE = '40001';
const DEADLOCK_DETECTED = '40P01';

export const USER_EMAIL_CONSTRAINT = 'uq_users_email';

/** drizzle wraps driver errors, so the PostgresError may sit on the cause chain. */
export function findPostgresError(error: unknown): postgres.PostgresError | undefined {
  if (error instanceof postgres.PostgresError) return error;
  if (error instanceof Error && error.cause !== undefined) return findPostgresError(error.cause);
  return undefined;
}

export function translateError(error: unknown): unknown {
  const pgError = findPostgresError(error);
  if (!pgError) return error;

  switch (pgError.code) {
    case UNIQUE_VIOLATION:
      if (pgError.constraint_name === USER_EMAIL_CONSTRAINT) {
        return new ConflictError('A user with this email already exists', { cause: error });
      }
      return new ConstraintViolationError(pgError.table_name ?? 'unknown', pgError.detail ?? pgError.message, {
        cause: error
      });
    case DEADLOCK_DETECTED:
    case SERIALIZATION_FAILURE:
      return new ContentionError({ cause: error });
    default:
      return error;
  }
}

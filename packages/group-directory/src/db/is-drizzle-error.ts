interface DatabaseErrorLike {
  code: string;
  constraint?: string;
}

const UNIQUE_VIOLATION = '23505';

const isDatabaseErrorLike = (value: unknown): value is DatabaseErrorLike =>
  typeof value === 'object' &&
  value !== null &&
  'code' in value &&
  typeof value.code === 'string';

/**
 * Finds the driver error behind a drizzle failure. Drizzle wraps driver errors
 * in a `DrizzleQueryError` whose `cause` is the `pg` (or PGlite) error carrying
 * the SQLSTATE code.
 */
export const findDatabaseError = (error: unknown): DatabaseErrorLike | undefined => {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current !== undefined; depth++) {
    if (isDatabaseErrorLike(current)) {
      return current;
    }
    current = current instanceof Error ? current.cause : undefined;
  }
  return undefined;
};

export const isUniqueViolation = (error: unknown, constraint: string): boolean => {
  const databaseError = findDatabaseError(error);
  if (databaseError?.code !== UNIQUE_VIOLATION) {
    return false;
  }
  return databaseError.constraint === constraint;
};

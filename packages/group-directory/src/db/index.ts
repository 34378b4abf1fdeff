export type { DrizzleDatabase, DrizzleExecutor, GroupDirectorySchema } from './drizzle.types';
export { findDatabaseError, isUniqueViolation } from './is-drizzle-error';
export * from './schema';

import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type * as schema from './schema';

export type GroupDirectorySchema = typeof schema;

export type DrizzleDatabase = NodePgDatabase<GroupDirectorySchema>;

/**
 * Anything the group directory can run its statements on: a node-postgres
 * database, a read replica, or a transaction handed in by the caller.
 */
export type DrizzleExecutor = PgDatabase<PgQueryResultHKT, GroupDirectorySchema>;

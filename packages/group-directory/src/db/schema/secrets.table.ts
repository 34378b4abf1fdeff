import { bigint, pgTable, varchar } from 'drizzle-orm/pg-core';

// Owned by the secret store; modelled here only as the target of access grants.
export const secrets = pgTable('secrets', {
  id: bigint('id', { mode: 'number' }).primaryKey().generatedAlwaysAsIdentity(),
  name: varchar('name').notNull().unique(),
});

export type SecretRow = typeof secrets.$inferSelect;

import { bigint, pgTable, primaryKey, varchar } from 'drizzle-orm/pg-core';
import { groups } from './groups.table';

export const memberships = pgTable(
  'memberships',
  {
    groupId: bigint('group_id', { mode: 'number' })
      .notNull()
      .references(() => groups.id),
    principalId: varchar('principal_id').notNull(),
  },
  (t) => [primaryKey({ columns: [t.groupId, t.principalId] })],
);

export type MembershipRow = typeof memberships.$inferSelect;

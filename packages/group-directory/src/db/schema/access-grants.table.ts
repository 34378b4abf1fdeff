import { bigint, pgTable, primaryKey } from 'drizzle-orm/pg-core';
import { groups } from './groups.table';
import { secrets } from './secrets.table';

export const accessGrants = pgTable(
  'access_grants',
  {
    // No cascade: removing a group's grants is the deleter's job.
    groupId: bigint('group_id', { mode: 'number' })
      .notNull()
      .references(() => groups.id),
    secretId: bigint('secret_id', { mode: 'number' })
      .notNull()
      .references(() => secrets.id),
  },
  (t) => [primaryKey({ columns: [t.groupId, t.secretId] })],
);

export type AccessGrantRow = typeof accessGrants.$inferSelect;

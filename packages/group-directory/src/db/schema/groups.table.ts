import { bigint, pgTable, text, varchar } from 'drizzle-orm/pg-core';

export const GROUPS_NAME_UNIQUE_CONSTRAINT = 'groups_name_unique';

export const groups = pgTable('groups', {
  id: bigint('id', { mode: 'number' }).primaryKey().generatedAlwaysAsIdentity(),
  name: varchar('name').notNull().unique(GROUPS_NAME_UNIQUE_CONSTRAINT),
  description: text('description').notNull().default(''),
  createdBy: varchar('created_by').notNull(),
  updatedBy: varchar('updated_by').notNull(),
  // Epoch seconds
  createdAt: bigint('created_at', { mode: 'number' }).notNull(),
  updatedAt: bigint('updated_at', { mode: 'number' }).notNull(),
  // JSON object of string values, see group-metadata.codec.ts
  metadata: text('metadata').notNull().default('{}'),
});

export type GroupRow = typeof groups.$inferSelect;
export type NewGroupRow = typeof groups.$inferInsert;

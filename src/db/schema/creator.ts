import { pgTable, bigserial, varchar, text, timestamp, uniqueIndex } from 'drizzle-orm/pg-core';

// Creators table: the top level of the on-disk hierarchy (one directory per creator).
// Rows are created lazily the first time a creator directory is seen and are never updated.
export const creators = pgTable(
  'creators',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    // Lookup key for get-or-create; matched case-sensitively
    name: varchar('name').notNull(),
    createdAt: timestamp('created_at', { precision: 6 }).notNull(),
    updatedAt: timestamp('updated_at', { precision: 6 }).notNull(),
    notes: text('notes'),
    caption: text('caption'),
    slug: varchar('slug'),
  },
  (table) => [
    uniqueIndex('index_creators_on_name').on(table.name),
    uniqueIndex('index_creators_on_slug').on(table.slug),
  ],
);

export type Creator = typeof creators.$inferSelect;
export type NewCreator = typeof creators.$inferInsert;

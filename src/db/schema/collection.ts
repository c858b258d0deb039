import {
  pgTable,
  bigserial,
  bigint,
  varchar,
  text,
  timestamp,
  index,
  uniqueIndex,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core';

// Collections table: second level of the hierarchy.
// The self-referential collection_id supports nesting in the catalog application;
// the importer always writes top-level collections (collection_id = NULL).
export const collections = pgTable(
  'collections',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    name: varchar('name'),
    notes: text('notes'),
    caption: text('caption'),
    createdAt: timestamp('created_at', { precision: 6 }).notNull(),
    updatedAt: timestamp('updated_at', { precision: 6 }).notNull(),
    collectionId: bigint('collection_id', { mode: 'number' }).references(
      (): AnyPgColumn => collections.id,
    ),
    slug: varchar('slug'),
  },
  (table) => [
    index('index_collections_on_collection_id').on(table.collectionId),
    // Name is unique across the whole table, not per parent
    uniqueIndex('index_collections_on_name').on(table.name),
    uniqueIndex('index_collections_on_slug').on(table.slug),
  ],
);

export type Collection = typeof collections.$inferSelect;
export type NewCollection = typeof collections.$inferInsert;

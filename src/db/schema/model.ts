import { pgTable, bigserial, bigint, integer, varchar, text, timestamp } from 'drizzle-orm/pg-core';
import { creators } from './creator.js';
import { collections } from './collection.js';

// Models table: one row per model directory found under creator/collection.
// Re-running an import inserts new rows; there is no lookup on models.
export const models = pgTable('models', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  // Directory name with the variant suffix stripped (e.g. "Dragon" for "Dragon-1234")
  name: varchar('name').notNull(),
  // Relative to the scanned root, '/'-separated. Never absolute.
  path: varchar('path').notNull(),
  libraryId: integer('library_id').notNull(),
  createdAt: timestamp('created_at', { precision: 6 }).notNull(),
  updatedAt: timestamp('updated_at', { precision: 6 }).notNull(),
  // Maintained by the catalog application, not by the importer.
  previewFileId: integer('preview_file_id'),
  creatorId: bigint('creator_id', { mode: 'number' }).references(() => creators.id),
  notes: text('notes'),
  caption: text('caption'),
  collectionId: bigint('collection_id', { mode: 'number' }).references(() => collections.id),
  slug: varchar('slug'),
  license: varchar('license'),
});

export type Model = typeof models.$inferSelect;
export type NewModel = typeof models.$inferInsert;

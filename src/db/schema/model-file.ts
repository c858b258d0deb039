import {
  pgTable,
  bigserial,
  bigint,
  varchar,
  text,
  boolean,
  timestamp,
  index,
  uniqueIndex,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core';
import { models } from './model.js';

// ModelFiles table: every regular file found at any depth inside a model directory.
// Files with identical content get identical digests but still one row each.
export const modelFiles = pgTable(
  'model_files',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    // Path relative to the model directory; equals the bare filename for top-level files
    filename: varchar('filename'),
    modelId: bigint('model_id', { mode: 'number' })
      .notNull()
      .references(() => models.id),
    createdAt: timestamp('created_at', { precision: 6 }).notNull(),
    updatedAt: timestamp('updated_at', { precision: 6 }).notNull(),
    presupported: boolean('presupported').notNull().default(false),
    yUp: boolean('y_up').notNull().default(false),
    // SHA-512, lowercase hex
    digest: varchar('digest'),
    notes: text('notes'),
    caption: text('caption'),
    size: bigint('size', { mode: 'number' }),
    presupportedVersionId: bigint('presupported_version_id', { mode: 'number' }).references(
      (): AnyPgColumn => modelFiles.id,
    ),
  },
  (table) => [
    index('index_model_files_on_digest').on(table.digest),
    uniqueIndex('index_model_files_on_filename_and_model_id').on(table.filename, table.modelId),
    index('index_model_files_on_model_id').on(table.modelId),
    index('index_model_files_on_presupported_version_id').on(table.presupportedVersionId),
  ],
);

export type ModelFile = typeof modelFiles.$inferSelect;
export type NewModelFile = typeof modelFiles.$inferInsert;

import type { EntityName, EntityRows, NewEntityRows } from './session.js';

type RowBuilders = {
  [E in EntityName]: (values: NewEntityRows[E], id: number) => EntityRows[E];
};

// Fill in the column defaults the database would apply, for sessions that
// never reach PostgreSQL.
const builders: RowBuilders = {
  creator: (values, id) => ({
    id: values.id ?? id,
    name: values.name,
    createdAt: values.createdAt,
    updatedAt: values.updatedAt,
    notes: values.notes ?? null,
    caption: values.caption ?? null,
    slug: values.slug ?? null,
  }),
  collection: (values, id) => ({
    id: values.id ?? id,
    name: values.name ?? null,
    notes: values.notes ?? null,
    caption: values.caption ?? null,
    createdAt: values.createdAt,
    updatedAt: values.updatedAt,
    collectionId: values.collectionId ?? null,
    slug: values.slug ?? null,
  }),
  model: (values, id) => ({
    id: values.id ?? id,
    name: values.name,
    path: values.path,
    libraryId: values.libraryId,
    createdAt: values.createdAt,
    updatedAt: values.updatedAt,
    previewFileId: values.previewFileId ?? null,
    creatorId: values.creatorId ?? null,
    notes: values.notes ?? null,
    caption: values.caption ?? null,
    collectionId: values.collectionId ?? null,
    slug: values.slug ?? null,
    license: values.license ?? null,
  }),
  modelFile: (values, id) => ({
    id: values.id ?? id,
    filename: values.filename ?? null,
    modelId: values.modelId,
    createdAt: values.createdAt,
    updatedAt: values.updatedAt,
    presupported: values.presupported ?? false,
    yUp: values.yUp ?? false,
    digest: values.digest ?? null,
    notes: values.notes ?? null,
    caption: values.caption ?? null,
    size: values.size ?? null,
    presupportedVersionId: values.presupportedVersionId ?? null,
  }),
};

export function buildRow<E extends EntityName>(
  entity: E,
  values: NewEntityRows[E],
  id: number,
): EntityRows[E] {
  const build = builders[entity];
  return build(values, id);
}

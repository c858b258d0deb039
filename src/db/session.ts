import type {
  Collection,
  Creator,
  Model,
  ModelFile,
  NewCollection,
  NewCreator,
  NewModel,
  NewModelFile,
} from './schema/index.js';
import { internalError } from '../utils/errors.js';

export interface EntityRows {
  creator: Creator;
  collection: Collection;
  model: Model;
  modelFile: ModelFile;
}

export interface NewEntityRows {
  creator: NewCreator;
  collection: NewCollection;
  model: NewModel;
  modelFile: NewModelFile;
}

export type EntityName = keyof EntityRows;

/** Exact-match column criteria; a null value matches a NULL column. */
export type Criteria<E extends EntityName> = Partial<EntityRows[E]>;

/**
 * A row staged with `add()`. Its stored form (with the database id) becomes
 * available once the session commits.
 */
export class PendingRow<E extends EntityName> {
  private stored: EntityRows[E] | undefined;

  constructor(
    readonly entity: E,
    readonly values: NewEntityRows[E],
  ) {}

  get committed(): boolean {
    return this.stored !== undefined;
  }

  get row(): EntityRows[E] {
    if (this.stored === undefined) {
      throw internalError(`Staged ${this.entity} row was read before commit`);
    }
    return this.stored;
  }

  resolve(row: EntityRows[E]): void {
    this.stored = row;
  }
}

export interface EntityQuery<E extends EntityName> {
  filterBy(criteria: Criteria<E>): EntityQuery<E>;
  first(): Promise<EntityRows[E] | undefined>;
}

/**
 * Persistence handle passed explicitly through the import. Implemented
 * against PostgreSQL and as a logging stand-in for dry runs.
 */
export interface CatalogSession {
  add<E extends EntityName>(entity: E, values: NewEntityRows[E]): PendingRow<E>;
  commit(): Promise<void>;
  query<E extends EntityName>(entity: E): EntityQuery<E>;
  close(): Promise<void>;
}

/** Stage a single row and commit it straight away. */
export async function persist<E extends EntityName>(
  session: CatalogSession,
  entity: E,
  values: NewEntityRows[E],
): Promise<EntityRows[E]> {
  const pending = session.add(entity, values);
  await session.commit();
  return pending.row;
}

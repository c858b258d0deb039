import { and, eq, getTableColumns, isNull, type Column, type SQL } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import * as schema from './schema/index.js';
import { collections, creators, modelFiles, models } from './schema/index.js';
import type { Database, DatabasePool } from './index.js';
import {
  PendingRow,
  type CatalogSession,
  type Criteria,
  type EntityName,
  type EntityQuery,
  type EntityRows,
  type NewEntityRows,
} from './session.js';
import { databaseError, internalError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('DrizzleCatalogSession');

// Either the database itself or an open transaction on it.
type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

type EntityAdapters = {
  [E in EntityName]: {
    columns: Record<string, Column>;
    insert(executor: Executor, values: NewEntityRows[E]): Promise<EntityRows[E]>;
    findFirst(executor: Executor, where: SQL | undefined): Promise<EntityRows[E] | undefined>;
  };
};

const adapters: EntityAdapters = {
  creator: {
    columns: getTableColumns(creators),
    async insert(executor, values) {
      const [row] = await executor.insert(creators).values(values).returning();
      return row;
    },
    async findFirst(executor, where) {
      const [row] = await executor.select().from(creators).where(where).limit(1);
      return row;
    },
  },
  collection: {
    columns: getTableColumns(collections),
    async insert(executor, values) {
      const [row] = await executor.insert(collections).values(values).returning();
      return row;
    },
    async findFirst(executor, where) {
      const [row] = await executor.select().from(collections).where(where).limit(1);
      return row;
    },
  },
  model: {
    columns: getTableColumns(models),
    async insert(executor, values) {
      const [row] = await executor.insert(models).values(values).returning();
      return row;
    },
    async findFirst(executor, where) {
      const [row] = await executor.select().from(models).where(where).limit(1);
      return row;
    },
  },
  modelFile: {
    columns: getTableColumns(modelFiles),
    async insert(executor, values) {
      const [row] = await executor.insert(modelFiles).values(values).returning();
      return row;
    },
    async findFirst(executor, where) {
      const [row] = await executor.select().from(modelFiles).where(where).limit(1);
      return row;
    },
  },
};

/**
 * Translate exact-match criteria (keyed by the TypeScript column names) into a
 * WHERE clause. `null` becomes IS NULL; an empty criteria object matches every row.
 */
export function whereMatching(
  columns: Record<string, Column>,
  criteria: Record<string, unknown>,
): SQL | undefined {
  const conditions: SQL[] = [];
  for (const [key, value] of Object.entries(criteria)) {
    if (value === undefined) continue;
    const column = columns[key];
    if (!column) {
      throw internalError(`Unknown column in query criteria: ${key}`);
    }
    conditions.push(value === null ? isNull(column) : eq(column, value));
  }
  return conditions.length > 0 ? and(...conditions) : undefined;
}

async function insertPending<E extends EntityName>(
  executor: Executor,
  pending: PendingRow<E>,
): Promise<void> {
  const adapter = adapters[pending.entity];
  pending.resolve(await adapter.insert(executor, pending.values));
}

class DrizzleEntityQuery<E extends EntityName> implements EntityQuery<E> {
  private criteria: Record<string, unknown> = {};

  constructor(
    private readonly db: Executor,
    private readonly entity: E,
  ) {}

  filterBy(criteria: Criteria<E>): EntityQuery<E> {
    this.criteria = { ...this.criteria, ...criteria };
    return this;
  }

  async first(): Promise<EntityRows[E] | undefined> {
    const adapter = adapters[this.entity];
    const where = whereMatching(adapter.columns, this.criteria);
    try {
      return await adapter.findFirst(this.db, where);
    } catch (err) {
      throw databaseError(`Failed to query ${this.entity}`, err);
    }
  }
}

/**
 * Catalog session backed by PostgreSQL. Staged rows are inserted together in
 * one transaction on commit; each pending row then carries its stored id.
 */
export class DrizzleCatalogSession implements CatalogSession {
  private staged: PendingRow<EntityName>[] = [];

  constructor(
    private readonly db: Database,
    private readonly pool: Pick<DatabasePool, 'end'>,
  ) {}

  add<E extends EntityName>(entity: E, values: NewEntityRows[E]): PendingRow<E> {
    const pending = new PendingRow(entity, values);
    this.staged.push(pending);
    return pending;
  }

  async commit(): Promise<void> {
    const batch = this.staged;
    this.staged = [];
    if (batch.length === 0) return;

    try {
      await this.db.transaction(async (tx) => {
        for (const pending of batch) {
          await insertPending(tx, pending);
        }
      });
    } catch (err) {
      const entities = [...new Set(batch.map((p) => p.entity))].join(', ');
      throw databaseError(`Failed to commit ${batch.length} staged row(s) (${entities})`, err);
    }

    logger.debug({ rows: batch.length }, 'Committed');
  }

  query<E extends EntityName>(entity: E): EntityQuery<E> {
    return new DrizzleEntityQuery(this.db, entity);
  }

  async close(): Promise<void> {
    if (this.staged.length > 0) {
      logger.warn({ rows: this.staged.length }, 'Closing session with uncommitted rows');
    }
    await this.pool.end();
  }
}

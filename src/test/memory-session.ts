import {
  PendingRow,
  type CatalogSession,
  type Criteria,
  type EntityName,
  type EntityQuery,
  type EntityRows,
  type NewEntityRows,
} from '../db/session.js';
import { buildRow } from '../db/rows.js';

type Tables = { [E in EntityName]: EntityRows[E][] };

function matches(row: object, criteria: Record<string, unknown>): boolean {
  const values = new Map<string, unknown>(Object.entries(row));
  return Object.entries(criteria).every(
    ([key, expected]) => expected === undefined || values.get(key) === expected,
  );
}

class MemoryQuery<E extends EntityName> implements EntityQuery<E> {
  private criteria: Record<string, unknown> = {};

  constructor(private readonly rows: EntityRows[E][]) {}

  filterBy(criteria: Criteria<E>): EntityQuery<E> {
    this.criteria = { ...this.criteria, ...criteria };
    return this;
  }

  async first(): Promise<EntityRows[E] | undefined> {
    return this.rows.find((row) => matches(row, this.criteria));
  }
}

/**
 * In-process stand-in for the PostgreSQL session. Rows become visible to
 * queries only after commit, and ids are assigned per table from 1.
 */
export class MemoryCatalogSession implements CatalogSession {
  readonly tables: Tables = { creator: [], collection: [], model: [], modelFile: [] };
  commits = 0;
  closed = false;
  private staged: Array<() => void> = [];

  add<E extends EntityName>(entity: E, values: NewEntityRows[E]): PendingRow<E> {
    const pending = new PendingRow(entity, values);
    this.staged.push(() => {
      const table: EntityRows[E][] = this.tables[entity];
      const row = buildRow(entity, values, table.length + 1);
      table.push(row);
      pending.resolve(row);
    });
    return pending;
  }

  async commit(): Promise<void> {
    for (const apply of this.staged) {
      apply();
    }
    this.staged = [];
    this.commits++;
  }

  query<E extends EntityName>(entity: E): EntityQuery<E> {
    return new MemoryQuery<E>(this.tables[entity]);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

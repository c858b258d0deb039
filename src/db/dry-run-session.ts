import type { Logger } from 'pino';
import {
  PendingRow,
  type CatalogSession,
  type Criteria,
  type EntityName,
  type EntityQuery,
  type EntityRows,
  type NewEntityRows,
} from './session.js';
import { buildRow } from './rows.js';
import { createLogger } from '../utils/logger.js';

class EmptyQuery<E extends EntityName> implements EntityQuery<E> {
  filterBy(_criteria: Criteria<E>): EntityQuery<E> {
    return this;
  }

  async first(): Promise<EntityRows[E] | undefined> {
    return undefined;
  }
}

/**
 * Stand-in session for `--dry-run`: logs every staged row instead of writing
 * it, and never finds anything. Staged rows get sequential ids so foreign keys
 * between logged rows can be followed.
 */
export class DryRunCatalogSession implements CatalogSession {
  // Deferred resolutions, run on commit
  private staged: Array<() => void> = [];
  private nextId = 1;

  constructor(private readonly logger: Logger = createLogger('DryRunCatalogSession')) {}

  add<E extends EntityName>(entity: E, values: NewEntityRows[E]): PendingRow<E> {
    const pending = new PendingRow(entity, values);
    const row = buildRow(entity, values, this.nextId++);
    this.logger.info({ entity, row }, `Adding ${entity}`);
    this.staged.push(() => pending.resolve(row));
    return pending;
  }

  async commit(): Promise<void> {
    this.logger.info({ rows: this.staged.length }, 'Committing');
    for (const resolve of this.staged) {
      resolve();
    }
    this.staged = [];
  }

  query<E extends EntityName>(_entity: E): EntityQuery<E> {
    return new EmptyQuery<E>();
  }

  async close(): Promise<void> {
    this.staged = [];
  }
}

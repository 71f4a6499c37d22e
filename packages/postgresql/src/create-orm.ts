import { Orm, createConsoleLogger } from '@rowkit/core';

import { PostgreSQLAdapter } from './adapter/postgresql-adapter';

import type { ConnectionConfig, Logger, TableSchema } from '@rowkit/core';
import type { PostgreSQLAdapterOptions } from './adapter/postgresql-adapter';

export interface CreateOrmOptions {
  logger?: Logger;
  /** Per-statement timeout (ms) */
  queryTimeout?: number;
  adapter?: Omit<PostgreSQLAdapterOptions, 'logger'>;
}

/**
 * Build an `Orm` backed by the pg driver. The adapter shares the Orm's logger.
 *
 * @example
 * ```typescript
 * const orm = createOrm(process.env.DATABASE_URL ?? resolveConnectionConfig(), [users]);
 * await orm.connect();
 * ```
 */
export function createOrm(
  connection: string | ConnectionConfig,
  schemas: TableSchema[],
  options: CreateOrmOptions = {},
): Orm {
  const logger = options.logger ?? createConsoleLogger();

  return new Orm({
    adapter: new PostgreSQLAdapter({ ...options.adapter, logger }),
    connection,
    schemas,
    logger,
    queryTimeout: options.queryTimeout,
  });
}

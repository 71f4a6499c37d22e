/**
 * Query Context
 *
 * Shared context for query builders: the dialect that renders SQL and the
 * executor that runs it. Keeps execution concerns out of query building.
 */

import type { SQLDialect } from '../dialect/sql-dialect';
import type { QueryOptions, QueryResult } from '../types';

/**
 * Query executor interface - implemented by adapters
 */
export interface QueryExecutor {
  query<T = unknown>(sql: string, params?: unknown[], options?: QueryOptions): Promise<QueryResult<T>>;
}

export class QueryContext {
  constructor(
    public readonly dialect: SQLDialect,
    public readonly executor: QueryExecutor,
    public readonly options: QueryOptions = {},
  ) {}

  /**
   * Execute a SELECT query
   */
  async executeQuery<T>(sql: string, bindings: unknown[]): Promise<QueryResult<T>> {
    this.dialect.resetParameters();
    return this.executor.query<T>(sql, bindings, this.options);
  }
}

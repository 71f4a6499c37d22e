import type { SQLDialect } from '../dialect/sql-dialect';
import type {
  ConnectionConfig,
  QueryResult,
  QueryOptions,
  QueryParams,
  PoolStats,
} from '../types';

export interface DatabaseAdapter {
  readonly name: string;
  readonly version: string;
  readonly isConnected: boolean;

  connect(config: ConnectionConfig): Promise<void>;
  disconnect(): Promise<void>;

  query<T = unknown>(
    sql: string,
    params?: QueryParams,
    options?: QueryOptions,
  ): Promise<QueryResult<T>>;

  execute<T = unknown>(
    sql: string,
    params?: QueryParams,
    options?: QueryOptions,
  ): Promise<QueryResult<T>>;

  getPoolStats(): PoolStats;

  ping(): Promise<boolean>;

  escapeIdentifier(identifier: string): string;

  createDialect(): SQLDialect;
}

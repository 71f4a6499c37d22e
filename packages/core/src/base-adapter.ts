import { EventEmitter } from 'eventemitter3';

import { ConnectionError, QueryError, RowkitError, toError } from './errors';
import {
  retry,
  silentLogger,
  truncateSql,
  validateConnectionConfig,
  validateSQL,
  withTimeout,
} from './utils';

import type { SQLDialect } from './dialect/sql-dialect';
import type { DatabaseAdapter } from './interfaces';
import type {
  ConnectionConfig,
  Logger,
  PoolStats,
  QueryOptions,
  QueryParams,
  QueryResult,
} from './types';

export interface BaseAdapterOptions {
  logger?: Logger;
  retryOptions?: {
    maxRetries?: number;
    retryDelay?: number;
  };
}

export abstract class BaseAdapter extends EventEmitter implements DatabaseAdapter {
  protected config?: ConnectionConfig;
  protected logger: Logger;
  protected _isConnected = false;
  protected retryOptions = {
    maxRetries: 3,
    retryDelay: 1000,
  };

  abstract readonly name: string;
  abstract readonly version: string;

  get isConnected(): boolean {
    return this._isConnected;
  }

  constructor(options: BaseAdapterOptions = {}) {
    super();
    this.logger = options.logger ?? silentLogger;
    if (options.retryOptions) {
      this.retryOptions = { ...this.retryOptions, ...options.retryOptions };
    }
  }

  async connect(config: ConnectionConfig): Promise<void> {
    validateConnectionConfig(config);
    this.config = config;

    try {
      await retry(
        async () => {
          await this.doConnect(config);
          this._isConnected = true;
          this.emit('connect', { config });
        },
        {
          maxRetries: this.retryOptions.maxRetries,
          retryDelay: this.retryOptions.retryDelay,
        },
      );
    } catch (error) {
      throw new ConnectionError('Failed to connect to database', toError(error));
    }
  }

  async disconnect(): Promise<void> {
    if (!this._isConnected) {
      return;
    }

    try {
      await this.doDisconnect();
      this._isConnected = false;
      this.emit('disconnect');
    } catch (error) {
      throw new ConnectionError('Failed to disconnect from database', toError(error));
    }
  }

  async query<T = unknown>(
    sql: string,
    params: QueryParams = [],
    options: QueryOptions = {},
  ): Promise<QueryResult<T>> {
    validateSQL(sql);

    if (!this._isConnected) {
      throw new ConnectionError('Not connected to database');
    }

    const startTime = Date.now();
    this.logger.debug(`Executing query: ${truncateSql(sql)}`);

    try {
      const queryPromise = this.doQuery<T>(sql, params);
      const result = options.timeout
        ? await withTimeout(queryPromise, options.timeout, `Query timed out after ${options.timeout}ms`)
        : await queryPromise;

      result.duration = Date.now() - startTime;
      this.logger.debug(`Query completed in ${result.duration}ms (${result.rowCount} rows)`);
      this.emit('query', { sql, params, duration: result.duration, rowCount: result.rowCount });
      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      this.emit('queryError', { sql, params, error, duration });
      this.logger.error(`Query failed after ${duration}ms: ${toError(error).message}`, {
        sql: truncateSql(sql),
      });

      if (error instanceof RowkitError) {
        throw error;
      }
      throw new QueryError(`Query failed: ${toError(error).message}`, sql, params, toError(error));
    }
  }

  async execute<T = unknown>(
    sql: string,
    params?: QueryParams,
    options?: QueryOptions,
  ): Promise<QueryResult<T>> {
    return this.query<T>(sql, params, options);
  }

  async ping(): Promise<boolean> {
    try {
      await this.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  abstract getPoolStats(): PoolStats;

  abstract escapeIdentifier(identifier: string): string;

  abstract createDialect(): SQLDialect;

  protected abstract doConnect(config: ConnectionConfig): Promise<void>;
  protected abstract doDisconnect(): Promise<void>;
  protected abstract doQuery<T = unknown>(sql: string, params: QueryParams): Promise<QueryResult<T>>;
}

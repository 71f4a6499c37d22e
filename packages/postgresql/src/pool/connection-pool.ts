import { ConnectionError, silentLogger, toError } from '@rowkit/core';
import { Pool } from 'pg';

import type { Logger, PoolStats } from '@rowkit/core';
import type { PoolClient, PoolConfig } from 'pg';

export class PostgreSQLConnectionPool {
  private pool?: Pool;

  constructor(
    private readonly config: PoolConfig,
    private readonly logger: Logger = silentLogger,
  ) {}

  /**
   * Create the pool and check out one client to prove the server is reachable
   */
  async initialize(): Promise<void> {
    const pool = new Pool(this.config);

    pool.on('error', (err) => {
      this.logger.error('Unexpected error on idle PostgreSQL client', err);
    });

    try {
      const client = await pool.connect();
      try {
        await client.query('SELECT 1');
      } finally {
        client.release();
      }
    } catch (error) {
      await pool.end();
      throw new ConnectionError('Failed to initialize PostgreSQL connection pool', toError(error));
    }

    this.pool = pool;
  }

  async getClient(): Promise<PoolClient> {
    if (!this.pool) {
      throw new ConnectionError('Connection pool not initialized');
    }

    try {
      return await this.pool.connect();
    } catch (error) {
      throw new ConnectionError('Failed to get client from pool', toError(error));
    }
  }

  async end(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = undefined;
      await pool.end();
    }
  }

  getStats(): PoolStats {
    if (!this.pool) {
      return {
        total: 0,
        idle: 0,
        active: 0,
        waiting: 0,
      };
    }

    return {
      total: this.pool.totalCount,
      idle: this.pool.idleCount,
      active: this.pool.totalCount - this.pool.idleCount,
      waiting: this.pool.waitingCount,
    };
  }
}

import { BaseAdapter, ConnectionError, PostgreSQLDialect } from '@rowkit/core';
import { types } from 'pg';

import { PostgreSQLConnectionPool } from '../pool/connection-pool';
import { toPgPoolConfig } from '../utils/pg-utils';

import type {
  BaseAdapterOptions,
  ConnectionConfig,
  PoolStats,
  QueryParams,
  QueryResult,
  SQLDialect,
} from '@rowkit/core';
import type { PoolConfig } from 'pg';

export interface PostgreSQLAdapterOptions extends BaseAdapterOptions {
  /** Raw pg pool settings, applied over the translated connection config */
  pgOptions?: PoolConfig;
  /** Install numeric and date type parsers on the pg driver */
  parseTypes?: boolean;
}

const FIELD_TYPES = new Map<number, string>([
  [types.builtins.BOOL, 'boolean'],
  [types.builtins.INT2, 'smallint'],
  [types.builtins.INT4, 'integer'],
  [types.builtins.INT8, 'bigint'],
  [types.builtins.FLOAT4, 'real'],
  [types.builtins.FLOAT8, 'double'],
  [types.builtins.NUMERIC, 'numeric'],
  [types.builtins.VARCHAR, 'varchar'],
  [types.builtins.TEXT, 'text'],
  [types.builtins.DATE, 'date'],
  [types.builtins.TIMESTAMP, 'timestamp'],
  [types.builtins.TIMESTAMPTZ, 'timestamptz'],
  [types.builtins.JSON, 'json'],
  [types.builtins.JSONB, 'jsonb'],
  [types.builtins.UUID, 'uuid'],
]);

export class PostgreSQLAdapter extends BaseAdapter {
  readonly name = 'PostgreSQL';
  readonly version = '0.1.0';

  private pool?: PostgreSQLConnectionPool;
  private readonly pgOptions?: PoolConfig;

  constructor(options: PostgreSQLAdapterOptions = {}) {
    super(options);
    this.pgOptions = options.pgOptions;

    if (options.parseTypes ?? true) {
      configurePgTypes();
    }
  }

  protected async doConnect(config: ConnectionConfig): Promise<void> {
    const poolConfig: PoolConfig = {
      ...toPgPoolConfig(config),
      ...this.pgOptions,
    };

    const pool = new PostgreSQLConnectionPool(poolConfig, this.logger);
    await pool.initialize();
    this.pool = pool;

    this.logger.info('Connected to PostgreSQL database', { database: poolConfig.database });
  }

  protected async doDisconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
      this.logger.info('Disconnected from PostgreSQL database');
    }
  }

  protected async doQuery<T = unknown>(sql: string, params: QueryParams): Promise<QueryResult<T>> {
    if (!this.pool) {
      throw new ConnectionError('Database pool not initialized');
    }

    const client = await this.pool.getClient();
    try {
      const result = await client.query(sql, params);

      return {
        rows: result.rows,
        rowCount: result.rowCount ?? 0,
        fields: result.fields.map((field) => ({
          name: field.name,
          type: FIELD_TYPES.get(field.dataTypeID) ?? 'unknown',
        })),
        command: result.command,
      };
    } finally {
      client.release();
    }
  }

  getPoolStats(): PoolStats {
    if (!this.pool) {
      return {
        total: 0,
        idle: 0,
        active: 0,
        waiting: 0,
      };
    }

    return this.pool.getStats();
  }

  escapeIdentifier(identifier: string): string {
    return `"${identifier.replaceAll('"', '""')}"`;
  }

  createDialect(): SQLDialect {
    return new PostgreSQLDialect();
  }
}

/**
 * Parse numbers and timestamps into JS values. BIGINT stays a string when it
 * does not fit in a safe integer.
 */
function configurePgTypes(): void {
  types.setTypeParser(types.builtins.INT8, (val: string) => {
    const num = Number.parseInt(val, 10);
    return Number.isSafeInteger(num) ? num : val;
  });

  types.setTypeParser(types.builtins.FLOAT4, (val: string) => Number.parseFloat(val));
  types.setTypeParser(types.builtins.FLOAT8, (val: string) => Number.parseFloat(val));
  types.setTypeParser(types.builtins.NUMERIC, (val: string) => Number.parseFloat(val));

  types.setTypeParser(types.builtins.DATE, (val: string) => new Date(val));
  types.setTypeParser(types.builtins.TIMESTAMP, (val: string) => new Date(val));
  types.setTypeParser(types.builtins.TIMESTAMPTZ, (val: string) => new Date(val));
}

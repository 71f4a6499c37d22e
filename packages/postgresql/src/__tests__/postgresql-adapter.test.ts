import { describe, it, expect, beforeEach, vi } from 'vitest';

import { ConnectionError, QueryError, defineTable, silentLogger } from '@rowkit/core';

import { PostgreSQLAdapter } from '../adapter/postgresql-adapter';
import { createOrm } from '../create-orm';

import type { Logger } from '@rowkit/core';

const mocks = vi.hoisted(() => {
  const client = { query: vi.fn(), release: vi.fn() };
  const pool = {
    on: vi.fn(),
    connect: vi.fn(),
    end: vi.fn(),
    totalCount: 3,
    idleCount: 1,
    waitingCount: 0,
  };
  return {
    client,
    pool,
    Pool: vi.fn(function () {
      return pool;
    }),
    setTypeParser: vi.fn(),
  };
});

vi.mock('pg', () => ({
  Pool: mocks.Pool,
  types: {
    setTypeParser: mocks.setTypeParser,
    builtins: {
      BOOL: 16,
      INT2: 21,
      INT4: 23,
      INT8: 20,
      FLOAT4: 700,
      FLOAT8: 701,
      NUMERIC: 1700,
      VARCHAR: 1043,
      TEXT: 25,
      DATE: 1082,
      TIMESTAMP: 1114,
      TIMESTAMPTZ: 1184,
      JSON: 114,
      JSONB: 3802,
      UUID: 2950,
    },
  },
}));

const connection = { connectionString: 'postgres://app:test-secret@db:5433/app?sslmode=require&application_name=api' };

describe('PostgreSQLAdapter', () => {
  let logger: Logger;

  beforeEach(() => {
    vi.clearAllMocks();
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    mocks.pool.connect.mockResolvedValue(mocks.client);
    mocks.pool.end.mockResolvedValue(undefined);
    mocks.client.query.mockResolvedValue({ rows: [], rowCount: 0, fields: [], command: 'SELECT' });
  });

  describe('constructor', () => {
    it('should install type parsers by default', () => {
      new PostgreSQLAdapter();
      expect(mocks.setTypeParser).toHaveBeenCalledWith(20, expect.any(Function));
      expect(mocks.setTypeParser).toHaveBeenCalledTimes(7);
    });

    it('should keep BIGINT outside the safe range as text', () => {
      new PostgreSQLAdapter();
      const int8 = mocks.setTypeParser.mock.calls.find(([oid]) => oid === 20)?.[1];
      expect(int8?.('42')).toBe(42);
      expect(int8?.('9223372036854775807')).toBe('9223372036854775807');
    });

    it('should leave the driver alone when parseTypes is off', () => {
      new PostgreSQLAdapter({ parseTypes: false });
      expect(mocks.setTypeParser).not.toHaveBeenCalled();
    });
  });

  describe('connect', () => {
    it('should build the pool from the connection string', async () => {
      const adapter = new PostgreSQLAdapter({ logger });

      await adapter.connect(connection);

      expect(mocks.Pool).toHaveBeenCalledWith({
        host: 'db',
        port: 5433,
        database: 'app',
        user: 'app',
        password: 'test-secret',
        ssl: true,
        application_name: 'api',
        max: 5,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 10000,
      });
      expect(mocks.client.query).toHaveBeenCalledWith('SELECT 1');
      expect(mocks.client.release).toHaveBeenCalledTimes(1);
      expect(adapter.isConnected).toBe(true);
      expect(logger.info).toHaveBeenCalledWith('Connected to PostgreSQL database', { database: 'app' });
    });

    it('should let pgOptions override the translated settings', async () => {
      const adapter = new PostgreSQLAdapter({ pgOptions: { max: 20 } });

      await adapter.connect({ host: 'localhost', database: 'app', pool: { max: 2 } });

      expect(mocks.Pool).toHaveBeenCalledWith(expect.objectContaining({ host: 'localhost', port: 5432, max: 20 }));
    });

    it('should log idle client errors', async () => {
      const adapter = new PostgreSQLAdapter({ logger });
      await adapter.connect(connection);

      const [event, handler] = mocks.pool.on.mock.calls[0] ?? [];
      const failure = new Error('terminating connection due to administrator command');
      handler?.(failure);

      expect(event).toBe('error');
      expect(logger.error).toHaveBeenCalledWith('Unexpected error on idle PostgreSQL client', failure);
    });

    it('should close the pool when the first checkout fails', async () => {
      mocks.pool.connect.mockRejectedValueOnce(new Error('password authentication failed for user "app"'));
      const adapter = new PostgreSQLAdapter();

      await expect(adapter.connect(connection)).rejects.toThrow(ConnectionError);
      expect(mocks.pool.end).toHaveBeenCalledTimes(1);
      expect(adapter.isConnected).toBe(false);
    });
  });

  describe('query', () => {
    it('should map rows, fields and command', async () => {
      const adapter = new PostgreSQLAdapter();
      await adapter.connect(connection);
      mocks.client.query.mockResolvedValueOnce({
        rows: [{ id: 1, name: 'Ada' }],
        rowCount: 1,
        fields: [
          { name: 'id', dataTypeID: 23 },
          { name: 'name', dataTypeID: 1043 },
          { name: 'shape', dataTypeID: 600 },
        ],
        command: 'SELECT',
      });

      const result = await adapter.query('SELECT * FROM "users" WHERE "id" = $1', [1]);

      expect(mocks.client.query).toHaveBeenLastCalledWith('SELECT * FROM "users" WHERE "id" = $1', [1]);
      expect(result).toMatchObject({
        rows: [{ id: 1, name: 'Ada' }],
        rowCount: 1,
        command: 'SELECT',
        fields: [
          { name: 'id', type: 'integer' },
          { name: 'name', type: 'varchar' },
          { name: 'shape', type: 'unknown' },
        ],
      });
      expect(mocks.client.release).toHaveBeenCalledTimes(2);
    });

    it('should release the client when the statement fails', async () => {
      const adapter = new PostgreSQLAdapter();
      await adapter.connect(connection);
      mocks.client.query.mockRejectedValueOnce(new Error('relation "accounts" does not exist'));

      await expect(adapter.query('SELECT * FROM accounts')).rejects.toThrow(QueryError);
      expect(mocks.client.release).toHaveBeenCalledTimes(2);
    });

    it('should treat a null rowCount as zero', async () => {
      const adapter = new PostgreSQLAdapter();
      await adapter.connect(connection);
      mocks.client.query.mockResolvedValueOnce({ rows: [], rowCount: null, fields: [], command: 'LISTEN' });

      const result = await adapter.query('LISTEN jobs');

      expect(result.rowCount).toBe(0);
    });
  });

  describe('disconnect', () => {
    it('should end the pool', async () => {
      const adapter = new PostgreSQLAdapter();
      await adapter.connect(connection);

      await adapter.disconnect();

      expect(mocks.pool.end).toHaveBeenCalledTimes(1);
      expect(adapter.isConnected).toBe(false);
    });
  });

  describe('helpers', () => {
    it('should report pool statistics', async () => {
      const adapter = new PostgreSQLAdapter();
      expect(adapter.getPoolStats()).toEqual({ total: 0, idle: 0, active: 0, waiting: 0 });

      await adapter.connect(connection);
      expect(adapter.getPoolStats()).toEqual({ total: 3, idle: 1, active: 2, waiting: 0 });
    });

    it('should escape identifiers', () => {
      expect(new PostgreSQLAdapter().escapeIdentifier('we"ird')).toBe('"we""ird"');
    });

    it('should hand out PostgreSQL dialects', () => {
      const adapter = new PostgreSQLAdapter();
      const dialect = adapter.createDialect();
      expect(dialect.name).toBe('postgresql');
      expect(adapter.createDialect()).not.toBe(dialect);
    });
  });
});

describe('createOrm', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.pool.connect.mockResolvedValue(mocks.client);
    mocks.client.query.mockResolvedValue({ rows: [], rowCount: 0, fields: [], command: 'CREATE' });
  });

  it('should wire a PostgreSQL adapter to the Orm', async () => {
    const notes = defineTable('notes', (table) => {
      table.increments('id');
      table.text('body');
    });

    const orm = createOrm('postgres://localhost/app', [notes], { logger: silentLogger });
    await orm.connect();
    const executed = await orm.migrate();

    expect(orm.adapter).toBeInstanceOf(PostgreSQLAdapter);
    expect(executed).toEqual([
      'CREATE TABLE IF NOT EXISTS "notes" (\n  "id" SERIAL PRIMARY KEY,\n  "body" TEXT NOT NULL\n)',
    ]);
    expect(mocks.client.query).toHaveBeenLastCalledWith(executed[0], []);
  });
});

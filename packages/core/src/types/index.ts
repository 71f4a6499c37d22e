/**
 * Database connection configuration
 * @example
 * ```typescript
 * const config: ConnectionConfig = {
 *   host: 'localhost',
 *   port: 5432,
 *   user: 'postgres',
 *   password: 'secret',
 *   database: 'app',
 *   pool: {
 *     max: 5,
 *     idleTimeout: 30000
 *   }
 * };
 * ```
 */
export interface ConnectionConfig {
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  connectionString?: string;
  ssl?: boolean | SSLConfig;

  /** Pool configuration */
  pool?: PoolConfig;

  /** Time to wait for a new connection (ms) */
  connectionTimeout?: number;
  applicationName?: string;
}

/**
 * TLS settings passed through to the driver
 */
export interface SSLConfig {
  rejectUnauthorized?: boolean;
  ca?: string;
  cert?: string;
  key?: string;
}

/**
 * Connection pool configuration
 */
export interface PoolConfig {
  /** Maximum number of connections in pool */
  max?: number;

  /** Maximum time to wait for a connection (ms) */
  acquireTimeout?: number;

  /** Time before idle connection is closed (ms) */
  idleTimeout?: number;
}

export interface QueryResult<T = unknown> {
  rows: T[];
  rowCount: number;
  fields?: FieldInfo[];
  command?: string;
  duration?: number;
}

export interface FieldInfo {
  name: string;
  type: string;
}

export interface QueryOptions {
  timeout?: number;
}

export interface PoolStats {
  total: number;
  idle: number;
  waiting: number;
  active: number;
}

export type QueryParams = unknown[];

/**
 * Untyped row as returned by the driver
 */
export type Row = Record<string, unknown>;

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Connection configuration helpers
 */

import { ValidationError } from '../errors';

import type { ConnectionConfig } from '../types';

export type EnvSource = Record<string, string | undefined>;

/**
 * Define configuration helper
 */
export function defineConfig(config: ConnectionConfig): ConnectionConfig {
  return config;
}

/**
 * Resolve connection settings from the environment.
 *
 * `DATABASE_URL` wins over the libpq-style `PG*` variables.
 */
export function resolveConnectionConfig(env: EnvSource = process.env): ConnectionConfig {
  const url = env['DATABASE_URL'];
  if (url) {
    return { connectionString: url };
  }

  const config: ConnectionConfig = {
    host: env['PGHOST'] ?? 'localhost',
    database: env['PGDATABASE'],
    user: env['PGUSER'],
    password: env['PGPASSWORD'],
  };

  const port = env['PGPORT'];
  if (port !== undefined) {
    const parsed = Number.parseInt(port, 10);
    if (Number.isNaN(parsed)) {
      throw new ValidationError(`PGPORT must be a number, got "${port}"`, 'port');
    }
    config.port = parsed;
  }

  return config;
}

/**
 * Coerce a connection URL or config object into a config object
 */
export function toConnectionConfig(connection: string | ConnectionConfig): ConnectionConfig {
  return typeof connection === 'string' ? { connectionString: connection } : connection;
}

/**
 * Human readable connection target with the password masked
 */
export function describeConnection(config: ConnectionConfig): string {
  if (config.connectionString) {
    return config.connectionString.replace(/(\/\/[^:/@?#]+:)[^@/?#]*@/, '$1****@');
  }

  const auth = config.user ? `${config.user}${config.password ? ':****' : ''}@` : '';
  const port = config.port ? `:${config.port}` : '';
  return `postgres://${auth}${config.host ?? 'localhost'}${port}/${config.database ?? ''}`;
}

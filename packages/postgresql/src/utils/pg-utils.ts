import { ValidationError } from '@rowkit/core';

import type { ConnectionConfig } from '@rowkit/core';
import type { PoolConfig } from 'pg';

export const DEFAULT_PORT = 5432;
export const DEFAULT_POOL_SIZE = 5;
export const DEFAULT_IDLE_TIMEOUT = 30_000;
export const DEFAULT_CONNECTION_TIMEOUT = 10_000;

/**
 * Parse a `postgres://` URL into pg pool settings.
 *
 * Understands `sslmode` (or `ssl`), `application_name` and `connect_timeout`
 * (seconds). Other query parameters are ignored.
 */
export function parsePgConnectionString(connectionString: string): PoolConfig {
  let url: URL;
  try {
    url = new URL(connectionString);
  } catch {
    throw new ValidationError('Invalid PostgreSQL connection string', 'connectionString');
  }

  if (url.protocol !== 'postgres:' && url.protocol !== 'postgresql:') {
    throw new ValidationError(
      `Unsupported connection protocol "${url.protocol}"`,
      'connectionString',
    );
  }

  const config: PoolConfig = {
    host: url.hostname,
    port: Number.parseInt(url.port, 10) || DEFAULT_PORT,
    database: decodeURIComponent(url.pathname.slice(1)),
  };

  if (url.username) {
    config.user = decodeURIComponent(url.username);
  }
  if (url.password) {
    config.password = decodeURIComponent(url.password);
  }

  url.searchParams.forEach((value, key) => {
    switch (key) {
      case 'ssl':
      case 'sslmode': {
        if (value === 'require' || value === 'true' || value === '1') {
          config.ssl = true;
        } else if (value === 'disable' || value === 'false' || value === '0') {
          config.ssl = false;
        } else {
          config.ssl = { rejectUnauthorized: value === 'verify-full' };
        }
        break;
      }
      case 'application_name': {
        config.application_name = value;
        break;
      }
      case 'connect_timeout': {
        const seconds = Number.parseInt(value, 10);
        if (!Number.isNaN(seconds)) {
          config.connectionTimeoutMillis = seconds * 1000;
        }
        break;
      }
      default: {
        break;
      }
    }
  });

  return config;
}

/**
 * Translate a rowkit connection config into pg pool settings.
 * Explicit fields win over what the connection string says.
 */
export function toPgPoolConfig(config: ConnectionConfig): PoolConfig {
  const base: PoolConfig = config.connectionString
    ? parsePgConnectionString(config.connectionString)
    : { port: DEFAULT_PORT };

  if (config.host !== undefined) {
    base.host = config.host;
  }
  if (config.port !== undefined) {
    base.port = config.port;
  }
  if (config.database !== undefined) {
    base.database = config.database;
  }
  if (config.user !== undefined) {
    base.user = config.user;
  }
  if (config.password !== undefined) {
    base.password = config.password;
  }

  const poolConfig: PoolConfig = {
    ...base,
    max: config.pool?.max ?? DEFAULT_POOL_SIZE,
    idleTimeoutMillis: config.pool?.idleTimeout ?? DEFAULT_IDLE_TIMEOUT,
    connectionTimeoutMillis:
      config.connectionTimeout ??
      config.pool?.acquireTimeout ??
      base.connectionTimeoutMillis ??
      DEFAULT_CONNECTION_TIMEOUT,
  };

  const ssl = config.ssl ?? base.ssl;
  if (ssl !== undefined) {
    poolConfig.ssl = ssl;
  }

  const applicationName = config.applicationName ?? base.application_name;
  if (applicationName !== undefined) {
    poolConfig.application_name = applicationName;
  }

  return poolConfig;
}

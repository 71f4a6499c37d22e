export { PostgreSQLAdapter } from './adapter/postgresql-adapter';
export type { PostgreSQLAdapterOptions } from './adapter/postgresql-adapter';
export { PostgreSQLConnectionPool } from './pool/connection-pool';
export {
  parsePgConnectionString,
  toPgPoolConfig,
  DEFAULT_POOL_SIZE,
  DEFAULT_PORT,
} from './utils/pg-utils';
export { createOrm, type CreateOrmOptions } from './create-orm';

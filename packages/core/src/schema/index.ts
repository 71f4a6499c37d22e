/**
 * Schema Module
 * Table schema definitions and their PostgreSQL DDL
 */

export { TableSchema, defineTable } from './TableSchema';
export { TableBuilder } from './TableBuilder';
export { ColumnBuilder, ForeignKeyBuilder } from './ColumnBuilder';
export { PostgreSQLDialect as SchemaPostgreSQLDialect } from './dialects/PostgreSQLDialect';

export type {
  ColumnType,
  ColumnDefinition,
  CreateOptions,
  ForeignKeyDefinition,
  ForeignKeyAction,
  IndexDefinition,
  TableDefinition,
  SchemaDialect,
} from './types';

/**
 * SQL Dialect Abstraction Layer
 *
 * @module dialect
 */

export { SQLDialect } from './sql-dialect';
export type {
  DialectConfig,
  BuiltSQL,
  WhereCondition,
  JoinDefinition,
  OrderByDefinition,
  SelectComponents,
  InsertComponents,
  UpdateComponents,
  DeleteComponents,
} from './sql-dialect';
export { PostgreSQLDialect } from './postgresql-dialect';

/**
 * Query Builder Module
 *
 * - SelectBuilder: chained SELECT queries
 * - WhereBuilder: WHERE / HAVING conditions shared by the builders and the Orm
 *
 * @module query
 */

export { QueryContext, type QueryExecutor } from './query-context';
export { SelectBuilder, type OrderDirection } from './select-builder';
export { WhereBuilder, type WhereArgs, type WhereConditionInput } from './where-builder';

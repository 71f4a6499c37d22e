/**
 * Select Query Builder
 *
 * Fluent builder for parameterized SELECT queries. The generated SQL always
 * reflects the accumulated builder state; bindings follow placeholder order.
 *
 * @example
 * ```typescript
 * const users = await orm
 *   .query<User>('users')
 *   .select('id', 'name', 'email')
 *   .where('active', true)
 *   .like('name', 'ada')
 *   .orderBy('created_at', 'DESC')
 *   .limit(10)
 *   .get();
 * ```
 */

import { RecordNotFoundError } from '../errors';
import { validateColumnReference, validateNonNegativeInteger, validateTableName } from '../utils/validation';
import { WhereBuilder } from './where-builder';

import type { JoinDefinition, OrderByDefinition, SelectComponents } from '../dialect/sql-dialect';
import type { QueryContext } from './query-context';
import type { WhereArgs } from './where-builder';

export type OrderDirection = 'ASC' | 'DESC' | 'asc' | 'desc';

export class SelectBuilder<T = unknown> {
  private _columns: string[] = [];
  private _distinct = false;
  private _table?: string;
  private _joins: JoinDefinition[] = [];
  private _groupBy: string[] = [];
  private _orderBy: OrderByDefinition[] = [];
  private _limit?: number;
  private _offset?: number;
  private _whereBuilder: WhereBuilder;
  private _havingBuilder: WhereBuilder;

  constructor(private readonly ctx: QueryContext) {
    this._whereBuilder = new WhereBuilder(ctx.dialect);
    this._havingBuilder = new WhereBuilder(ctx.dialect);
  }

  // ============ Core Selection Methods ============

  /**
   * Set columns to select
   */
  select(...columns: string[]): this {
    this._columns = columns;
    return this;
  }

  /**
   * Add columns to selection
   */
  addSelect(...columns: string[]): this {
    this._columns.push(...columns);
    return this;
  }

  distinct(): this {
    this._distinct = true;
    return this;
  }

  from(table: string): this {
    validateTableName(table);
    this._table = table;
    return this;
  }

  /**
   * Alias for from()
   */
  table(table: string): this {
    return this.from(table);
  }

  // ============ WHERE Methods (delegated to WhereBuilder) ============

  where(...args: WhereArgs): this {
    this._whereBuilder.where(...args);
    return this;
  }

  orWhere(...args: WhereArgs): this {
    this._whereBuilder.orWhere(...args);
    return this;
  }

  whereNull(column: string): this {
    this._whereBuilder.whereNull(column);
    return this;
  }

  whereNotNull(column: string): this {
    this._whereBuilder.whereNotNull(column);
    return this;
  }

  whereIn(column: string, values: unknown[]): this {
    this._whereBuilder.whereIn(column, values);
    return this;
  }

  whereNotIn(column: string, values: unknown[]): this {
    this._whereBuilder.whereNotIn(column, values);
    return this;
  }

  whereBetween(column: string, from: unknown, to: unknown): this {
    this._whereBuilder.whereBetween(column, from, to);
    return this;
  }

  whereLike(column: string, pattern: string): this {
    this._whereBuilder.whereLike(column, pattern);
    return this;
  }

  whereNotLike(column: string, pattern: string): this {
    this._whereBuilder.whereNotLike(column, pattern);
    return this;
  }

  whereILike(column: string, pattern: string): this {
    this._whereBuilder.whereILike(column, pattern);
    return this;
  }

  /**
   * Substring match: `column LIKE '%text%'`
   */
  like(column: string, text: string): this {
    this._whereBuilder.like(column, text);
    return this;
  }

  /**
   * Case-insensitive substring match: `column ILIKE '%text%'`
   */
  ilike(column: string, text: string): this {
    this._whereBuilder.ilike(column, text);
    return this;
  }

  // ============ JOIN Methods ============

  /**
   * Inner join on `left = right`
   */
  join(table: string, left: string, right: string): this {
    return this.addJoin('INNER', table, left, right);
  }

  leftJoin(table: string, left: string, right: string): this {
    return this.addJoin('LEFT', table, left, right);
  }

  // ============ GROUP BY / HAVING ============

  groupBy(...columns: string[]): this {
    columns.forEach(validateColumnReference);
    this._groupBy.push(...columns);
    return this;
  }

  having(column: string, operator: string, value: unknown): this {
    this._havingBuilder.where(column, operator, value);
    return this;
  }

  // ============ ORDER BY ============

  orderBy(column: string, direction: OrderDirection = 'ASC'): this {
    validateColumnReference(column);
    this._orderBy.push({ column, direction: direction === 'desc' || direction === 'DESC' ? 'DESC' : 'ASC' });
    return this;
  }

  orderByDesc(column: string): this {
    return this.orderBy(column, 'DESC');
  }

  clearOrder(): this {
    this._orderBy = [];
    return this;
  }

  // ============ LIMIT / OFFSET / Pagination ============

  limit(count: number): this {
    validateNonNegativeInteger(count, 'limit');
    this._limit = count;
    return this;
  }

  offset(count: number): this {
    validateNonNegativeInteger(count, 'offset');
    this._offset = count;
    return this;
  }

  /**
   * 1-based page helper
   */
  paginate(page: number, perPage: number): this {
    validateNonNegativeInteger(page - 1, 'page');
    this.limit(perPage);
    return this.offset((page - 1) * perPage);
  }

  // ============ SQL Building ============

  toSQL(): { sql: string; bindings: unknown[] } {
    this.ctx.dialect.resetParameters();

    // WHERE placeholders are numbered before HAVING's
    const where = this._whereBuilder.build();
    const having = this._havingBuilder.build();

    const components: SelectComponents = {
      columns: this._columns.length > 0 ? this._columns : ['*'],
      distinct: this._distinct,
      from: this._table,
      joins: this._joins,
      where,
      groupBy: this._groupBy,
      having,
      orderBy: this._orderBy,
      limit: this._limit,
      offset: this._offset,
    };

    return this.ctx.dialect.buildSelect(components);
  }

  // ============ Execution Methods ============

  /**
   * Fetch every matching row
   */
  async get(): Promise<T[]> {
    const { sql, bindings } = this.toSQL();
    const result = await this.ctx.executeQuery<T>(sql, bindings);
    return result.rows;
  }

  /**
   * Fetch the first matching row, or null
   */
  async first(): Promise<T | null> {
    const results = await this.clone().limit(1).get();
    return results[0] ?? null;
  }

  async firstOrFail(): Promise<T> {
    const result = await this.first();
    if (result === null) {
      throw new RecordNotFoundError(this._table);
    }
    return result;
  }

  async count(): Promise<number> {
    const counter = new SelectBuilder<{ count: string | number }>(this.ctx);
    counter._table = this._table;
    counter._joins = [...this._joins];
    counter._whereBuilder = this._whereBuilder.clone(this.ctx.dialect);
    counter._columns = ['COUNT(*) AS count'];

    const row = await counter.first();
    return Number(row?.count ?? 0);
  }

  async exists(): Promise<boolean> {
    return (await this.count()) > 0;
  }

  // ============ Utility Methods ============

  clone(): SelectBuilder<T> {
    const cloned = new SelectBuilder<T>(this.ctx);
    cloned._columns = [...this._columns];
    cloned._distinct = this._distinct;
    cloned._table = this._table;
    cloned._joins = [...this._joins];
    cloned._groupBy = [...this._groupBy];
    cloned._orderBy = [...this._orderBy];
    cloned._limit = this._limit;
    cloned._offset = this._offset;
    cloned._whereBuilder = this._whereBuilder.clone(this.ctx.dialect);
    cloned._havingBuilder = this._havingBuilder.clone(this.ctx.dialect);
    return cloned;
  }

  private addJoin(type: JoinDefinition['type'], table: string, left: string, right: string): this {
    validateTableName(table);
    validateColumnReference(left);
    validateColumnReference(right);
    this._joins.push({ type, table, left, right });
    return this;
  }
}

/**
 * Table handles
 *
 * `Table<T>` binds an `Orm` to one table and a key column, and wraps rows in
 * `TableRecord<T>` so they can be updated or deleted in place.
 *
 * @example
 * ```typescript
 * const users = orm.table<User>('users');
 *
 * const ada = await users.insert({ name: 'Ada', email: 'ada@example.com' });
 * await ada.update({ name: 'Ada Lovelace' });
 *
 * const admins = await users.query().where('role', '=', 'admin').orderBy('name').get();
 * ```
 */

import { RecordNotFoundError, ValidationError } from '../errors';

import type { OrderDirection, SelectBuilder } from '../query/select-builder';
import type { WhereArgs } from '../query/where-builder';
import type { Row } from '../types';
import type { Orm } from './orm';

export class Table<T extends object = Row> {
  constructor(
    private readonly orm: Orm,
    readonly name: string,
    readonly keyColumn: string,
  ) {}

  async insert(item: Partial<T>): Promise<TableRecord<T>> {
    const row = await this.orm.insert<T>(this.name, item);
    return this.wrap(row);
  }

  /**
   * Look up one record by a single-column filter, e.g. `{ email: 'ada@example.com' }`
   */
  async get(filter: Partial<T>): Promise<TableRecord<T> | null> {
    const entries = Object.entries(filter);
    const [entry] = entries;
    if (entries.length !== 1 || entry === undefined) {
      throw new ValidationError(
        `Filter on ${this.name} must name exactly one column, got ${entries.length}`,
        'filter',
      );
    }

    const [column, value] = entry;
    const row = await this.orm.first<T>(this.name, column, value);
    return row === null ? null : this.wrap(row);
  }

  async getAll(): Promise<TableRecord<T>[]> {
    const rows = await this.orm.getAll<T>(this.name);
    return rows.map((row) => this.wrap(row));
  }

  query(): TableQuery<T> {
    return new TableQuery<T>(this, this.orm, this.orm.query<T>(this.name));
  }

  /** @internal */
  wrap(row: T): TableRecord<T> {
    return new TableRecord<T>(this.orm, this.name, this.keyColumn, row);
  }
}

/**
 * Chained SELECT on one table whose results come back as records
 */
export class TableQuery<T extends object = Row> {
  constructor(
    private readonly table: Table<T>,
    private readonly orm: Orm,
    private readonly builder: SelectBuilder<T>,
  ) {}

  where(...args: WhereArgs): this {
    const columns = args.length === 1 ? Object.keys(args[0]) : [args[0]];
    columns.forEach((column) => this.requireColumn(column));
    this.builder.where(...args);
    return this;
  }

  like(column: string, text: string): this {
    this.requireColumn(column);
    this.builder.like(column, text);
    return this;
  }

  ilike(column: string, text: string): this {
    this.requireColumn(column);
    this.builder.ilike(column, text);
    return this;
  }

  orderBy(column: string, direction?: OrderDirection): this {
    this.requireColumn(column);
    this.builder.orderBy(column, direction);
    return this;
  }

  limit(count: number): this {
    this.builder.limit(count);
    return this;
  }

  offset(count: number): this {
    this.builder.offset(count);
    return this;
  }

  distinct(): this {
    this.builder.distinct();
    return this;
  }

  groupBy(...columns: string[]): this {
    columns.forEach((column) => this.requireColumn(column));
    this.builder.groupBy(...columns);
    return this;
  }

  having(column: string, operator: string, value: unknown): this {
    this.builder.having(column, operator, value);
    return this;
  }

  toSQL(): { sql: string; bindings: unknown[] } {
    return this.builder.toSQL();
  }

  async get(): Promise<TableRecord<T>[]> {
    const rows = await this.builder.get();
    return rows.map((row) => this.table.wrap(row));
  }

  async first(): Promise<TableRecord<T> | null> {
    const row = await this.builder.first();
    return row === null ? null : this.table.wrap(row);
  }

  /**
   * Plain value of the first match
   *
   * @throws RecordNotFoundError when nothing matches
   */
  async firstValue(): Promise<T> {
    const row = await this.builder.first();
    if (row === null) {
      throw new RecordNotFoundError(this.table.name);
    }
    return row;
  }

  private requireColumn(column: string): void {
    this.orm.requireColumn(this.table.name, column);
  }
}

/**
 * One stored row, addressed by its key column
 */
export class TableRecord<T extends object = Row> {
  constructor(
    private readonly orm: Orm,
    readonly tableName: string,
    readonly keyColumn: string,
    private current: T,
  ) {}

  get value(): T {
    return this.current;
  }

  /**
   * Value of the key column
   *
   * @throws ValidationError when the row has none
   */
  get id(): unknown {
    const id = readField(this.current, this.keyColumn);
    if (id === undefined || id === null) {
      throw new ValidationError(
        `Record in ${this.tableName} has no value for key column "${this.keyColumn}"`,
        this.keyColumn,
      );
    }
    return id;
  }

  /**
   * Apply `changes` and re-read the row
   */
  async update(changes: Partial<T>): Promise<T> {
    const id = this.id;
    await this.orm.update<T>(this.tableName, this.keyColumn, id, changes);

    const nextId = readField(changes, this.keyColumn) ?? id;
    const row = await this.orm.first<T>(this.tableName, this.keyColumn, nextId);
    if (row === null) {
      throw new RecordNotFoundError(this.tableName);
    }
    this.current = row;
    return row;
  }

  /**
   * @returns number of deleted rows
   */
  async delete(): Promise<number> {
    return this.orm.delete(this.tableName, this.keyColumn, this.id);
  }
}

function readField(source: object, field: string): unknown {
  return new Map<string, unknown>(Object.entries(source)).get(field);
}

/**
 * Table Schema
 * Immutable description of a table, typed by the row shape it stores.
 *
 * @example
 * ```typescript
 * interface User {
 *   id: string;
 *   name: string;
 *   email: string;
 * }
 *
 * const users = defineTable<User>('users', (table) => {
 *   table.uuidPrimary('id');
 *   table.string('name');
 *   table.string('email').unique();
 * });
 * ```
 */

import { TableBuilder } from './TableBuilder';

import type { ColumnDefinition, ForeignKeyDefinition, IndexDefinition, TableDefinition } from './types';

export class TableSchema<T = unknown> {
  /** Row type carrier, never set at runtime */
  declare readonly __row?: T;

  readonly name: string;
  readonly columns: readonly ColumnDefinition[];
  readonly indexes: readonly IndexDefinition[];
  readonly foreignKeys: readonly ForeignKeyDefinition[];
  readonly primaryKey: readonly string[];

  private readonly columnMap: Map<string, ColumnDefinition>;

  constructor(private readonly definition: TableDefinition) {
    this.name = definition.name;
    this.columns = definition.columns;
    this.indexes = definition.indexes;
    this.foreignKeys = definition.foreignKeys;
    this.primaryKey =
      definition.primaryKey ?? definition.columns.filter((column) => column.primary).map((column) => column.name);
    this.columnMap = new Map(definition.columns.map((column) => [column.name, column]));
  }

  getColumn(name: string): ColumnDefinition | undefined {
    return this.columnMap.get(name);
  }

  hasColumn(name: string): boolean {
    return this.columnMap.has(name);
  }

  /**
   * Column used to address single records, if the table has a primary key
   */
  keyColumn(): string | undefined {
    return this.primaryKey[0];
  }

  toDefinition(): TableDefinition {
    return {
      ...this.definition,
      columns: [...this.definition.columns],
      indexes: [...this.definition.indexes],
      foreignKeys: [...this.definition.foreignKeys],
    };
  }
}

export function defineTable<T = unknown>(
  name: string,
  build: (table: TableBuilder) => void,
): TableSchema<T> {
  const builder = new TableBuilder(name);
  build(builder);
  return new TableSchema<T>(builder.getDefinition());
}

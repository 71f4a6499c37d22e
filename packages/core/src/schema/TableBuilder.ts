/**
 * Table Builder
 * Fluent API for defining table structure
 */

import { SchemaDefinitionError } from '../errors';
import { validateColumnName, validateTableName } from '../utils/validation';
import { ColumnBuilder, ForeignKeyBuilder } from './ColumnBuilder';

import type { ColumnType, IndexDefinition, TableDefinition } from './types';

export class TableBuilder {
  private readonly tableName: string;
  private columns: ColumnBuilder[] = [];
  private indexes: IndexDefinition[] = [];
  private foreignKeys: ForeignKeyBuilder[] = [];
  private primaryKeyColumns?: string[];

  constructor(tableName: string) {
    validateTableName(tableName);
    this.tableName = tableName;
  }

  // ============================================
  // Column Types
  // ============================================

  /**
   * Auto-incrementing integer primary key
   */
  increments(name: string = 'id'): ColumnBuilder {
    return this.addColumn(name, 'increments');
  }

  /**
   * Auto-incrementing big integer primary key
   */
  bigIncrements(name: string = 'id'): ColumnBuilder {
    return this.addColumn(name, 'bigIncrements');
  }

  integer(name: string): ColumnBuilder {
    return this.addColumn(name, 'integer');
  }

  bigInteger(name: string): ColumnBuilder {
    return this.addColumn(name, 'bigInteger');
  }

  smallInteger(name: string): ColumnBuilder {
    return this.addColumn(name, 'smallInteger');
  }

  float(name: string): ColumnBuilder {
    return this.addColumn(name, 'float');
  }

  double(name: string): ColumnBuilder {
    return this.addColumn(name, 'double');
  }

  decimal(name: string, precision: number = 10, scale: number = 2): ColumnBuilder {
    return this.addColumn(name, 'decimal').precision(precision, scale);
  }

  /**
   * String (VARCHAR) column
   */
  string(name: string, length: number = 255): ColumnBuilder {
    return this.addColumn(name, 'string').length(length);
  }

  text(name: string): ColumnBuilder {
    return this.addColumn(name, 'text');
  }

  boolean(name: string): ColumnBuilder {
    return this.addColumn(name, 'boolean');
  }

  date(name: string): ColumnBuilder {
    return this.addColumn(name, 'date');
  }

  timestamp(name: string): ColumnBuilder {
    return this.addColumn(name, 'timestamp');
  }

  json(name: string): ColumnBuilder {
    return this.addColumn(name, 'json');
  }

  jsonb(name: string): ColumnBuilder {
    return this.addColumn(name, 'jsonb');
  }

  uuid(name: string): ColumnBuilder {
    return this.addColumn(name, 'uuid');
  }

  // ============================================
  // Shortcut Methods
  // ============================================

  /**
   * Add created_at and updated_at timestamp columns
   */
  timestamps(): void {
    this.timestamp('created_at').defaultNow();
    this.timestamp('updated_at').defaultNow();
  }

  /**
   * Add a UUID primary key filled in on insert
   */
  uuidPrimary(name: string = 'id'): ColumnBuilder {
    return this.uuid(name).generated();
  }

  // ============================================
  // Indexes & Keys
  // ============================================

  index(columns: string | string[], name?: string): this {
    const columnArray = Array.isArray(columns) ? columns : [columns];
    this.indexes.push({
      name: name ?? `idx_${this.tableName}_${columnArray.join('_')}`,
      columns: columnArray,
      unique: false,
    });
    return this;
  }

  unique(columns: string | string[], name?: string): this {
    const columnArray = Array.isArray(columns) ? columns : [columns];
    this.indexes.push({
      name: name ?? `uniq_${this.tableName}_${columnArray.join('_')}`,
      columns: columnArray,
      unique: true,
    });
    return this;
  }

  /**
   * Set (composite) primary key columns
   */
  primary(columns: string | string[]): this {
    this.primaryKeyColumns = Array.isArray(columns) ? columns : [columns];
    return this;
  }

  /**
   * Add a foreign key constraint: `table.foreign('user_id').on('users')`
   * references `users.id` unless `references` is given.
   */
  foreign(column: string, references: string = 'id'): ForeignKeyBuilder {
    const builder = new ForeignKeyBuilder(column, references);
    this.foreignKeys.push(builder);
    return builder;
  }

  // ============================================
  // Internal Methods
  // ============================================

  private addColumn(name: string, type: ColumnType): ColumnBuilder {
    validateColumnName(name);
    if (this.columns.some((column) => column.name === name)) {
      throw new SchemaDefinitionError(`Duplicate column "${name}"`, this.tableName);
    }
    const builder = new ColumnBuilder(name, type);
    this.columns.push(builder);
    return builder;
  }

  /**
   * Resolve the builders into a table definition
   */
  getDefinition(): TableDefinition {
    const columns = this.columns.map((builder) => builder.getDefinition());
    const known = new Set(columns.map((column) => column.name));

    const requireColumns = (names: string[], context: string): void => {
      for (const name of names) {
        if (!known.has(name)) {
          throw new SchemaDefinitionError(`${context} references unknown column "${name}"`, this.tableName);
        }
      }
    };

    const indexes = [...this.indexes];
    for (const column of columns) {
      if (column.index) {
        indexes.push({ name: `idx_${this.tableName}_${column.name}`, columns: [column.name], unique: false });
      }
    }
    indexes.forEach((index) => requireColumns(index.columns, `Index "${index.name}"`));

    const foreignKeys = [
      ...columns.flatMap((column) => (column.references ? [column.references] : [])),
      ...this.foreignKeys.map((builder) => builder.getDefinition()),
    ];
    foreignKeys.forEach((fk) => requireColumns([fk.column], `Foreign key "${fk.name ?? fk.column}"`));

    if (this.primaryKeyColumns) {
      requireColumns(this.primaryKeyColumns, 'Primary key');
    }

    return {
      name: this.tableName,
      columns,
      indexes,
      foreignKeys,
      primaryKey: this.primaryKeyColumns ? [...this.primaryKeyColumns] : undefined,
    };
  }
}

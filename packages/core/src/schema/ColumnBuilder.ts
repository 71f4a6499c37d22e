/**
 * Column Builder
 * Fluent API for defining table columns.
 *
 * Columns are NOT NULL unless `nullable()` is called.
 */

import { SchemaDefinitionError } from '../errors';

import type { ColumnDefinition, ColumnType, ForeignKeyAction, ForeignKeyDefinition } from './types';

export class ColumnBuilder {
  private definition: ColumnDefinition;
  private foreignKey?: ForeignKeyBuilder;

  constructor(name: string, type: ColumnType) {
    const serial = type === 'increments' || type === 'bigIncrements';
    this.definition = {
      name,
      type,
      nullable: false,
      autoIncrement: serial,
      primary: serial,
      unique: false,
      index: false,
      generated: false,
    };
  }

  /**
   * Set column length (for string types)
   */
  length(length: number): this {
    this.definition.length = length;
    return this;
  }

  /**
   * Set precision and scale (for decimal types)
   */
  precision(precision: number, scale?: number): this {
    this.definition.precision = precision;
    this.definition.scale = scale;
    return this;
  }

  nullable(): this {
    this.definition.nullable = true;
    return this;
  }

  notNull(): this {
    this.definition.nullable = false;
    return this;
  }

  default(value: unknown): this {
    this.definition.defaultValue = value;
    return this;
  }

  /**
   * Set default value as raw SQL
   */
  defaultRaw(sql: string): this {
    this.definition.defaultRaw = sql;
    return this;
  }

  /**
   * Set default to current timestamp
   */
  defaultNow(): this {
    this.definition.defaultRaw = 'CURRENT_TIMESTAMP';
    return this;
  }

  primary(): this {
    this.definition.primary = true;
    this.definition.nullable = false;
    return this;
  }

  unique(): this {
    this.definition.unique = true;
    return this;
  }

  index(): this {
    this.definition.index = true;
    return this;
  }

  /**
   * Fill the column with a fresh v4 UUID on insert when the record has no
   * value for it. Implies primary key.
   */
  generated(): this {
    if (this.definition.type !== 'uuid') {
      throw new SchemaDefinitionError(
        `Column "${this.definition.name}" must be a uuid column to be generated`,
      );
    }
    this.definition.generated = true;
    return this.primary();
  }

  /**
   * Add foreign key reference
   */
  references(column: string): ForeignKeyBuilder {
    this.foreignKey = new ForeignKeyBuilder(this.definition.name, column);
    return this.foreignKey;
  }

  get name(): string {
    return this.definition.name;
  }

  getDefinition(): ColumnDefinition {
    const definition = { ...this.definition };
    const references = this.foreignKey?.getDefinition();
    if (references) {
      definition.references = references;
    }
    return definition;
  }
}

/**
 * Foreign Key Builder
 * Fluent API for defining foreign key constraints
 */
export class ForeignKeyBuilder {
  private fkDefinition: Omit<ForeignKeyDefinition, 'table'> & { table?: string };

  constructor(column: string, referenceColumn: string) {
    this.fkDefinition = { column, referenceColumn };
  }

  /**
   * Set the referenced table
   */
  on(tableName: string): this {
    this.fkDefinition.table = tableName;
    return this;
  }

  onDelete(action: ForeignKeyAction): this {
    this.fkDefinition.onDelete = action;
    return this;
  }

  onUpdate(action: ForeignKeyAction): this {
    this.fkDefinition.onUpdate = action;
    return this;
  }

  /**
   * Set constraint name
   */
  name(name: string): this {
    this.fkDefinition.name = name;
    return this;
  }

  getDefinition(): ForeignKeyDefinition {
    const { table } = this.fkDefinition;
    if (!table) {
      throw new SchemaDefinitionError(
        `Foreign key on "${this.fkDefinition.column}" is missing its referenced table`,
      );
    }
    return {
      ...this.fkDefinition,
      table,
      name: this.fkDefinition.name ?? `fk_${this.fkDefinition.column}_${table}`,
    };
  }
}

/**
 * Schema Types
 * Type definitions for table schemas and their DDL
 */

export type ColumnType =
  | 'increments'
  | 'bigIncrements'
  | 'integer'
  | 'bigInteger'
  | 'smallInteger'
  | 'float'
  | 'double'
  | 'decimal'
  | 'string'
  | 'text'
  | 'boolean'
  | 'date'
  | 'timestamp'
  | 'json'
  | 'jsonb'
  | 'uuid';

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
  length?: number;
  precision?: number;
  scale?: number;
  nullable: boolean;
  defaultValue?: unknown;
  defaultRaw?: string;
  autoIncrement: boolean;
  primary: boolean;
  unique: boolean;
  index: boolean;
  /** Value is generated client-side (uuid v4) when missing on insert */
  generated: boolean;
  references?: ForeignKeyDefinition;
}

export interface ForeignKeyDefinition {
  column: string;
  table: string;
  referenceColumn: string;
  onDelete?: ForeignKeyAction;
  onUpdate?: ForeignKeyAction;
  name?: string;
}

export type ForeignKeyAction = 'CASCADE' | 'SET NULL' | 'SET DEFAULT' | 'RESTRICT' | 'NO ACTION';

export interface IndexDefinition {
  name: string;
  columns: string[];
  unique: boolean;
}

export interface TableDefinition {
  name: string;
  columns: ColumnDefinition[];
  indexes: IndexDefinition[];
  foreignKeys: ForeignKeyDefinition[];
  primaryKey?: string[];
}

export interface CreateOptions {
  ifNotExists?: boolean;
}

export interface SchemaDialect {
  createTable(definition: TableDefinition, options?: CreateOptions): string;
  createIndex(tableName: string, index: IndexDefinition, options?: CreateOptions): string;
  dropTable(tableName: string): string;
  dropTableIfExists(tableName: string): string;
  hasTable(tableName: string): string;
  quoteIdentifier(name: string): string;
  quoteValue(value: unknown): string;
}

/**
 * PostgreSQL Dialect
 * DDL generation for PostgreSQL
 */

import type {
  ColumnDefinition,
  CreateOptions,
  ForeignKeyDefinition,
  IndexDefinition,
  SchemaDialect,
  TableDefinition,
} from '../types';

export class PostgreSQLDialect implements SchemaDialect {
  readonly dialect = 'postgresql' as const;

  /**
   * Quote an identifier (table/column name)
   */
  quoteIdentifier(name: string): string {
    return `"${name.replaceAll('"', '""')}"`;
  }

  /**
   * Quote a value for SQL
   */
  quoteValue(value: unknown): string {
    if (value === null || value === undefined) {
      return 'NULL';
    }
    if (typeof value === 'boolean') {
      return value ? 'TRUE' : 'FALSE';
    }
    if (typeof value === 'number') {
      return String(value);
    }
    if (typeof value === 'string') {
      return `'${value.replaceAll("'", "''")}'`;
    }
    if (value instanceof Date) {
      return `'${value.toISOString()}'`;
    }
    return `'${JSON.stringify(value).replaceAll("'", "''")}'`;
  }

  /**
   * Generate CREATE TABLE statement
   */
  createTable(definition: TableDefinition, options: CreateOptions = {}): string {
    const composite = definition.primaryKey !== undefined && definition.primaryKey.length > 0;
    const parts: string[] = definition.columns.map((column) => this.columnToSQL(column, !composite));

    if (composite && definition.primaryKey) {
      const pkColumns = definition.primaryKey.map((c) => this.quoteIdentifier(c)).join(', ');
      parts.push(`PRIMARY KEY (${pkColumns})`);
    }

    for (const fk of definition.foreignKeys) {
      parts.push(this.foreignKeyToSQL(fk));
    }

    const ifNotExists = options.ifNotExists ? 'IF NOT EXISTS ' : '';
    return `CREATE TABLE ${ifNotExists}${this.quoteIdentifier(definition.name)} (\n  ${parts.join(',\n  ')}\n)`;
  }

  /**
   * Create index statement
   */
  createIndex(tableName: string, index: IndexDefinition, options: CreateOptions = {}): string {
    const columns = index.columns.map((c) => this.quoteIdentifier(c)).join(', ');
    const unique = index.unique ? 'UNIQUE ' : '';
    const ifNotExists = options.ifNotExists ? 'IF NOT EXISTS ' : '';

    return `CREATE ${unique}INDEX ${ifNotExists}${this.quoteIdentifier(index.name)} ON ${this.quoteIdentifier(tableName)} (${columns})`;
  }

  dropTable(tableName: string): string {
    return `DROP TABLE ${this.quoteIdentifier(tableName)}`;
  }

  dropTableIfExists(tableName: string): string {
    return `DROP TABLE IF EXISTS ${this.quoteIdentifier(tableName)}`;
  }

  /**
   * Generate query to check if table exists
   */
  hasTable(tableName: string): string {
    return `SELECT 1 FROM information_schema.tables WHERE table_schema = current_schema() AND table_name = ${this.quoteValue(tableName)} LIMIT 1`;
  }

  private columnToSQL(column: ColumnDefinition, inlinePrimary: boolean): string {
    const parts: string[] = [this.quoteIdentifier(column.name), this.columnTypeToSQL(column)];
    const primary = inlinePrimary && column.primary;

    // PRIMARY KEY implies NOT NULL
    if (!column.nullable && !primary) {
      parts.push('NOT NULL');
    }

    if (column.defaultRaw) {
      parts.push(`DEFAULT ${column.defaultRaw}`);
    } else if (column.defaultValue !== undefined) {
      parts.push(`DEFAULT ${this.quoteValue(column.defaultValue)}`);
    }

    if (primary) {
      parts.push('PRIMARY KEY');
    }

    if (column.unique && !primary) {
      parts.push('UNIQUE');
    }

    return parts.join(' ');
  }

  private columnTypeToSQL(column: ColumnDefinition): string {
    switch (column.type) {
      case 'increments': {
        return 'SERIAL';
      }
      case 'bigIncrements': {
        return 'BIGSERIAL';
      }
      case 'integer': {
        return 'INTEGER';
      }
      case 'bigInteger': {
        return 'BIGINT';
      }
      case 'smallInteger': {
        return 'SMALLINT';
      }
      case 'float': {
        return 'REAL';
      }
      case 'double': {
        return 'DOUBLE PRECISION';
      }
      case 'decimal': {
        return `NUMERIC(${column.precision ?? 10},${column.scale ?? 2})`;
      }
      case 'string': {
        return `VARCHAR(${column.length ?? 255})`;
      }
      case 'text': {
        return 'TEXT';
      }
      case 'boolean': {
        return 'BOOLEAN';
      }
      case 'date': {
        return 'DATE';
      }
      case 'timestamp': {
        return 'TIMESTAMP';
      }
      case 'json': {
        return 'JSON';
      }
      case 'jsonb': {
        return 'JSONB';
      }
      case 'uuid': {
        return 'UUID';
      }
    }
  }

  private foreignKeyToSQL(fk: ForeignKeyDefinition): string {
    const parts: string[] = [
      'CONSTRAINT',
      this.quoteIdentifier(fk.name ?? `fk_${fk.column}_${fk.table}`),
      `FOREIGN KEY (${this.quoteIdentifier(fk.column)})`,
      `REFERENCES ${this.quoteIdentifier(fk.table)} (${this.quoteIdentifier(fk.referenceColumn)})`,
    ];

    if (fk.onDelete) {
      parts.push(`ON DELETE ${fk.onDelete}`);
    }

    if (fk.onUpdate) {
      parts.push(`ON UPDATE ${fk.onUpdate}`);
    }

    return parts.join(' ');
  }
}

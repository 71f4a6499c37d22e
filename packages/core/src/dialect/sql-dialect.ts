/**
 * SQL Dialect Base Class
 *
 * Database-agnostic SQL generation with dialect-specific overrides for
 * placeholder syntax and identifier escaping.
 */

import { AGGREGATE_PATTERN } from '../utils/validation';

export interface DialectConfig {
  /** Character used to escape identifiers (" for PostgreSQL) */
  identifierQuote: string;
  /** Whether INSERT/UPDATE/DELETE accept a RETURNING clause */
  supportsReturning: boolean;
}

const PLAIN_REFERENCE = /^(\*|[a-zA-Z_]\w*(\.([a-zA-Z_]\w*|\*))?)$/;

export abstract class SQLDialect {
  abstract readonly name: string;
  abstract readonly config: DialectConfig;

  private parameterIndex = 0;

  /**
   * Reset parameter index for new query
   */
  resetParameters(): void {
    this.parameterIndex = 0;
  }

  /**
   * Get next parameter placeholder
   */
  abstract getParameterPlaceholder(): string;

  /**
   * Escape an identifier (table name, column name).
   * `schema.table` is quoted part by part and `*` is left alone.
   */
  escapeIdentifier(identifier: string): string {
    const quote = this.config.identifierQuote;
    return identifier
      .split('.')
      .map((part) => (part === '*' ? part : `${quote}${part.replaceAll(quote, quote + quote)}${quote}`))
      .join('.');
  }

  /**
   * Escape a select-list entry. Plain column references are quoted,
   * expressions such as `COUNT(*) AS count` pass through.
   */
  escapeSelectColumn(column: string): string {
    return PLAIN_REFERENCE.test(column) ? this.escapeIdentifier(column) : column;
  }

  /**
   * Escape a condition column, which may be an aggregate such as `COUNT(*)`
   */
  escapeColumnExpression(expression: string): string {
    const match = AGGREGATE_PATTERN.exec(expression);
    if (!match) {
      return this.escapeIdentifier(expression);
    }
    const [, fn = '', argument = ''] = match;
    return `${fn.toUpperCase()}(${argument === '*' ? '*' : this.escapeIdentifier(argument)})`;
  }

  /**
   * Build SELECT SQL from components
   */
  buildSelect(components: SelectComponents): BuiltSQL {
    const parts: string[] = [];
    const bindings: unknown[] = [];

    parts.push('SELECT');
    if (components.distinct) {
      parts.push('DISTINCT');
    }
    parts.push(
      components.columns.length > 0
        ? components.columns.map((col) => this.escapeSelectColumn(col)).join(', ')
        : '*',
    );

    if (components.from) {
      parts.push('FROM', this.escapeIdentifier(components.from));
    }

    for (const join of components.joins) {
      const keyword = join.type === 'INNER' ? 'JOIN' : `${join.type} JOIN`;
      parts.push(
        `${keyword} ${this.escapeIdentifier(join.table)} ON ${this.escapeIdentifier(join.left)} = ${this.escapeIdentifier(join.right)}`,
      );
    }

    if (components.where.length > 0) {
      parts.push('WHERE', this.buildWhereClause(components.where, bindings));
    }

    if (components.groupBy.length > 0) {
      parts.push('GROUP BY', components.groupBy.map((col) => this.escapeIdentifier(col)).join(', '));
    }

    if (components.having.length > 0) {
      parts.push('HAVING', this.buildWhereClause(components.having, bindings));
    }

    if (components.orderBy.length > 0) {
      parts.push(
        'ORDER BY',
        components.orderBy
          .map(({ column, direction }) => `${this.escapeIdentifier(column)} ${direction}`)
          .join(', '),
      );
    }

    this.appendLimitOffset(parts, components.limit, components.offset);

    return {
      sql: parts.join(' '),
      bindings,
    };
  }

  /**
   * Build INSERT SQL from components
   */
  buildInsert(components: InsertComponents): BuiltSQL {
    const parts: string[] = [];
    const bindings: unknown[] = [];

    parts.push('INSERT INTO', this.escapeIdentifier(components.table));

    const columns = Object.keys(components.data[0] ?? {});
    if (columns.length === 0) {
      parts.push('DEFAULT VALUES');
    } else {
      parts.push(`(${columns.map((col) => this.escapeIdentifier(col)).join(', ')})`, 'VALUES');

      const valueSets: string[] = [];
      for (const row of components.data) {
        const placeholders: string[] = [];
        for (const col of columns) {
          placeholders.push(this.getParameterPlaceholder());
          bindings.push(row[col]);
        }
        valueSets.push(`(${placeholders.join(', ')})`);
      }
      parts.push(valueSets.join(', '));
    }

    this.appendReturning(parts, components.returning);

    return {
      sql: parts.join(' '),
      bindings,
    };
  }

  /**
   * Build UPDATE SQL from components
   */
  buildUpdate(components: UpdateComponents): BuiltSQL {
    const parts: string[] = [];
    const bindings: unknown[] = [];

    parts.push('UPDATE', this.escapeIdentifier(components.table), 'SET');

    const setClauses: string[] = [];
    for (const [column, value] of Object.entries(components.data)) {
      setClauses.push(`${this.escapeIdentifier(column)} = ${this.getParameterPlaceholder()}`);
      bindings.push(value);
    }
    parts.push(setClauses.join(', '));

    // Conditions are numbered after the SET placeholders
    const where = components.where();
    if (where.length > 0) {
      parts.push('WHERE', this.buildWhereClause(where, bindings));
    }

    this.appendReturning(parts, components.returning);

    return {
      sql: parts.join(' '),
      bindings,
    };
  }

  /**
   * Build DELETE SQL from components
   */
  buildDelete(components: DeleteComponents): BuiltSQL {
    const parts: string[] = [];
    const bindings: unknown[] = [];

    parts.push('DELETE FROM', this.escapeIdentifier(components.table));

    if (components.where.length > 0) {
      parts.push('WHERE', this.buildWhereClause(components.where, bindings));
    }

    this.appendReturning(parts, components.returning);

    return {
      sql: parts.join(' '),
      bindings,
    };
  }

  /**
   * Build WHERE clause from conditions
   */
  protected buildWhereClause(conditions: WhereCondition[], bindings: unknown[]): string {
    return conditions
      .map((condition, index) => {
        const prefix = index === 0 ? '' : ` ${condition.type} `;
        bindings.push(...condition.bindings);
        return `${prefix}${condition.sql}`;
      })
      .join('');
  }

  protected appendLimitOffset(parts: string[], limit?: number, offset?: number): void {
    if (limit !== undefined) {
      parts.push(`LIMIT ${limit}`);
    }
    if (offset !== undefined) {
      parts.push(`OFFSET ${offset}`);
    }
  }

  protected appendReturning(parts: string[], returning?: string[]): void {
    if (this.config.supportsReturning && returning && returning.length > 0) {
      parts.push('RETURNING', returning.map((col) => this.escapeIdentifier(col)).join(', '));
    }
  }

  /**
   * Increment and return parameter index (for PostgreSQL-style)
   */
  protected nextParameterIndex(): number {
    return ++this.parameterIndex;
  }
}

// ============ Type Definitions ============

export interface BuiltSQL {
  sql: string;
  bindings: unknown[];
}

export interface WhereCondition {
  type: 'AND' | 'OR';
  sql: string;
  bindings: unknown[];
}

export interface JoinDefinition {
  type: 'INNER' | 'LEFT';
  table: string;
  left: string;
  right: string;
}

export interface OrderByDefinition {
  column: string;
  direction: 'ASC' | 'DESC';
}

export interface SelectComponents {
  columns: string[];
  distinct?: boolean;
  from?: string;
  joins: JoinDefinition[];
  where: WhereCondition[];
  groupBy: string[];
  having: WhereCondition[];
  orderBy: OrderByDefinition[];
  limit?: number;
  offset?: number;
}

export interface InsertComponents {
  table: string;
  data: Record<string, unknown>[];
  returning?: string[];
}

export interface UpdateComponents {
  table: string;
  data: Record<string, unknown>;
  where: () => WhereCondition[];
  returning?: string[];
}

export interface DeleteComponents {
  table: string;
  where: WhereCondition[];
  returning?: string[];
}

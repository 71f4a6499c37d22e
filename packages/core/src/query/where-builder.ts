/**
 * Where Builder
 *
 * Handles WHERE (and HAVING) clause construction.
 * Used by SelectBuilder and the Orm's update/delete helpers.
 *
 * Supports:
 * - Simple equality: where('column', value)
 * - Operators: where('column', '>=', value)
 * - Object syntax: where({ column1: value1, column2: value2 })
 * - NULL checks: whereNull, whereNotNull
 * - IN clauses: whereIn, whereNotIn
 * - BETWEEN: whereBetween
 * - LIKE / ILIKE: whereLike, whereILike, and like/ilike which wrap the text in `%`
 */

import { normalizeOperator, validateColumnExpression, validateColumnReference } from '../utils/validation';

import type { SQLDialect, WhereCondition } from '../dialect/sql-dialect';
import type { ComparisonOperator } from '../utils/validation';

export type WhereArgs =
  | [conditions: Record<string, unknown>]
  | [column: string, value: unknown]
  | [column: string, operator: string, value: unknown];

export type WhereConditionInput =
  | { type: 'simple'; column: string; operator: ComparisonOperator; value: unknown }
  | { type: 'object'; data: Record<string, unknown> }
  | { type: 'null'; column: string; not: boolean }
  | { type: 'in'; column: string; values: unknown[]; not: boolean }
  | { type: 'between'; column: string; from: unknown; to: unknown; not: boolean };

export class WhereBuilder {
  private conditions: Array<{ conjunction: 'AND' | 'OR'; input: WhereConditionInput }> = [];

  constructor(private readonly dialect: SQLDialect) {}

  /**
   * Add AND WHERE condition
   */
  where(...args: WhereArgs): this {
    this.push('AND', this.parseWhereArgs(args));
    return this;
  }

  /**
   * Add OR WHERE condition
   */
  orWhere(...args: WhereArgs): this {
    this.push('OR', this.parseWhereArgs(args));
    return this;
  }

  whereNull(column: string): this {
    validateColumnReference(column);
    this.push('AND', { type: 'null', column, not: false });
    return this;
  }

  whereNotNull(column: string): this {
    validateColumnReference(column);
    this.push('AND', { type: 'null', column, not: true });
    return this;
  }

  whereIn(column: string, values: unknown[]): this {
    validateColumnReference(column);
    this.push('AND', { type: 'in', column, values, not: false });
    return this;
  }

  whereNotIn(column: string, values: unknown[]): this {
    validateColumnReference(column);
    this.push('AND', { type: 'in', column, values, not: true });
    return this;
  }

  whereBetween(column: string, from: unknown, to: unknown): this {
    validateColumnReference(column);
    this.push('AND', { type: 'between', column, from, to, not: false });
    return this;
  }

  whereNotBetween(column: string, from: unknown, to: unknown): this {
    validateColumnReference(column);
    this.push('AND', { type: 'between', column, from, to, not: true });
    return this;
  }

  /**
   * WHERE column LIKE pattern (pattern used as given)
   */
  whereLike(column: string, pattern: string): this {
    return this.where(column, 'LIKE', pattern);
  }

  whereNotLike(column: string, pattern: string): this {
    return this.where(column, 'NOT LIKE', pattern);
  }

  /**
   * WHERE column ILIKE pattern (case-insensitive, pattern used as given)
   */
  whereILike(column: string, pattern: string): this {
    return this.where(column, 'ILIKE', pattern);
  }

  /**
   * WHERE column LIKE '%text%'
   */
  like(column: string, text: string): this {
    return this.whereLike(column, `%${text}%`);
  }

  /**
   * WHERE column ILIKE '%text%'
   */
  ilike(column: string, text: string): this {
    return this.whereILike(column, `%${text}%`);
  }

  /**
   * Build conditions for use by SQLDialect. Placeholders are drawn from the
   * dialect in call order, so build must run in clause order.
   */
  build(): WhereCondition[] {
    return this.conditions.map(({ conjunction, input }, index) => {
      const result = this.buildCondition(input);
      return {
        type: index === 0 ? 'AND' : conjunction,
        sql: result.sql,
        bindings: result.bindings,
      };
    });
  }

  hasConditions(): boolean {
    return this.conditions.length > 0;
  }

  clear(): void {
    this.conditions = [];
  }

  clone(dialect: SQLDialect = this.dialect): WhereBuilder {
    const cloned = new WhereBuilder(dialect);
    cloned.conditions = this.conditions.map((cond) => ({
      conjunction: cond.conjunction,
      input: cloneInput(cond.input),
    }));
    return cloned;
  }

  private push(conjunction: 'AND' | 'OR', input: WhereConditionInput): void {
    this.conditions.push({ conjunction, input });
  }

  private parseWhereArgs(args: WhereArgs): WhereConditionInput {
    if (args.length === 1) {
      Object.keys(args[0]).forEach(validateColumnReference);
      return { type: 'object', data: { ...args[0] } };
    }

    if (args.length === 2) {
      validateColumnExpression(args[0]);
      return { type: 'simple', column: args[0], operator: '=', value: args[1] };
    }

    validateColumnExpression(args[0]);
    return { type: 'simple', column: args[0], operator: normalizeOperator(args[1]), value: args[2] };
  }

  private buildCondition(input: WhereConditionInput): { sql: string; bindings: unknown[] } {
    switch (input.type) {
      case 'simple': {
        return this.buildSimpleCondition(input.column, input.operator, input.value);
      }

      case 'object': {
        return this.buildObjectCondition(input.data);
      }

      case 'null': {
        return {
          sql: `${this.dialect.escapeIdentifier(input.column)} IS ${input.not ? 'NOT ' : ''}NULL`,
          bindings: [],
        };
      }

      case 'in': {
        return this.buildInCondition(input.column, input.values, input.not);
      }

      case 'between': {
        const column = this.dialect.escapeIdentifier(input.column);
        const from = this.dialect.getParameterPlaceholder();
        const to = this.dialect.getParameterPlaceholder();
        return {
          sql: `${column} ${input.not ? 'NOT BETWEEN' : 'BETWEEN'} ${from} AND ${to}`,
          bindings: [input.from, input.to],
        };
      }
    }
  }

  private buildSimpleCondition(
    column: string,
    operator: ComparisonOperator,
    value: unknown,
  ): { sql: string; bindings: unknown[] } {
    const escapedColumn = this.dialect.escapeColumnExpression(column);

    if (value === null || value === undefined) {
      if (operator === '=') {
        return { sql: `${escapedColumn} IS NULL`, bindings: [] };
      }
      if (operator === '!=' || operator === '<>') {
        return { sql: `${escapedColumn} IS NOT NULL`, bindings: [] };
      }
    }

    return {
      sql: `${escapedColumn} ${operator} ${this.dialect.getParameterPlaceholder()}`,
      bindings: [value],
    };
  }

  private buildObjectCondition(data: Record<string, unknown>): {
    sql: string;
    bindings: unknown[];
  } {
    const clauses: string[] = [];
    const bindings: unknown[] = [];

    for (const [column, value] of Object.entries(data)) {
      const result = this.buildSimpleCondition(column, '=', value);
      clauses.push(result.sql);
      bindings.push(...result.bindings);
    }

    return {
      sql: clauses.length > 1 ? `(${clauses.join(' AND ')})` : clauses[0] ?? '1=1',
      bindings,
    };
  }

  private buildInCondition(
    column: string,
    values: unknown[],
    not: boolean,
  ): { sql: string; bindings: unknown[] } {
    if (values.length === 0) {
      // Empty IN clause - always false (or true for NOT IN)
      return { sql: not ? '1=1' : '1=0', bindings: [] };
    }

    const placeholders = values.map(() => this.dialect.getParameterPlaceholder());
    const operator = not ? 'NOT IN' : 'IN';

    return {
      sql: `${this.dialect.escapeIdentifier(column)} ${operator} (${placeholders.join(', ')})`,
      bindings: [...values],
    };
  }
}

function cloneInput(input: WhereConditionInput): WhereConditionInput {
  switch (input.type) {
    case 'object': {
      return { ...input, data: { ...input.data } };
    }
    case 'in': {
      return { ...input, values: [...input.values] };
    }
    default: {
      return { ...input };
    }
  }
}

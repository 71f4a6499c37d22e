import { ValidationError } from '../errors';

import type { ConnectionConfig } from '../types';

const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export const COMPARISON_OPERATORS = [
  '=',
  '!=',
  '<>',
  '<',
  '<=',
  '>',
  '>=',
  'LIKE',
  'NOT LIKE',
  'ILIKE',
  'NOT ILIKE',
] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export function validateConnectionConfig(config: ConnectionConfig): void {
  if (!config.connectionString) {
    if (!config.host) {
      throw new ValidationError('Host is required when connectionString is not provided', 'host');
    }

    if (!config.database) {
      throw new ValidationError(
        'Database name is required when connectionString is not provided',
        'database',
      );
    }
  }

  if (config.port !== undefined && (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535)) {
    throw new ValidationError('Port must be a number between 1 and 65535', 'port');
  }

  if (config.pool?.max !== undefined && (!Number.isInteger(config.pool.max) || config.pool.max < 1)) {
    throw new ValidationError('Pool size must be a positive integer', 'pool.max');
  }

  if (config.connectionTimeout !== undefined && config.connectionTimeout < 0) {
    throw new ValidationError('Connection timeout must be a non-negative number', 'connectionTimeout');
  }

  if (config.pool?.idleTimeout !== undefined && config.pool.idleTimeout < 0) {
    throw new ValidationError('Idle timeout must be a non-negative number', 'pool.idleTimeout');
  }
}

export function validateSQL(sql: string): void {
  if (sql.trim().length === 0) {
    throw new ValidationError('SQL query cannot be empty');
  }
}

export function validateTableName(tableName: string): void {
  if (!IDENTIFIER_PATTERN.test(tableName)) {
    throw new ValidationError(
      'Table name must start with a letter or underscore and contain only letters, numbers, and underscores',
      'tableName',
    );
  }
}

export function validateColumnName(columnName: string): void {
  if (!IDENTIFIER_PATTERN.test(columnName)) {
    throw new ValidationError(
      'Column name must start with a letter or underscore and contain only letters, numbers, and underscores',
      'columnName',
    );
  }
}

/**
 * Column reference that may be qualified with its table (`users.id`)
 */
export function validateColumnReference(reference: string): void {
  const parts = reference.split('.');
  if (parts.length > 2) {
    throw new ValidationError(`Invalid column reference: ${reference}`, 'columnName');
  }
  parts.forEach(validateColumnName);
}

/**
 * Aggregate over one column or `*`, as used in HAVING: `COUNT(*)`, `sum(orders.total)`
 */
export const AGGREGATE_PATTERN = /^(COUNT|SUM|AVG|MIN|MAX)\((\*|[a-zA-Z_]\w*(?:\.[a-zA-Z_]\w*)?)\)$/i;

/**
 * Column reference or single-column aggregate
 */
export function validateColumnExpression(expression: string): void {
  if (!AGGREGATE_PATTERN.test(expression)) {
    validateColumnReference(expression);
  }
}

export function normalizeOperator(operator: string): ComparisonOperator {
  const normalized = operator.trim().replace(/\s+/g, ' ').toUpperCase();
  const match = COMPARISON_OPERATORS.find((candidate) => candidate === normalized);
  if (!match) {
    throw new ValidationError(`Unsupported operator: ${operator}`, 'operator');
  }
  return match;
}

export function validateNonNegativeInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer`, field);
  }
}

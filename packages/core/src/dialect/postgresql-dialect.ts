/**
 * PostgreSQL Dialect Implementation
 *
 * - Double quote (") identifier quoting
 * - Numbered ($1, $2) parameter placeholders
 * - RETURNING clause support
 */

import { SQLDialect } from './sql-dialect';

import type { DialectConfig } from './sql-dialect';

export class PostgreSQLDialect extends SQLDialect {
  readonly name = 'postgresql';

  readonly config: DialectConfig = {
    identifierQuote: '"',
    supportsReturning: true,
  };

  getParameterPlaceholder(): string {
    return `$${this.nextParameterIndex()}`;
  }
}

export class DatabaseError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'DatabaseError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class RowkitError extends DatabaseError {
  constructor(message: string, public override code?: string, public override cause?: Error) {
    super(message, code, cause);
    this.name = 'RowkitError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConnectionError extends RowkitError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONNECTION_ERROR', cause);
    this.name = 'ConnectionError';
  }
}

export class QueryError extends RowkitError {
  constructor(
    message: string,
    public sql?: string,
    public params?: unknown[],
    cause?: Error,
  ) {
    super(message, 'QUERY_ERROR', cause);
    this.name = 'QueryError';
  }
}

export class TimeoutError extends RowkitError {
  constructor(message: string, public timeout?: number, cause?: Error) {
    super(message, 'TIMEOUT_ERROR', cause);
    this.name = 'TimeoutError';
  }
}

export class ValidationError extends RowkitError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

export class SchemaNotFoundError extends RowkitError {
  constructor(public table: string) {
    super(`Table schema not found: ${table}`, 'SCHEMA_NOT_FOUND');
    this.name = 'SchemaNotFoundError';
  }
}

export class SchemaDefinitionError extends RowkitError {
  constructor(message: string, public table?: string) {
    super(message, 'SCHEMA_DEFINITION_ERROR');
    this.name = 'SchemaDefinitionError';
  }
}

export class RecordNotFoundError extends RowkitError {
  constructor(public table?: string) {
    super(table ? `No record found in ${table}` : 'No record found', 'RECORD_NOT_FOUND');
    this.name = 'RecordNotFoundError';
  }
}

/**
 * Normalize a thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

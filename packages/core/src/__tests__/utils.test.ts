import { describe, it, expect, vi, afterEach } from 'vitest';

import {
  retry,
  isNetworkError,
  withTimeout,
  generateUUID,
  createConsoleLogger,
  truncateSql,
  normalizeOperator,
  validateConnectionConfig,
  validateColumnReference,
  validateNonNegativeInteger,
  validateSQL,
  validateTableName,
  validateColumnName,
  ConnectionError,
  TimeoutError,
  ValidationError,
} from '../index';

describe('Utils', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('retry', () => {
    it('should retry network failures', async () => {
      let attempts = 0;
      const fn = vi.fn(async () => {
        attempts++;
        if (attempts < 3) {
          throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
        }
        return 'success';
      });

      const result = await retry(fn, { maxRetries: 3, retryDelay: 1 });
      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should throw after max retries', async () => {
      const fn = vi.fn(async () => {
        throw new Error('ECONNREFUSED');
      });

      await expect(retry(fn, { maxRetries: 2, retryDelay: 1 })).rejects.toThrow('ECONNREFUSED');
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should not retry other errors', async () => {
      const fn = vi.fn(async () => {
        throw new Error('password authentication failed');
      });

      await expect(retry(fn, { maxRetries: 3, retryDelay: 1 })).rejects.toThrow(
        'password authentication failed',
      );
      expect(fn).toHaveBeenCalledTimes(1);
    });
  });

  describe('isNetworkError', () => {
    it('should look at error codes through the cause chain', () => {
      const driverError = Object.assign(new Error('connect failed'), { code: 'ETIMEDOUT' });
      const wrapped = new ConnectionError('Failed to initialize PostgreSQL connection pool', driverError);

      expect(isNetworkError(wrapped)).toBe(true);
      expect(isNetworkError(new ConnectionError('Failed', new Error('bad password')))).toBe(false);
    });
  });

  describe('withTimeout', () => {
    it('should complete within timeout', async () => {
      const promise = new Promise((resolve) => setTimeout(() => resolve('success'), 5));
      await expect(withTimeout(promise, 200)).resolves.toBe('success');
    });

    it('should throw TimeoutError when exceeded', async () => {
      const promise = new Promise((resolve) => setTimeout(() => resolve('late'), 200));
      await expect(withTimeout(promise, 5)).rejects.toThrow('Operation timed out after 5ms');
      await expect(withTimeout(promise, 5, 'Too slow')).rejects.toBeInstanceOf(TimeoutError);
    });
  });

  describe('generateUUID', () => {
    it('should generate distinct v4 UUIDs', () => {
      const uuid = generateUUID();
      expect(uuid).toMatch(/^[\da-f]{8}-[\da-f]{4}-4[\da-f]{3}-[89ab][\da-f]{3}-[\da-f]{12}$/);
      expect(generateUUID()).not.toBe(uuid);
    });
  });

  describe('logging', () => {
    it('should prefix console messages', () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => {});
      createConsoleLogger().info('Connected', { database: 'app' });
      expect(info).toHaveBeenCalledWith('[rowkit] Connected', { database: 'app' });
    });

    it('should truncate long SQL', () => {
      expect(truncateSql('SELECT 1')).toBe('SELECT 1');
      expect(truncateSql('SELECT * FROM users', 6)).toBe('SELECT...');
    });
  });

  describe('validation utilities', () => {
    describe('validateConnectionConfig', () => {
      it('should accept a host config', () => {
        expect(() => validateConnectionConfig({ host: 'localhost', database: 'test' })).not.toThrow();
      });

      it('should accept a connection string', () => {
        expect(() =>
          validateConnectionConfig({ connectionString: 'postgresql://localhost/test' }),
        ).not.toThrow();
      });

      it('should require a host without connection string', () => {
        expect(() => validateConnectionConfig({ database: 'test' })).toThrow(
          'Host is required when connectionString is not provided',
        );
      });

      it('should validate port range and pool size', () => {
        expect(() => validateConnectionConfig({ host: 'localhost', database: 'test', port: 0 })).toThrow(
          ValidationError,
        );
        expect(() =>
          validateConnectionConfig({ host: 'localhost', database: 'test', pool: { max: 0 } }),
        ).toThrow('Pool size must be a positive integer');
      });
    });

    describe('validateSQL', () => {
      it('should reject blank SQL', () => {
        expect(() => validateSQL('SELECT * FROM users')).not.toThrow();
        expect(() => validateSQL('   ')).toThrow('SQL query cannot be empty');
      });
    });

    describe('identifiers', () => {
      it('should validate table and column names', () => {
        expect(() => validateTableName('user_accounts')).not.toThrow();
        expect(() => validateTableName('user-accounts')).toThrow(ValidationError);
        expect(() => validateColumnName('_created')).not.toThrow();
        expect(() => validateColumnName('column name')).toThrow(ValidationError);
      });

      it('should allow one table qualifier in column references', () => {
        expect(() => validateColumnReference('users.id')).not.toThrow();
        expect(() => validateColumnReference('public.users.id')).toThrow('Invalid column reference: public.users.id');
      });
    });

    describe('normalizeOperator', () => {
      it('should normalize case and spacing', () => {
        expect(normalizeOperator('not   like')).toBe('NOT LIKE');
        expect(normalizeOperator(' ilike ')).toBe('ILIKE');
        expect(normalizeOperator('>=')).toBe('>=');
      });

      it('should reject unknown operators', () => {
        expect(() => normalizeOperator('; DROP TABLE users')).toThrow(
          'Unsupported operator: ; DROP TABLE users',
        );
      });
    });

    describe('validateNonNegativeInteger', () => {
      it('should reject negatives and fractions', () => {
        expect(() => validateNonNegativeInteger(0, 'limit')).not.toThrow();
        expect(() => validateNonNegativeInteger(-1, 'limit')).toThrow('limit must be a non-negative integer');
        expect(() => validateNonNegativeInteger(1.5, 'offset')).toThrow(ValidationError);
      });
    });
  });
});

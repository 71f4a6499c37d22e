import { describe, it, expect, beforeEach } from 'vitest';

import { PostgreSQLDialect } from '../postgresql-dialect';

import type { SelectComponents, WhereCondition } from '../sql-dialect';

function select(overrides: Partial<SelectComponents>): SelectComponents {
  return {
    columns: ['*'],
    joins: [],
    where: [],
    groupBy: [],
    having: [],
    orderBy: [],
    ...overrides,
  };
}

describe('PostgreSQLDialect', () => {
  let dialect: PostgreSQLDialect;

  beforeEach(() => {
    dialect = new PostgreSQLDialect();
    dialect.resetParameters();
  });

  describe('config', () => {
    it('should describe PostgreSQL', () => {
      expect(dialect.name).toBe('postgresql');
      expect(dialect.config.identifierQuote).toBe('"');
      expect(dialect.config.supportsReturning).toBe(true);
    });
  });

  describe('getParameterPlaceholder', () => {
    it('should number placeholders until reset', () => {
      expect(dialect.getParameterPlaceholder()).toBe('$1');
      expect(dialect.getParameterPlaceholder()).toBe('$2');
      dialect.resetParameters();
      expect(dialect.getParameterPlaceholder()).toBe('$1');
    });
  });

  describe('escapeIdentifier', () => {
    it('should quote each part', () => {
      expect(dialect.escapeIdentifier('users')).toBe('"users"');
      expect(dialect.escapeIdentifier('users.id')).toBe('"users"."id"');
      expect(dialect.escapeIdentifier('users.*')).toBe('"users".*');
    });

    it('should double embedded quotes', () => {
      expect(dialect.escapeIdentifier('we"ird')).toBe('"we""ird"');
    });
  });

  describe('escapeSelectColumn', () => {
    it('should quote plain references only', () => {
      expect(dialect.escapeSelectColumn('*')).toBe('*');
      expect(dialect.escapeSelectColumn('name')).toBe('"name"');
      expect(dialect.escapeSelectColumn('COUNT(*) AS count')).toBe('COUNT(*) AS count');
    });
  });

  describe('buildSelect', () => {
    it('should build a bare select', () => {
      expect(dialect.buildSelect(select({ from: 'users' }))).toEqual({
        sql: 'SELECT * FROM "users"',
        bindings: [],
      });
    });

    it('should render every clause in order', () => {
      const where: WhereCondition[] = [
        { type: 'AND', sql: '"posts"."published" = $1', bindings: [true] },
      ];
      const having: WhereCondition[] = [{ type: 'AND', sql: 'COUNT(*) > $2', bindings: [3] }];

      const { sql, bindings } = dialect.buildSelect(
        select({
          columns: ['users.name', 'COUNT(*) AS total'],
          distinct: true,
          from: 'users',
          joins: [{ type: 'LEFT', table: 'posts', left: 'posts.user_id', right: 'users.id' }],
          where,
          groupBy: ['users.name'],
          having,
          orderBy: [{ column: 'users.name', direction: 'DESC' }],
          limit: 10,
          offset: 20,
        }),
      );

      expect(sql).toBe(
        'SELECT DISTINCT "users"."name", COUNT(*) AS total FROM "users" ' +
          'LEFT JOIN "posts" ON "posts"."user_id" = "users"."id" ' +
          'WHERE "posts"."published" = $1 GROUP BY "users"."name" HAVING COUNT(*) > $2 ' +
          'ORDER BY "users"."name" DESC LIMIT 10 OFFSET 20',
      );
      expect(bindings).toEqual([true, 3]);
    });

    it('should print inner joins as JOIN', () => {
      const { sql } = dialect.buildSelect(
        select({
          from: 'users',
          joins: [{ type: 'INNER', table: 'posts', left: 'posts.user_id', right: 'users.id' }],
        }),
      );
      expect(sql).toBe('SELECT * FROM "users" JOIN "posts" ON "posts"."user_id" = "users"."id"');
    });

    it('should join conditions with their conjunction', () => {
      const { sql, bindings } = dialect.buildSelect(
        select({
          from: 'users',
          where: [
            { type: 'AND', sql: '"role" = $1', bindings: ['admin'] },
            { type: 'OR', sql: '"role" = $2', bindings: ['owner'] },
          ],
        }),
      );
      expect(sql).toBe('SELECT * FROM "users" WHERE "role" = $1 OR "role" = $2');
      expect(bindings).toEqual(['admin', 'owner']);
    });
  });

  describe('buildInsert', () => {
    it('should insert one row and return it', () => {
      const { sql, bindings } = dialect.buildInsert({
        table: 'users',
        data: [{ id: 'u1', name: 'Ada' }],
        returning: ['*'],
      });
      expect(sql).toBe('INSERT INTO "users" ("id", "name") VALUES ($1, $2) RETURNING *');
      expect(bindings).toEqual(['u1', 'Ada']);
    });

    it('should insert several rows', () => {
      const { sql, bindings } = dialect.buildInsert({
        table: 'tags',
        data: [{ label: 'a' }, { label: 'b' }],
      });
      expect(sql).toBe('INSERT INTO "tags" ("label") VALUES ($1), ($2)');
      expect(bindings).toEqual(['a', 'b']);
    });

    it('should bind every value instead of inlining it', () => {
      const at = new Date('2024-01-02T03:04:05.000Z');
      const { sql, bindings } = dialect.buildInsert({
        table: 'events',
        data: [{ label: "O'Brien", at, tags: ['a'], done: true }],
      });
      expect(sql).toBe('INSERT INTO "events" ("label", "at", "tags", "done") VALUES ($1, $2, $3, $4)');
      expect(bindings).toEqual(["O'Brien", at, ['a'], true]);
    });

    it('should fall back to DEFAULT VALUES', () => {
      const { sql } = dialect.buildInsert({ table: 'counters', data: [{}], returning: ['id'] });
      expect(sql).toBe('INSERT INTO "counters" DEFAULT VALUES RETURNING "id"');
    });
  });

  describe('buildUpdate', () => {
    it('should number conditions after the SET placeholders', () => {
      const { sql, bindings } = dialect.buildUpdate({
        table: 'users',
        data: { name: 'Ada', age: 36 },
        where: () => [
          { type: 'AND', sql: `"id" = ${dialect.getParameterPlaceholder()}`, bindings: ['u1'] },
        ],
      });
      expect(sql).toBe('UPDATE "users" SET "name" = $1, "age" = $2 WHERE "id" = $3');
      expect(bindings).toEqual(['Ada', 36, 'u1']);
    });
  });

  describe('buildDelete', () => {
    it('should delete matching rows', () => {
      const { sql, bindings } = dialect.buildDelete({
        table: 'users',
        where: [{ type: 'AND', sql: '"id" = $1', bindings: ['u1'] }],
      });
      expect(sql).toBe('DELETE FROM "users" WHERE "id" = $1');
      expect(bindings).toEqual(['u1']);
    });
  });
});

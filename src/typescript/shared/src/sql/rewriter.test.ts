import { ValidationError } from '../errors';
import { rewrite } from './rewriter';

describe('rewrite', () => {
  describe('predicate placement', () => {
    it('prepends the tenant predicate to an existing WHERE', () => {
      const result = rewrite("SELECT COUNT(*) FROM activities WHERE type='Run'", 42);

      expect(result.sql).toBe("SELECT COUNT(*) FROM activities WHERE tenant_id = ? AND type='Run'");
      expect(result.params).toEqual([42]);
      expect(result.kind).toBe('aggregate');
    });

    it('inserts WHERE before ORDER BY and LIMIT', () => {
      const result = rewrite('SELECT name, distance FROM activities ORDER BY start_date DESC LIMIT 5', 42);

      expect(result.sql).toBe('SELECT name, distance FROM activities WHERE tenant_id = ? ORDER BY start_date DESC LIMIT 5');
      expect(result.kind).toBe('row');
    });

    it('inserts WHERE before GROUP BY', () => {
      const result = rewrite('SELECT type, SUM(distance) FROM activities GROUP BY type', 7);

      expect(result.sql).toBe('SELECT type, SUM(distance) FROM activities WHERE tenant_id = ? GROUP BY type');
      expect(result.params).toEqual([7]);
      expect(result.kind).toBe('aggregate');
    });

    it('appends WHERE and strips a single trailing terminator', () => {
      const result = rewrite('SELECT * FROM activities;', 42);

      expect(result.sql).toBe('SELECT * FROM activities WHERE tenant_id = ?');
    });

    it('accepts schema-qualified and quoted table names', () => {
      expect(rewrite('SELECT COUNT(*) FROM public.activities', 1).sql).toBe(
        'SELECT COUNT(*) FROM public.activities WHERE tenant_id = ?'
      );
      expect(rewrite('SELECT COUNT(*) FROM "activities"', 1).sql).toBe(
        'SELECT COUNT(*) FROM "activities" WHERE tenant_id = ?'
      );
    });

    it('does not mistake IS DISTINCT FROM for a FROM clause', () => {
      const result = rewrite("SELECT name IS DISTINCT FROM 'x' FROM activities", 42);

      expect(result.sql).toBe("SELECT name IS DISTINCT FROM 'x' FROM activities WHERE tenant_id = ?");
    });
  });

  describe('parameters', () => {
    it('orders params by placeholder position in the output', () => {
      const result = rewrite('SELECT * FROM activities WHERE distance > ? AND type = ?', 42, [5000, 'Run']);

      expect(result.sql).toBe('SELECT * FROM activities WHERE tenant_id = ? AND distance > ? AND type = ?');
      expect(result.params).toEqual([42, 5000, 'Run']);
    });

    it('rejects a placeholder count that does not match the params', () => {
      expect(() => rewrite('SELECT * FROM activities WHERE id = ?', 42)).toThrow(ValidationError);
      expect(() => rewrite('SELECT * FROM activities', 42, [1])).toThrow(ValidationError);
    });

    it('rejects numbered placeholders', () => {
      expect(() => rewrite('SELECT * FROM activities WHERE id = $1', 42, [1])).toThrow('Numbered placeholder');
    });

    it('binds one tenant id per scoped reference when a quoted alias contains ?', () => {
      const result = rewrite('SELECT "a?".name FROM activities "a?" WHERE name = ?', 1, ['x']);

      expect(result.sql).toBe('SELECT "a?".name FROM activities "a?" WHERE "a?".tenant_id = ? AND name = ?');
      expect(result.params).toEqual([1, 'x']);
    });
  });

  describe('existing tenant predicates', () => {
    it('removes a leading literal tenant predicate', () => {
      const result = rewrite("SELECT * FROM activities WHERE tenant_id = 7 AND type = 'Ride'", 42);

      expect(result.sql).toBe("SELECT * FROM activities WHERE tenant_id = ? AND type = 'Ride'");
      expect(result.params).toEqual([42]);
    });

    it('removes a trailing IN list', () => {
      const result = rewrite("SELECT * FROM activities WHERE type = 'Ride' AND tenant_id IN (1, 2)", 42);

      expect(result.sql).toBe("SELECT * FROM activities WHERE tenant_id = ? AND type = 'Ride'");
    });

    it('removes reversed operands and drops the bound value', () => {
      const result = rewrite('SELECT * FROM activities WHERE ? = tenant_id', 42, [7]);

      expect(result.sql).toBe('SELECT * FROM activities WHERE tenant_id = ?');
      expect(result.params).toEqual([42]);
    });

    it('matches the tenant column case-insensitively and inside parentheses', () => {
      const result = rewrite("SELECT * FROM activities WHERE (TENANT_ID = -3) AND type = 'Run'", 42);

      expect(result.sql).toBe("SELECT * FROM activities WHERE tenant_id = ? AND type = 'Run'");
    });

    it('keeps BETWEEN ranges intact when splitting conjuncts', () => {
      const result = rewrite('SELECT * FROM activities WHERE distance BETWEEN 1000 AND 5000 AND tenant_id = 3', 42);

      expect(result.sql).toBe('SELECT * FROM activities WHERE tenant_id = ? AND distance BETWEEN 1000 AND 5000');
    });

    it('wraps a condition with a top-level OR instead of stripping inside it', () => {
      const result = rewrite("SELECT * FROM activities WHERE type = 'Run' OR tenant_id = 7", 42);

      expect(result.sql).toBe("SELECT * FROM activities WHERE tenant_id = ? AND (type = 'Run' OR tenant_id = 7)");
      expect(result.params).toEqual([42]);
    });

    it('drops a WHERE that only filtered a derived table by tenant', () => {
      const result = rewrite('SELECT * FROM (SELECT * FROM activities) s WHERE tenant_id = 9', 42);

      expect(result.sql).toBe('SELECT * FROM (SELECT * FROM activities WHERE tenant_id = ?) s');
    });
  });

  describe('query blocks', () => {
    it('qualifies the predicate for every tenant table in a join', () => {
      const result = rewrite('SELECT a.name FROM activities a JOIN activities b ON a.id = b.id', 42);

      expect(result.sql).toBe(
        'SELECT a.name FROM activities a JOIN activities b ON a.id = b.id WHERE a.tenant_id = ? AND b.tenant_id = ?'
      );
      expect(result.params).toEqual([42, 42]);
    });

    it('scopes a derived table', () => {
      const result = rewrite('SELECT COUNT(*) FROM (SELECT type FROM activities WHERE distance > 1000) t', 42);

      expect(result.sql).toBe(
        'SELECT COUNT(*) FROM (SELECT type FROM activities WHERE tenant_id = ? AND distance > 1000) t'
      );
    });

    it('scopes a scalar subquery in WHERE', () => {
      const result = rewrite('SELECT name FROM activities WHERE distance > (SELECT AVG(distance) FROM activities)', 42);

      expect(result.sql).toBe(
        'SELECT name FROM activities WHERE tenant_id = ? AND distance > (SELECT AVG(distance) FROM activities WHERE tenant_id = ?)'
      );
      expect(result.params).toEqual([42, 42]);
    });

    it('scopes every UNION arm', () => {
      const result = rewrite("SELECT name FROM activities WHERE type = 'Run' UNION ALL SELECT name FROM activities", 42);

      expect(result.sql).toBe(
        "SELECT name FROM activities WHERE tenant_id = ? AND type = 'Run' UNION ALL SELECT name FROM activities WHERE tenant_id = ?"
      );
      expect(result.params).toEqual([42, 42]);
    });

    it('scopes a SELECT arm that follows VALUES inside parentheses', () => {
      const result = rewrite('SELECT COUNT(*) FROM (VALUES (4), (5) INTERSECT SELECT id FROM activities) AS t', 42);

      expect(result.sql).toBe(
        'SELECT COUNT(*) FROM (VALUES (4), (5) INTERSECT SELECT id FROM activities WHERE tenant_id = ?) AS t'
      );
      expect(result.params).toEqual([42]);
    });

    it('scopes a SELECT arm after VALUES in a WHERE subquery', () => {
      const result = rewrite('SELECT COUNT(*) FROM activities WHERE id IN (VALUES (1) EXCEPT SELECT id FROM activities)', 42);

      expect(result.sql).toBe(
        'SELECT COUNT(*) FROM activities WHERE tenant_id = ? AND id IN (VALUES (1) EXCEPT SELECT id FROM activities WHERE tenant_id = ?)'
      );
      expect(result.params).toEqual([42, 42]);
    });

    it('scopes CTE bodies and leaves references to the CTE alone', () => {
      const result = rewrite("WITH runs AS (SELECT * FROM activities WHERE type = 'Run') SELECT COUNT(*) FROM runs", 42);

      expect(result.sql).toBe(
        "WITH runs AS (SELECT * FROM activities WHERE tenant_id = ? AND type = 'Run') SELECT COUNT(*) FROM runs"
      );
      expect(result.params).toEqual([42]);
    });

    it('replaces comments with a space', () => {
      expect(rewrite('SELECT * FROM activities -- everything\n', 1).sql).toBe('SELECT * FROM activities WHERE tenant_id = ?');
      expect(rewrite('SELECT /* hi */ name FROM activities', 1).sql).toBe('SELECT   name FROM activities WHERE tenant_id = ?');
    });
  });

  describe('rejections', () => {
    it.each([
      ['an empty query', '   '],
      ['a DROP statement', 'DROP TABLE activities'],
      ['stacked statements', 'SELECT * FROM activities; DROP TABLE activities'],
      ['SELECT INTO', 'SELECT * INTO backup FROM activities'],
      ['a locking clause', 'SELECT * FROM activities FOR UPDATE'],
      ['another table', 'SELECT * FROM tenant_credentials'],
      ['a catalog table', 'SELECT * FROM pg_catalog.pg_tables'],
      ['a session function', "SELECT current_setting('app.current_tenant_id')"],
      ['pg_ functions', 'SELECT pg_sleep(10)'],
      ['a CTE shadowing a tenant table', 'WITH activities AS (SELECT 1) SELECT * FROM activities'],
      ['a parenthesised join', 'SELECT * FROM (activities a JOIN activities b ON a.id = b.id)'],
      ['an unterminated string', "SELECT * FROM activities WHERE name = 'x"],
      ['the TABLE shorthand for another relation', 'SELECT 1 AS leaked WHERE EXISTS (TABLE tenant_credentials)'],
      [
        'the TABLE shorthand inside a set operation',
        'SELECT COUNT(*) FROM activities WHERE EXISTS (TABLE activities EXCEPT SELECT * FROM activities)',
      ],
    ])('rejects %s', (_label, sql) => {
      expect(() => rewrite(sql, 42)).toThrow(ValidationError);
    });

    it('does not treat keywords inside string literals as statements', () => {
      const result = rewrite("SELECT * FROM activities WHERE name = 'x; DROP TABLE y'", 42);

      expect(result.sql).toBe("SELECT * FROM activities WHERE tenant_id = ? AND name = 'x; DROP TABLE y'");
    });
  });
});

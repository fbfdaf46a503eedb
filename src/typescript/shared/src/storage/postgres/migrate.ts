import { readFileSync } from 'fs';
import * as path from 'path';
import { Pool } from 'pg';

export const SCHEMA_PATH = path.join(__dirname, 'schema.sql');

/** Tables the gateway role may read. Row-level security scopes each of them. */
export const GATEWAY_READABLE_TABLES = ['activities'] as const;

export interface ApplySchemaOptions {
  /** Role the query gateway connects as; granted SELECT on the readable tables. */
  gatewayRole?: string;
  schemaPath?: string;
}

/**
 * Applies schema.sql in one transaction. Every statement is idempotent, so the
 * migration can be re-run against an existing database.
 */
export async function applySchema(pool: Pool, options: ApplySchemaOptions = {}): Promise<void> {
  const sql = readFileSync(options.schemaPath ?? SCHEMA_PATH, 'utf-8');
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    if (options.gatewayRole) {
      const role = client.escapeIdentifier(options.gatewayRole);
      for (const table of GATEWAY_READABLE_TABLES) {
        await client.query(`GRANT SELECT ON ${client.escapeIdentifier(table)} TO ${role}`);
      }
    }
    await client.query('COMMIT');
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

import { Pool, PoolClient } from 'pg';
import * as winston from 'winston';
import { AppError, DatabaseError, TimeoutError, errorMessage } from '../errors';
import { sqlStateOf } from '../storage/postgres/errors';
import { numberPlaceholders } from './placeholders';

/** SQLSTATE Postgres reports when `statement_timeout` cancels a statement. */
const QUERY_CANCELED = '57014';

export interface ExecutorOptions {
  statementTimeoutMs: number;
}

export interface ExecuteRequest {
  sql: string;
  params: readonly unknown[];
  tenantId: number;
}

export interface ExecuteResult {
  columns: string[];
  rows: Record<string, unknown>[];
  rowCount: number;
}

/**
 * Runs a rewritten SELECT inside a read-only transaction on a dedicated pooled
 * connection. The transaction also carries `app.current_tenant_id`, which the
 * row-level security policy on `activities` checks.
 */
export class QueryExecutor {
  constructor(
    private readonly pool: Pool,
    private readonly options: ExecutorOptions,
    private readonly logger: winston.Logger
  ) { }

  async execute(request: ExecuteRequest): Promise<ExecuteResult> {
    const started = Date.now();
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw this.translate(err);
    }

    let releaseError: Error | undefined;
    try {
      await client.query('BEGIN READ ONLY');
      await client.query(
        "SELECT set_config('statement_timeout', $1, true), set_config('app.current_tenant_id', $2, true)",
        [String(this.options.statementTimeoutMs), String(request.tenantId)]
      );
      const result = await client.query(numberPlaceholders(request.sql), [...request.params]);
      await client.query('COMMIT');

      this.logger.debug('Query executed', {
        tenant_id: request.tenantId,
        rowCount: result.rows.length,
        durationMs: Date.now() - started,
      });

      return {
        columns: result.fields.map((field) => field.name),
        rows: result.rows,
        rowCount: result.rows.length,
      };
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        // The connection is unusable; have the pool discard it
        releaseError = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
        this.logger.warn('Rollback failed', { error: rollbackErr });
      }
      throw this.translate(err);
    } finally {
      client.release(releaseError);
    }
  }

  private translate(err: unknown): AppError {
    if (err instanceof AppError) return err;

    const message = errorMessage(err);
    const code = sqlStateOf(err);
    if (code === QUERY_CANCELED || /query read timeout|timeout exceeded when trying to connect/i.test(message)) {
      return new TimeoutError(`Query exceeded ${this.options.statementTimeoutMs}ms`, this.options.statementTimeoutMs);
    }
    return new DatabaseError(message, code);
  }
}

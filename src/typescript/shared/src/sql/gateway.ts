import * as winston from 'winston';
import { AppErrorCode, isAppError } from '../errors';
import { ExecuteRequest, ExecuteResult } from './executor';
import { QueryKind, TenantTables, rewrite } from './rewriter';

/** Candidate SQL produced upstream, plus the tenant asserted by the authenticated caller. */
export interface CandidateQuery {
  sql: string;
  tenantId: number;
  params?: unknown[];
}

export type GatewayResult =
  | ({ success: true; kind: QueryKind } & ExecuteResult)
  | { success: false; error: string; errorType: AppErrorCode };

export interface QueryRunner {
  execute(request: ExecuteRequest): Promise<ExecuteResult>;
}

export class QueryGateway {
  constructor(
    private readonly executor: QueryRunner,
    private readonly tables: TenantTables,
    private readonly logger: winston.Logger
  ) { }

  /**
   * Rewrites and executes a candidate query. Failures of the taxonomy come back as
   * a structured result; anything else propagates.
   */
  async run(query: CandidateQuery): Promise<GatewayResult> {
    const log = this.logger.child({ component: 'query-gateway', tenant_id: query.tenantId });
    try {
      const rewritten = rewrite(query.sql, query.tenantId, query.params ?? [], { tables: this.tables });
      log.debug('Query rewritten', { sql: rewritten.sql, kind: rewritten.kind });

      const result = await this.executor.execute({
        sql: rewritten.sql,
        params: rewritten.params,
        tenantId: query.tenantId,
      });
      return { success: true, kind: rewritten.kind, ...result };
    } catch (err) {
      if (!isAppError(err)) throw err;
      log.warn('Query rejected', { errorType: err.code, error: err.message });
      return { success: false, error: err.message, errorType: err.code };
    }
  }
}

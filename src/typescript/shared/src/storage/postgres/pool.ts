import { Pool } from 'pg';
import type { Logger } from 'winston';
import type { DatabaseConfig } from '../../config';

export function createPool(config: DatabaseConfig, logger: Logger, url: string = config.url): Pool {
  const pool = new Pool({
    connectionString: url,
    max: config.poolMax,
    query_timeout: config.queryTimeoutMs,
    connectionTimeoutMillis: config.queryTimeoutMs,
  });

  // Emitted for errors on idle clients
  pool.on('error', (err) => {
    logger.error('Idle database client error', { component: 'postgres', error: err });
  });

  return pool;
}

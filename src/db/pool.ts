import { Pool } from 'pg';
import { logger } from '../utils/logger';
import { describeError } from '../utils/errorHandler';

export function createPool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    // Neon requires TLS; plain local Postgres does not
    ssl: connectionString.includes('neon.tech') ? { rejectUnauthorized: false } : undefined,
  });

  // Idle clients can drop (server restart, idle timeout); pg reports that on the pool
  pool.on('error', error => {
    logger.error(`[ImageCache] Idle database client error: ${describeError(error)}`);
  });

  return pool;
}

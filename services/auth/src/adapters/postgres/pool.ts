import { Pool } from 'pg';
import type { Config } from '../../config';
import type { Logger } from '../../logging';

let pool: Pool | undefined;

/** One pool per process; idle client errors are logged instead of crashing the process. */
export const getPool = (config: Config, logger?: Logger) => {
  if (config.STORAGE_DRIVER !== 'postgres' || !config.POSTGRES_URL) {
    throw new Error('POSTGRES_URL is required when STORAGE_DRIVER=postgres');
  }

  if (!pool) {
    pool = new Pool({
      connectionString: config.POSTGRES_URL,
      max: config.POSTGRES_POOL_MAX,
      application_name: 'auth-service'
    });
    pool.on('error', (error) => {
      logger?.error({ err: error }, 'idle postgres client failed');
    });
  }

  return pool;
};

export const closePool = async () => {
  const current = pool;
  pool = undefined;
  await current?.end();
};

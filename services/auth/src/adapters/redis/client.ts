import Redis from 'ioredis';
import type { Config } from '../../config';
import type { Logger } from '../../logging';

let client: Redis | undefined;

/**
 * Shared ioredis connection. Commands fail fast after one retry so a dead
 * Redis surfaces as StoreUnavailableError instead of a hung request.
 */
export const getRedisClient = (config: Config, logger?: Logger) => {
  if (!config.REDIS_URL) {
    throw new Error('REDIS_URL is not configured');
  }
  if (client) {
    return client;
  }

  const created = new Redis(config.REDIS_URL, {
    lazyConnect: true,
    keyPrefix: `${config.REDIS_KEY_PREFIX}:`,
    commandTimeout: config.REDIS_COMMAND_TIMEOUT_MS,
    maxRetriesPerRequest: 1
  });
  created.on('error', (error: Error) => {
    logger?.warn({ err: error }, 'redis connection error');
  });
  client = created;
  return created;
};

export const closeRedisClient = async () => {
  const current = client;
  client = undefined;
  await current?.quit();
};

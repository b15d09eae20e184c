import { fileURLToPath } from 'node:url';
import { loadConfig, type Config } from '../src/config';
import { createContainer, type ContainerOverrides } from '../src/container';
import { closePool } from '../src/adapters/postgres';
import { closeRedisClient } from '../src/adapters/redis';
import { createLogger } from '../src/logging';

/** One-off sweep of expired refresh records, for cron style scheduling outside the server. */
export const purgeExpired = async (config: Config = loadConfig(), overrides: ContainerOverrides = {}) => {
  const logger = createLogger({ level: config.LOG_LEVEL });
  try {
    const container = await createContainer({ config, logger, overrides });
    const purged = await container.services.sessions.purgeExpired();
    logger.info({ purged }, 'expired refresh tokens purged');
    return purged;
  } finally {
    await closePool();
    await closeRedisClient();
  }
};

const isDirectInvocation = process.argv[1] && (
  process.argv[1] === fileURLToPath(import.meta.url) ||
  process.argv[1]?.endsWith('scripts/purgeExpired.ts')
);

if (isDirectInvocation) {
  purgeExpired().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}

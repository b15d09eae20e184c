import { fileURLToPath } from 'node:url';
import { loadConfig } from '../src/config';
import { closePool, getPool, runMigrations } from '../src/adapters/postgres';
import { createLogger } from '../src/logging';

export const migrate = async () => {
  const config = loadConfig();
  const logger = createLogger({ level: config.LOG_LEVEL });
  try {
    await runMigrations(getPool(config));
    logger.info('migrations applied');
  } finally {
    await closePool();
  }
};

const isDirectInvocation = process.argv[1] && (
  process.argv[1] === fileURLToPath(import.meta.url) ||
  process.argv[1]?.endsWith('scripts/migrate.ts')
);

if (isDirectInvocation) {
  migrate().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}

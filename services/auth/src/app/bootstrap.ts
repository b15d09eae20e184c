import { createServer } from './server';
import { loadConfig, type Config } from '../config';
import { createLogger } from '../logging';
import { createContainer, type Container, type ContainerOverrides } from '../container';
import { closePool } from '../adapters/postgres';
import { closeRedisClient } from '../adapters/redis';

export interface BootstrapOptions extends ContainerOverrides {
  config?: Config;
  /** Replaces individual services after the container is built. */
  services?: Partial<Container['services']>;
}

/**
 * Builds config, logger, container and server in one go. `shutdown` closes
 * the HTTP server and then the shared Postgres and Redis connections.
 */
export const bootstrap = async ({ config: configOverride, services, ...containerOverrides }: BootstrapOptions = {}) => {
  const config = configOverride ?? loadConfig();
  const logger = createLogger({ level: config.LOG_LEVEL });
  const container = await createContainer({ config, logger, overrides: containerOverrides });
  if (services) {
    container.services = { ...container.services, ...services };
  }

  const server = await createServer({ config, logger, container });
  const shutdown = async () => {
    await server.close();
    await closePool();
    await closeRedisClient();
  };

  return { server, config, logger, container, shutdown };
};

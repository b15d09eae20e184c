import { fileURLToPath } from 'node:url';
import Fastify, { type FastifyInstance } from 'fastify';
import fastifyCookie from '@fastify/cookie';
import fastifyCors from '@fastify/cors';
import fastifySwagger from '@fastify/swagger';
import fastifySwaggerUi from '@fastify/swagger-ui';
import { registerRoutes } from './routes';
import { schedulePurge } from './purgeSchedule';
import { loadConfig, type Config } from '../config';
import { createLogger, type Logger } from '../logging';
import { createContainer, type Container } from '../container';
import { closePool } from '../adapters/postgres';
import { closeRedisClient } from '../adapters/redis';

export interface ServerOptions {
  config: Config;
  logger: Logger;
  container: Container;
}

export interface AuthServer {
  listen(): Promise<FastifyInstance>;
  close(): Promise<void>;
  app: FastifyInstance;
}

export const createServer = async ({ config, logger, container }: ServerOptions): Promise<AuthServer> => {
  const app = Fastify({
    logger: {
      level: logger.level,
      redact: ['req.headers.authorization', 'req.headers.cookie']
    },
    trustProxy: config.TRUST_PROXY
  });

  app.addHook('onRequest', async (_request, reply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Cache-Control', 'no-store');
  });

  const allowedOrigins = config.CORS_ALLOWED_ORIGINS
    .split(',')
    .map((value) => value.trim())
    .filter(Boolean);
  // Cross-origin access is off unless origins are listed.
  await app.register(fastifyCors, {
    origin: allowedOrigins.length > 0 ? allowedOrigins : false,
    methods: ['GET', 'POST', 'PATCH'],
    allowedHeaders: ['authorization', 'content-type'],
    credentials: true
  });
  await app.register(fastifyCookie);

  await app.register(fastifySwagger, {
    openapi: {
      openapi: '3.1.0',
      info: {
        title: 'Identity API',
        description: 'Credential verification, token issuance, refresh rotation, MFA and lockout',
        version: '1.0.0',
      },
      servers: [
        { url: `http://localhost:${config.HTTP_PORT}`, description: 'Local development' },
      ],
      tags: [
        { name: 'auth', description: 'Registration, login, MFA login, refresh and logout' },
        { name: 'cookie', description: 'Browser sessions carried in HttpOnly cookies' },
        { name: 'password', description: 'Password reset and change' },
        { name: 'email', description: 'Email verification' },
        { name: 'mfa', description: 'MFA enrolment' },
        { name: 'accounts', description: 'Account administration' },
        { name: 'health', description: 'Health and status checks' },
      ],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: 'http',
            scheme: 'bearer',
            bearerFormat: 'JWT',
          },
        },
      },
    },
  });

  await app.register(fastifySwaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
    staticCSP: true,
  });

  await registerRoutes(app, { config, container });

  if (config.REFRESH_PURGE_INTERVAL_SECONDS > 0) {
    const stopPurge = schedulePurge({
      purge: container.services.sessions.purgeExpired,
      logger,
      intervalMs: config.REFRESH_PURGE_INTERVAL_SECONDS * 1000
    });
    app.addHook('onClose', async () => stopPurge());
  }

  return {
    listen: async () => {
      try {
        await app.listen({ host: config.HTTP_HOST, port: config.HTTP_PORT });
        logger.info(`OpenAPI documentation available at http://${config.HTTP_HOST}:${config.HTTP_PORT}/docs`);
      } catch (error) {
        logger.error({ err: error }, 'failed to bind auth server');
        throw error;
      }
      return app;
    },
    close: async () => app.close(),
    app
  };
};

const isDirect = process.argv[1] && (
  process.argv[1] === fileURLToPath(import.meta.url) ||
  process.argv[1]?.endsWith('src/app/server.ts')
);

if (isDirect) {
  (async () => {
    const config = loadConfig();
    const logger = createLogger({ level: config.LOG_LEVEL });
    const container = await createContainer({ config, logger });
    const server = await createServer({ config, logger, container });
    await server.listen();

    const stop = (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'shutting down auth service');
      server.close()
        .then(closePool)
        .then(closeRedisClient)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ err: error }, 'shutdown failed');
          process.exit(1);
        });
    };
    process.once('SIGTERM', stop);
    process.once('SIGINT', stop);
  })().catch((error) => {
    console.error('Failed to start auth service', error);
    process.exit(1);
  });
}

import type { FastifyInstance } from 'fastify';
import { registerHealthRoutes } from './meta/health';
import { registerMetricsRoute } from './meta/metrics';
import { registerErrorHandler } from './meta/errorHandler';
import { accountsRoutes } from './modules/accounts';
import { authRoutes } from './modules/auth';
import { cookieSessionRoutes } from './modules/cookieSession';
import { passwordRoutes } from './modules/password';
import { emailRoutes } from './modules/email';
import { mfaRoutes } from './modules/mfa';
import type { Container } from '../../container';
import type { Config } from '../../config';

export const registerRoutes = async (
  app: FastifyInstance,
  context: { config: Config; container: Container }
) => {
  registerErrorHandler(app);
  await registerHealthRoutes(app, context);
  await registerMetricsRoute(app, context);
  await authRoutes(app, context);
  await cookieSessionRoutes(app, context);
  await passwordRoutes(app, context);
  await emailRoutes(app, context);
  await mfaRoutes(app, context);
  await accountsRoutes(app, context);
};

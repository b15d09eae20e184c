import type { FastifyInstance } from 'fastify';
import type { Container } from '../../../container';

const statusSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['ok'] },
  },
} as const;

export const registerHealthRoutes = async (app: FastifyInstance, { container }: { container: Container }) => {
  app.get('/health', {
    schema: {
      description: 'Liveness probe',
      tags: ['health'],
      response: { 200: statusSchema },
    },
  }, async () => ({ status: 'ok' }));

  // An unreachable store surfaces as STORE_UNAVAILABLE (503) through the error handler.
  app.get('/ready', {
    schema: {
      description: 'Readiness probe; checks the ephemeral store and the account store',
      tags: ['health'],
      response: { 200: statusSchema },
    },
  }, async () => {
    await container.store.get('health:probe');
    await container.repos.accounts.findById('00000000-0000-0000-0000-000000000000');
    return { status: 'ok' };
  });
};

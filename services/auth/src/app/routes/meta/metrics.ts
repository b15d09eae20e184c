import type { FastifyInstance } from 'fastify';
import type { Config } from '../../../config';
import type { Container } from '../../../container';

export const registerMetricsRoute = async (
  app: FastifyInstance,
  { config, container }: { config: Config; container: Container }
) => {
  app.get('/metrics', { schema: { hide: true } }, async (_request, reply) => {
    if (config.NODE_ENV === 'production') {
      return reply.status(404).send();
    }
    const registry = container.services.metrics.getRegistry();
    reply.type(registry.contentType);
    return registry.metrics();
  });
};

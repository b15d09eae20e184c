import type { FastifyRequest } from 'fastify';
import { RateLimiterRes } from 'rate-limiter-flexible';
import type { Container } from '../../../container';
import { RateLimitedError, StoreUnavailableError } from '../../../domain/errors';

/** onRequest hook charging one point per call, keyed by client address and route. */
export const createRateLimit = ({ services, logger }: Container) =>
  async function rateLimit(request: FastifyRequest): Promise<void> {
    const route = request.routeOptions.url ?? request.url;
    try {
      await services.rateLimiter.consume(`${request.ip}:${route}`);
    } catch (error) {
      if (error instanceof RateLimiterRes) {
        logger.warn({ ip: request.ip, route }, 'rate limit exceeded');
        throw new RateLimitedError(Math.max(1, Math.ceil(error.msBeforeNext / 1000)));
      }
      throw new StoreUnavailableError('rate limiter unavailable', error);
    }
  };

import type { FastifyRequest } from 'fastify';
import type { Container } from '../../../container';
import { TokenInvalidSignatureError } from '../../../domain/errors';
import { authorize, type Principal } from '../../../usecases/auth/authorize';

declare module 'fastify' {
  interface FastifyRequest {
    principal?: Principal;
  }
}

export const readBearer = (request: FastifyRequest) => {
  const header = request.headers.authorization;
  if (!header || !header.startsWith('Bearer ')) {
    return undefined;
  }
  const token = header.slice('Bearer '.length).trim();
  return token || undefined;
};

/** preHandler that resolves the bearer token, or else the access cookie, into `request.principal`. */
export const createRequireAuth = (container: Container) =>
  async function requireAuth(request: FastifyRequest): Promise<void> {
    const token = readBearer(request) ?? request.cookies.access_token;
    if (!token) {
      throw new TokenInvalidSignatureError('authorization header required');
    }
    request.principal = await authorize(container, token);
  };

export const principalOf = (request: FastifyRequest): Principal => {
  if (!request.principal) {
    throw new TokenInvalidSignatureError('authorization header required');
  }
  return request.principal;
};

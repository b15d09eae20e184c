import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Container } from '../../../container';
import { confirmEmailVerification, requestEmailVerification } from '../../../usecases/accounts/emailVerification';
import { createRateLimit } from '../meta/rateLimit';
import { accountViewSchema, toAccountView } from '../presenters';
import { EmailSchema } from './auth';

export const emailRoutes = async (app: FastifyInstance, { container }: { container: Container }) => {
  const rateLimit = createRateLimit(container);

  app.post('/v1/auth/email/verify/request', {
    onRequest: rateLimit,
    schema: {
      description: 'Send a fresh email verification link; always accepted',
      tags: ['email'],
      body: {
        type: 'object',
        required: ['email'],
        properties: { email: { type: 'string' } },
      },
    },
  }, async (request, reply) => {
    const body = z.object({ email: EmailSchema }).parse(request.body);
    await requestEmailVerification(container, body);
    reply.status(202).send({ status: 'accepted' });
  });

  app.post('/v1/auth/email/verify/confirm', {
    onRequest: rateLimit,
    schema: {
      description: 'Mark the email of the token subject as verified',
      tags: ['email'],
      body: {
        type: 'object',
        required: ['token'],
        properties: { token: { type: 'string' } },
      },
      response: { 200: accountViewSchema },
    },
  }, async (request, reply) => {
    const body = z.object({ token: z.string().min(1) }).parse(request.body);
    const account = await confirmEmailVerification(container, body);
    reply.status(200).send(toAccountView(account));
  });
};

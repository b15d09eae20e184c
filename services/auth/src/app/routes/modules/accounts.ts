import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Container } from '../../../container';
import { ROLES } from '../../../domain/entities/account';
import { changeRole, deactivateAccount } from '../../../usecases/accounts/administration';
import { createRequireAuth, principalOf } from '../meta/requireAuth';
import { accountViewSchema, toAccountView } from '../presenters';

const ParamsSchema = z.object({ id: z.string().uuid() });
const RoleSchema = z.object({ role: z.enum(ROLES) });

const paramsSchema = {
  type: 'object',
  required: ['id'],
  properties: { id: { type: 'string', description: 'Account UUID' } },
} as const;

export const accountsRoutes = async (
  app: FastifyInstance,
  { container }: { container: Container }
) => {
  const requireAuth = createRequireAuth(container);

  app.patch('/v1/accounts/:id/role', {
    preHandler: requireAuth,
    schema: {
      description: 'Change the role of an account (admin only); its sessions are revoked',
      tags: ['accounts'],
      security: [{ bearerAuth: [] }],
      params: paramsSchema,
      body: {
        type: 'object',
        required: ['role'],
        properties: { role: { type: 'string', enum: [...ROLES] } },
      },
      response: { 200: accountViewSchema },
    },
  }, async (request, reply) => {
    const { id } = ParamsSchema.parse(request.params);
    const { role } = RoleSchema.parse(request.body);
    const account = await changeRole(container, { actor: principalOf(request), accountId: id, role });
    reply.status(200).send(toAccountView(account));
  });

  app.post('/v1/accounts/:id/deactivate', {
    preHandler: requireAuth,
    schema: {
      description: 'Deactivate an account (admin only); its sessions are revoked',
      tags: ['accounts'],
      security: [{ bearerAuth: [] }],
      params: paramsSchema,
      response: { 200: accountViewSchema },
    },
  }, async (request, reply) => {
    const { id } = ParamsSchema.parse(request.params);
    const account = await deactivateAccount(container, { actor: principalOf(request), accountId: id });
    reply.status(200).send(toAccountView(account));
  });
};

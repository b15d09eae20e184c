import { ForbiddenError } from '../../domain/errors';
import type { Role } from '../../domain/entities/account';
import type { Container } from '../../container';
import type { Principal } from '../auth/authorize';

const requireAdmin = (actor: Principal) => {
  if (actor.role !== 'admin') {
    throw new ForbiddenError('admin role required');
  }
};

/** Sessions are revoked so the new role shows up in the next access token. */
export const changeRole = async (
  { services }: Container,
  input: { actor: Principal; accountId: string; role: Role }
) => {
  requireAdmin(input.actor);
  const account = await services.credentials.update(input.accountId, { role: input.role });
  await services.sessions.revokeAllForAccount(account.id);
  return account;
};

export const deactivateAccount = async ({ services, logger }: Container, input: { actor: Principal; accountId: string }) => {
  requireAdmin(input.actor);
  const account = await services.credentials.update(input.accountId, { active: false });
  await services.sessions.revokeAllForAccount(account.id);
  logger.info({ accountId: account.id, actor: input.actor.subject }, 'account deactivated');
  return account;
};

import { InvalidCredentialsError } from '../../domain/errors';
import type { Container } from '../../container';

const requirePassword = async ({ services }: Container, accountId: string, password: string) => {
  const account = await services.credentials.getById(accountId);
  if (!(await services.credentials.checkPassword(account, password))) {
    throw new InvalidCredentialsError('password is incorrect');
  }
  return account;
};

export const requestEnableMfa = async (container: Container, input: { accountId: string; password: string }) => {
  const account = await requirePassword(container, input.accountId, input.password);
  const code = await container.services.mfa.requestSetup(account);
  await container.services.notifier.send({ kind: 'mfa_setup', accountId: account.id, email: account.email, code });
};

export const confirmEnableMfa = async ({ services }: Container, input: { accountId: string; code: string }) => {
  const account = await services.credentials.getById(input.accountId);
  await services.mfa.confirmSetup(account, input.code);
  return services.credentials.update(account.id, { mfaEnabled: true });
};

export const disableMfa = async (container: Container, input: { accountId: string; password: string }) => {
  const account = await requirePassword(container, input.accountId, input.password);
  return container.services.credentials.update(account.id, { mfaEnabled: false });
};

import type { AccountPatch, AccountsRepository } from '../../repositories/accountsRepo';
import { type Account, type Role, isUsable } from '../entities/account';
import {
  AccountExistsError,
  AccountInactiveError,
  EmailNotVerifiedError,
  InvalidCredentialsError,
  NotFoundError
} from '../errors';
import type { PasswordHasher } from './passwordHasher';

export interface CredentialServiceOptions {
  requireVerifiedEmail?: boolean;
}

export const normalizeEmail = (email: string) => email.trim().toLowerCase();

export const createCredentialService = (
  accounts: AccountsRepository,
  hasher: PasswordHasher,
  { requireVerifiedEmail = false }: CredentialServiceOptions = {}
) => {
  const verify = async (identifier: string, secret: string): Promise<Account> => {
    const account = await accounts.findByEmail(normalizeEmail(identifier));
    if (!account) {
      await hasher.verifyDummy(secret);
      throw new InvalidCredentialsError();
    }

    const matches = await hasher.verify(account.passwordHash, secret);
    if (!isUsable(account)) {
      throw new AccountInactiveError();
    }
    if (!matches) {
      throw new InvalidCredentialsError();
    }
    if (requireVerifiedEmail && !account.emailVerifiedAt) {
      throw new EmailNotVerifiedError();
    }
    return account;
  };

  const register = async (email: string, secret: string, role: Role): Promise<Account> => {
    const passwordHash = await hasher.hash(secret);
    const account = await accounts.create({ email: normalizeEmail(email), passwordHash, role });
    if (!account) {
      throw new AccountExistsError();
    }
    return account;
  };

  const checkPassword = (account: Account, secret: string) => hasher.verify(account.passwordHash, secret);

  const update = async (accountId: string, patch: AccountPatch): Promise<Account> =>
    requireUpdated(await accounts.update(accountId, patch));

  const setPassword = async (accountId: string, secret: string): Promise<Account> =>
    update(accountId, { passwordHash: await hasher.hash(secret) });

  const getById = async (id: string): Promise<Account> => {
    const account = await accounts.findById(id);
    if (!account) {
      throw new NotFoundError('account not found');
    }
    return account;
  };

  const findByEmail = (email: string) => accounts.findByEmail(normalizeEmail(email));

  return { verify, isUsable, register, checkPassword, setPassword, update, getById, findByEmail };
};

const requireUpdated = (account: Account | null) => {
  if (!account) {
    throw new NotFoundError('account not found');
  }
  return account;
};

export type CredentialService = ReturnType<typeof createCredentialService>;

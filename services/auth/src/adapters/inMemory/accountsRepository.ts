import { randomUUID } from 'node:crypto';
import type { Account } from '../../domain/entities/account';
import type { AccountsRepository } from '../../repositories/accountsRepo';

export const createInMemoryAccountsRepository = (): AccountsRepository => {
  const accounts = new Map<string, Account>();
  const idsByEmail = new Map<string, string>();

  return {
    async create({ email, passwordHash, role }) {
      if (idsByEmail.has(email)) {
        return null;
      }
      const now = new Date();
      const account: Account = {
        id: randomUUID(),
        email,
        passwordHash,
        role,
        active: true,
        mfaEnabled: false,
        createdAt: now,
        updatedAt: now
      };
      accounts.set(account.id, account);
      idsByEmail.set(email, account.id);
      return account;
    },
    async findById(id) {
      return accounts.get(id) ?? null;
    },
    async findByEmail(email) {
      const id = idsByEmail.get(email);
      return id ? accounts.get(id) ?? null : null;
    },
    async update(id, patch) {
      const existing = accounts.get(id);
      if (!existing) {
        return null;
      }
      const updated: Account = { ...existing, ...patch, updatedAt: new Date() };
      accounts.set(id, updated);
      return updated;
    }
  };
};

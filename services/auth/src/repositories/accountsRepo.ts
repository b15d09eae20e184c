import type { Account, Role } from '../domain/entities/account';

export interface CreateAccountInput {
  email: string;
  passwordHash: string;
  role: Role;
}

export type AccountPatch = Partial<Pick<Account, 'passwordHash' | 'role' | 'active' | 'mfaEnabled' | 'emailVerifiedAt'>>;

export interface AccountsRepository {
  /** Resolves null when the email is already taken. */
  create(input: CreateAccountInput): Promise<Account | null>;
  findById(id: string): Promise<Account | null>;
  findByEmail(email: string): Promise<Account | null>;
  update(id: string, patch: AccountPatch): Promise<Account | null>;
}

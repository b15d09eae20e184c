export const ROLES = ['admin', 'instructor', 'student'] as const;

export type Role = (typeof ROLES)[number];

export interface Account {
  id: string;
  email: string;
  passwordHash: string;
  role: Role;
  active: boolean;
  mfaEnabled: boolean;
  emailVerifiedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export const isRole = (value: string): value is Role => (ROLES as readonly string[]).includes(value);

export const isUsable = (account: Account) => account.active;

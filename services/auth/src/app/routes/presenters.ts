import type { Account } from '../../domain/entities/account';
import type { TokenPair } from '../../domain/entities/tokens';

export const toTokenResponse = (pair: TokenPair) => ({
  access_token: pair.accessToken,
  refresh_token: pair.refreshToken,
  token_type: 'Bearer',
  expires_in: pair.expiresIn
});

export const toAccountView = (account: Account) => ({
  id: account.id,
  email: account.email,
  role: account.role,
  active: account.active,
  mfa_enabled: account.mfaEnabled,
  email_verified_at: account.emailVerifiedAt?.toISOString() ?? null,
  created_at: account.createdAt.toISOString()
});

export const tokenResponseSchema = {
  type: 'object',
  properties: {
    access_token: { type: 'string', description: 'JWT access token' },
    refresh_token: { type: 'string', description: 'JWT refresh token' },
    token_type: { type: 'string', enum: ['Bearer'] },
    expires_in: { type: 'number', description: 'Access token lifetime in seconds' },
  },
} as const;

export const accountViewSchema = {
  type: 'object',
  properties: {
    id: { type: 'string', format: 'uuid' },
    email: { type: 'string' },
    role: { type: 'string', enum: ['admin', 'instructor', 'student'] },
    active: { type: 'boolean' },
    mfa_enabled: { type: 'boolean' },
    email_verified_at: { type: ['string', 'null'] },
    created_at: { type: 'string' },
  },
} as const;

export const credentialsBodySchema = {
  type: 'object',
  required: ['email', 'password'],
  properties: {
    email: { type: 'string', description: 'Account email' },
    password: { type: 'string', description: 'Account password' },
  },
} as const;

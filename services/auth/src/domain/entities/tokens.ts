import { z } from 'zod';
import { ROLES } from './account';

const baseClaims = {
  sub: z.string().min(1),
  jti: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int()
};

const AccessClaimsSchema = z.object({ ...baseClaims, type: z.literal('access'), role: z.enum(ROLES) }).strict();
const RefreshClaimsSchema = z.object({ ...baseClaims, type: z.literal('refresh') }).strict();
const PasswordResetClaimsSchema = z.object({ ...baseClaims, type: z.literal('password_reset') }).strict();
const EmailVerificationClaimsSchema = z.object({ ...baseClaims, type: z.literal('email_verification') }).strict();
const MfaChallengeClaimsSchema = z.object({ ...baseClaims, type: z.literal('mfa_challenge') }).strict();

/** Token payloads, one variant per purpose. The token types are derived from this union. */
export const ClaimsSchema = z.discriminatedUnion('type', [
  AccessClaimsSchema,
  RefreshClaimsSchema,
  PasswordResetClaimsSchema,
  EmailVerificationClaimsSchema,
  MfaChallengeClaimsSchema
]);

export type AccessClaims = z.infer<typeof AccessClaimsSchema>;
export type RefreshClaims = z.infer<typeof RefreshClaimsSchema>;
export type PasswordResetClaims = z.infer<typeof PasswordResetClaimsSchema>;
export type EmailVerificationClaims = z.infer<typeof EmailVerificationClaimsSchema>;
export type MfaChallengeClaims = z.infer<typeof MfaChallengeClaimsSchema>;

export type TokenClaims = z.infer<typeof ClaimsSchema>;

export type TokenType = TokenClaims['type'];

export type ClaimsFor<T extends TokenType> = Extract<TokenClaims, { type: T }>;

export interface IssuedToken {
  token: string;
  jti: string;
  expiresAt: Date;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  expiresIn: number;
}

export interface RefreshToken {
  id: string;
  accountId: string;
  createdAt: Date;
  expiresAt: Date;
  revokedAt?: Date;
  accessJti: string;
  accessExpiresAt: Date;
}

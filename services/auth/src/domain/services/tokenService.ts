import { decodeProtectedHeader, errors as joseErrors, SignJWT, jwtVerify } from 'jose';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Logger } from '../../logging';
import type { Role } from '../entities/account';
import { ClaimsSchema, type ClaimsFor, type IssuedToken, type TokenClaims, type TokenType } from '../entities/tokens';
import {
  StoreUnavailableError,
  TokenExpiredError,
  TokenInvalidSignatureError,
  TokenRevokedError,
  TokenTypeMismatchError
} from '../errors';
import type { KeyResolver } from '../keys';
import type { AuthMetrics } from '../metrics';
import type { RevocationRegistry } from './revocationRegistry';

export type RevocationFailureMode = 'open' | 'closed';

/** Lifetimes in seconds, one per token type. */
export interface TokenLifetimes {
  access: number;
  refresh: number;
  passwordReset: number;
  emailVerification: number;
  mfaChallenge: number;
}

export interface TokenServiceOptions {
  keyResolver: KeyResolver;
  lifetimes: TokenLifetimes;
  revocations: RevocationRegistry;
  /** How `validate` treats access tokens when the revocation registry cannot be reached. */
  revocationFailureMode: RevocationFailureMode;
  logger: Logger;
  metrics?: AuthMetrics;
  algorithm?: 'HS256';
  now?: () => number;
}

const hasType = <T extends TokenType>(claims: TokenClaims, type: T): claims is ClaimsFor<T> => claims.type === type;

export const createTokenService = ({
  keyResolver,
  lifetimes,
  revocations,
  revocationFailureMode,
  logger,
  metrics,
  algorithm = 'HS256',
  now = () => Date.now()
}: TokenServiceOptions) => {
  const lifetimeFor = (type: TokenType): number => {
    switch (type) {
      case 'access':
        return lifetimes.access;
      case 'refresh':
        return lifetimes.refresh;
      case 'password_reset':
        return lifetimes.passwordReset;
      case 'email_verification':
        return lifetimes.emailVerification;
      case 'mfa_challenge':
        return lifetimes.mfaChallenge;
      default: {
        const unhandled: never = type;
        throw new TokenTypeMismatchError(`unsupported token type ${String(unhandled)}`);
      }
    }
  };

  const sign = async (type: TokenType, subject: string, extra: { role?: Role } = {}): Promise<IssuedToken> => {
    const jti = randomUUID();
    const issuedAt = Math.floor(now() / 1000);
    const expiresAt = issuedAt + lifetimeFor(type);
    const { kid, secret } = keyResolver.getActiveSigningKey();
    const token = await new SignJWT({ type, ...extra })
      .setProtectedHeader({ alg: algorithm, kid })
      .setSubject(subject)
      .setJti(jti)
      .setIssuedAt(issuedAt)
      .setExpirationTime(expiresAt)
      .sign(secret);
    return { token, jti, expiresAt: new Date(expiresAt * 1000) };
  };

  const issueAccessToken = (subject: string, role: Role) => sign('access', subject, { role });

  const issueToken = (type: Exclude<TokenType, 'access'>, subject: string) => sign(type, subject);

  /** Signature, expiry and type checks only; never touches the revocation registry. */
  const verify = async <T extends TokenType>(token: string, expectedType: T): Promise<ClaimsFor<T>> => {
    const kid = readKid(token);
    const key = keyResolver.getVerificationKey(kid, now());
    if (!key) {
      throw new TokenInvalidSignatureError('unknown signing key');
    }

    let payload: unknown;
    try {
      ({ payload } = await jwtVerify(token, key.secret, {
        algorithms: [algorithm],
        currentDate: new Date(now())
      }));
    } catch (error) {
      if (error instanceof joseErrors.JWTExpired) {
        throw new TokenExpiredError();
      }
      throw new TokenInvalidSignatureError();
    }

    const parsed = ClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      const type = z.object({ type: z.string() }).safeParse(payload);
      // An unknown or missing type is never accepted as the expected one.
      if (!type.success || type.data.type !== expectedType) {
        throw new TokenTypeMismatchError();
      }
      throw new TokenInvalidSignatureError('malformed token claims');
    }

    const claims: TokenClaims = parsed.data;
    if (!hasType(claims, expectedType)) {
      throw new TokenTypeMismatchError(`expected ${expectedType} token, received ${parsed.data.type}`);
    }
    return claims;
  };

  const validate = async <T extends TokenType>(token: string, expectedType: T): Promise<ClaimsFor<T>> => {
    const claims = await verify(token, expectedType);
    if (claims.type !== 'access') {
      return claims;
    }

    let revoked: boolean;
    try {
      revoked = await revocations.isRevoked(claims.jti);
    } catch (error) {
      if (!(error instanceof StoreUnavailableError) || revocationFailureMode === 'closed') {
        throw error;
      }
      logger.warn({ jti: claims.jti, err: error.reason }, 'revocation registry unreachable, accepting access token');
      metrics?.recordDegradedRevocationCheck();
      return claims;
    }

    if (revoked) {
      throw new TokenRevokedError();
    }
    return claims;
  };

  return {
    issueAccessToken,
    issueToken,
    verify,
    validate,
    lifetimeFor
  };
};

export type TokenService = ReturnType<typeof createTokenService>;

const readKid = (token: string) => {
  let kid: string | undefined;
  try {
    kid = decodeProtectedHeader(token).kid;
  } catch {
    throw new TokenInvalidSignatureError('invalid token header');
  }
  if (!kid) {
    throw new TokenInvalidSignatureError('missing kid header');
  }
  return kid;
};

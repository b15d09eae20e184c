import { RateLimiterMemory, RateLimiterRedis, type RateLimiterAbstract } from 'rate-limiter-flexible';
import type { Config } from '../config';
import type { Logger } from '../logging';
import type { AccountsRepository } from '../repositories/accountsRepo';
import type { TokensRepository } from '../repositories/tokensRepo';
import type { EphemeralStore } from '../repositories/ephemeralStore';
import { createInMemoryAccountsRepository } from '../adapters/inMemory/accountsRepository';
import { createInMemoryTokensRepository } from '../adapters/inMemory/tokensRepository';
import { createMemoryEphemeralStore } from '../adapters/inMemory/ephemeralStore';
import { createRedisEphemeralStore, getRedisClient } from '../adapters/redis';
import {
  createPostgresAccountsRepository,
  createPostgresTokensRepository,
  getPool,
  runMigrations
} from '../adapters/postgres';
import { createKeyResolver } from '../domain/keys';
import { AuthMetrics } from '../domain/metrics';
import { createLogNotifier, type Notifier } from '../domain/notifications';
import { createPasswordHasher } from '../domain/services/passwordHasher';
import { createCredentialService, type CredentialService } from '../domain/services/credentialService';
import { createRevocationRegistry, type RevocationRegistry } from '../domain/services/revocationRegistry';
import { createLockoutGuard, type LockoutGuard } from '../domain/services/lockoutGuard';
import { createTokenService, type TokenService } from '../domain/services/tokenService';
import { createSessionService, type SessionService } from '../domain/services/sessionService';
import { createMfaService, type MfaService } from '../domain/services/mfaService';

export interface Container {
  config: Config;
  logger: Logger;
  repos: {
    accounts: AccountsRepository;
    tokens: TokensRepository;
  };
  store: EphemeralStore;
  now: () => number;
  services: {
    credentials: CredentialService;
    tokens: TokenService;
    revocations: RevocationRegistry;
    lockout: LockoutGuard;
    sessions: SessionService;
    mfa: MfaService;
    notifier: Notifier;
    metrics: AuthMetrics;
    rateLimiter: RateLimiterAbstract;
  };
}

export interface ContainerOverrides {
  store?: EphemeralStore;
  notifier?: Notifier;
  rateLimiter?: RateLimiterAbstract;
  now?: () => number;
}

const buildRepositories = async (config: Config, logger: Logger, now: () => number) => {
  if (config.STORAGE_DRIVER === 'postgres') {
    const pool = getPool(config, logger);
    await runMigrations(pool);
    return {
      accounts: createPostgresAccountsRepository(pool),
      tokens: createPostgresTokensRepository(pool)
    };
  }

  return {
    accounts: createInMemoryAccountsRepository(),
    tokens: createInMemoryTokensRepository({ now })
  };
};

const buildStore = (config: Config, logger: Logger, now: () => number): EphemeralStore =>
  config.REDIS_URL ? createRedisEphemeralStore(getRedisClient(config, logger)) : createMemoryEphemeralStore({ now });

/** Per client request budget for the unauthenticated endpoints; Redis backed when Redis is configured. */
const buildRateLimiter = (config: Config, logger: Logger): RateLimiterAbstract => {
  const options = {
    keyPrefix: 'ratelimit',
    points: config.RATE_LIMIT_POINTS,
    duration: config.RATE_LIMIT_DURATION_SECONDS
  };
  if (!config.REDIS_URL) {
    return new RateLimiterMemory(options);
  }
  return new RateLimiterRedis({
    ...options,
    storeClient: getRedisClient(config, logger),
    insuranceLimiter: new RateLimiterMemory(options)
  });
};

export const createContainer = async ({
  config,
  logger,
  overrides = {}
}: {
  config: Config;
  logger: Logger;
  overrides?: ContainerOverrides;
}): Promise<Container> => {
  const now = overrides.now ?? (() => Date.now());
  const repos = await buildRepositories(config, logger, now);
  const store = overrides.store ?? buildStore(config, logger, now);
  const metrics = new AuthMetrics();

  const hasher = createPasswordHasher({
    timeCost: config.ARGON2_TIME_COST,
    memoryCost: config.ARGON2_MEMORY_COST,
    parallelism: config.ARGON2_PARALLELISM
  });
  const credentials = createCredentialService(repos.accounts, hasher, {
    requireVerifiedEmail: config.REQUIRE_EMAIL_VERIFICATION_FOR_LOGIN
  });
  const revocations = createRevocationRegistry(store, now);
  const tokens = createTokenService({
    keyResolver: createKeyResolver(config),
    lifetimes: {
      access: config.ACCESS_TOKEN_TTL_SECONDS,
      refresh: config.REFRESH_TOKEN_TTL_SECONDS,
      passwordReset: config.PASSWORD_RESET_TOKEN_TTL_SECONDS,
      emailVerification: config.EMAIL_VERIFICATION_TOKEN_TTL_SECONDS,
      mfaChallenge: config.MFA_CHALLENGE_TTL_SECONDS
    },
    revocations,
    revocationFailureMode: config.REVOCATION_FAILURE_MODE,
    logger,
    metrics,
    algorithm: config.JWT_SIGNING_ALG,
    now
  });
  const lockout = createLockoutGuard(store, {
    maxAttempts: config.LOCKOUT_MAX_ATTEMPTS,
    windowSeconds: config.LOCKOUT_WINDOW_SECONDS
  });
  const sessions = createSessionService({
    tokens,
    refreshTokens: repos.tokens,
    accounts: repos.accounts,
    revocations,
    logger,
    metrics,
    requireVerifiedEmail: config.REQUIRE_EMAIL_VERIFICATION_FOR_LOGIN,
    now
  });
  const mfa = createMfaService({
    store,
    tokens,
    sessions,
    accounts: repos.accounts,
    codeLength: config.MFA_CODE_LENGTH,
    now
  });

  return {
    config,
    logger,
    repos,
    store,
    now,
    services: {
      credentials,
      tokens,
      revocations,
      lockout,
      sessions,
      mfa,
      notifier: overrides.notifier ?? createLogNotifier(logger),
      metrics,
      rateLimiter: overrides.rateLimiter ?? buildRateLimiter(config, logger)
    }
  };
};

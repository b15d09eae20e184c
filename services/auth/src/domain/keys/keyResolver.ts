import type { Config } from '../../config';
import type { KeyMaterial, KeyResolver } from './types';

type KeyConfig = Pick<
  Config,
  'JWT_SECRET' | 'JWT_ACTIVE_KID' | 'JWT_SECONDARY_SECRET' | 'JWT_SECONDARY_KID' | 'JWT_SECONDARY_NOT_AFTER' | 'JWT_ROTATION_LEEWAY_SECONDS'
>;

const loadFromConfig = (config: KeyConfig): KeyMaterial[] => {
  const encoder = new TextEncoder();
  const keys: KeyMaterial[] = [
    {
      kid: config.JWT_ACTIVE_KID,
      secret: encoder.encode(config.JWT_SECRET),
      active: true
    }
  ];

  if (config.JWT_SECONDARY_SECRET && config.JWT_SECONDARY_KID && config.JWT_SECONDARY_KID !== config.JWT_ACTIVE_KID) {
    keys.push({
      kid: config.JWT_SECONDARY_KID,
      secret: encoder.encode(config.JWT_SECONDARY_SECRET),
      notAfter: config.JWT_SECONDARY_NOT_AFTER,
      active: false
    });
  }

  return keys;
};

/**
 * Resolves HMAC keys by `kid`. The secondary key only verifies, and stops
 * doing so once `notAfter` plus the rotation leeway has passed.
 */
export const createKeyResolver = (config: KeyConfig): KeyResolver => {
  const keys = loadFromConfig(config);
  const leewayMs = config.JWT_ROTATION_LEEWAY_SECONDS * 1000;
  const [active] = keys;

  return {
    getActiveSigningKey: () => active,
    getVerificationKey: (kid, now) =>
      keys.find((key) => key.kid === kid && (key.notAfter === undefined || now <= key.notAfter + leewayMs))
  };
};

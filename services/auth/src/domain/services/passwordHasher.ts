import argon2 from 'argon2';

export interface HashPolicy {
  timeCost: number;
  memoryCost: number;
  parallelism: number;
}

export interface PasswordHasher {
  hash(secret: string): Promise<string>;
  verify(hash: string, secret: string): Promise<boolean>;
  /** Burns one verification against a throwaway hash so unknown accounts take as long as known ones. */
  verifyDummy(secret: string): Promise<void>;
}

export const createPasswordHasher = (policy: HashPolicy): PasswordHasher => {
  const hash = (secret: string) =>
    argon2.hash(secret, {
      type: argon2.argon2id,
      timeCost: policy.timeCost,
      memoryCost: policy.memoryCost,
      parallelism: policy.parallelism
    });

  let dummyHash: Promise<string> | undefined;

  const verify = async (encoded: string, secret: string) => {
    try {
      return await argon2.verify(encoded, secret);
    } catch {
      // A stored value argon2 cannot parse never matches.
      return false;
    }
  };

  return {
    hash,
    verify,
    async verifyDummy(secret) {
      dummyHash ??= hash('dummy-password-for-timing');
      await verify(await dummyHash, secret);
    }
  };
};

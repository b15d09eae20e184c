import type { Role } from '../../domain/entities/account';
import type { Container } from '../../container';

export interface Principal {
  subject: string;
  role: Role;
}

/** The check every protected operation runs against a bearer access token. */
export const authorize = async ({ services }: Container, accessToken: string): Promise<Principal> => {
  const claims = await services.tokens.validate(accessToken, 'access');
  return { subject: claims.sub, role: claims.role };
};

import type { TokenPair } from '../../domain/entities/tokens';
import type { Container } from '../../container';

export interface RefreshInput {
  refreshToken: string;
  previousAccessToken?: string;
}

export const refresh = ({ services }: Container, input: RefreshInput): Promise<TokenPair> =>
  services.sessions.rotate(input.refreshToken, input.previousAccessToken);

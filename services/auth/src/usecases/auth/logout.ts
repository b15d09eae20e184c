import type { Container } from '../../container';

export interface LogoutInput {
  accessToken?: string;
  refreshToken: string;
}

export const logout = async ({ services }: Container, input: LogoutInput) => {
  await services.sessions.logout(input.accessToken, input.refreshToken);
};

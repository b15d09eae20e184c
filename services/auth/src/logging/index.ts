import pino from 'pino';

interface LoggerConfig {
  level: string;
}

const REDACTED_FIELDS = [
  'password',
  'current_password',
  'new_password',
  'access_token',
  'refresh_token',
  'challenge_token',
  'code',
  'token',
  'req.headers.authorization'
];

export type Logger = pino.Logger;

export const createLogger = ({ level }: LoggerConfig, destination?: pino.DestinationStream): Logger => {
  return pino({ level, redact: REDACTED_FIELDS }, destination);
};

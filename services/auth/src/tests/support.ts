import { ConfigSchema, type Config } from '../config';
import { createContainer, type ContainerOverrides } from '../container';
import { bootstrap } from '../app/bootstrap';
import { createLogger } from '../logging';
import type { Notification, Notifier } from '../domain/notifications';

export const TEST_PASSWORD = 'correct-horse-battery';

export const testConfig = (overrides: Record<string, string> = {}): Config =>
  ConfigSchema.parse({
    NODE_ENV: 'test',
    LOG_LEVEL: 'silent',
    STORAGE_DRIVER: 'memory',
    JWT_SECRET: 'test-secret',
    ARGON2_MEMORY_COST: '1024',
    ARGON2_TIME_COST: '2',
    ...overrides
  });

export const createCapturingNotifier = () => {
  const sent: Notification[] = [];
  const notifier: Notifier = {
    async send(notification) {
      sent.push(notification);
    }
  };

  const last = <K extends Notification['kind']>(kind: K) => {
    const match = sent.filter((n): n is Extract<Notification, { kind: K }> => n.kind === kind).at(-1);
    if (!match) {
      throw new Error(`no ${kind} notification captured`);
    }
    return match;
  };

  return { notifier, sent, last };
};

export const createTestContainer = async (
  configOverrides: Record<string, string> = {},
  overrides: ContainerOverrides = {}
) => {
  const config = testConfig(configOverrides);
  const logger = createLogger({ level: config.LOG_LEVEL });
  return createContainer({ config, logger, overrides });
};

export const createClock = (start = Date.UTC(2025, 0, 1)) => {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    }
  };
};

export const startTestServer = async (
  configOverrides: Record<string, string> = {},
  overrides: ContainerOverrides = {}
) => {
  const capture = createCapturingNotifier();
  const { server, container } = await bootstrap({
    config: testConfig(configOverrides),
    notifier: capture.notifier,
    ...overrides
  });
  return { app: server.app, server, container, ...capture };
};

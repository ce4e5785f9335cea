import { ConfigLoader, type BrokerConfig } from './schema.js';

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Load configuration from environment variables. Unset variables fall back to
 * schema defaults.
 *
 * NODE_ENV, BROKER_SECRET_KEY, BROKER_SYSTEM_AGENT, BROKER_STORE,
 * BROKER_DATA_DIR, LOG_LEVEL, LOG_PRETTY
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): BrokerConfig {
  return ConfigLoader.load({
    env: nonEmpty(env.NODE_ENV),
    broker: {
      secretKey: nonEmpty(env.BROKER_SECRET_KEY),
      systemAgentId: nonEmpty(env.BROKER_SYSTEM_AGENT),
    },
    store: {
      type: nonEmpty(env.BROKER_STORE),
      dataDir: nonEmpty(env.BROKER_DATA_DIR),
    },
    observability: {
      logging: {
        level: nonEmpty(env.LOG_LEVEL?.toLowerCase()),
        prettyPrint: parseBoolean(env.LOG_PRETTY),
      },
    },
  });
}

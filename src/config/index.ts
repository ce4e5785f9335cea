export {
  BrokerConfigSchema,
  ConfigLoader,
  ConfigValidationError,
  type BrokerConfig,
  type BrokerConfigInput,
  type BrokerSettings,
  type StoreConfig,
  type PoliciesConfig,
  type TelemetryConfig,
  type ObservabilityConfig,
} from './schema.js';

export { loadConfigFromEnv } from './env.js';

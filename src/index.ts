// Configuration
export {
  BrokerConfigSchema,
  ConfigLoader,
  ConfigValidationError,
  loadConfigFromEnv,
  type BrokerConfig,
  type BrokerConfigInput,
  type BrokerSettings,
  type StoreConfig,
  type PoliciesConfig,
  type TelemetryConfig,
  type ObservabilityConfig,
} from './config/index.js';

// Messaging
export * from './messaging/index.js';

// Policy validation
export * from './policy/index.js';

// Telemetry
export * from './telemetry/index.js';

// Persistence
export * from './persistence/index.js';

// Observability
export * from './observability/index.js';

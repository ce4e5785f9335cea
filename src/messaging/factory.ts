/**
 * Runtime assembly: builds a broker and its collaborators from configuration
 */

import type { BrokerConfig } from '../config/schema.js';
import type { DatabaseAdapter } from '../persistence/index.js';
import { createLogger, type Logger } from '../observability/logger.js';
import { MetricsRegistry } from '../observability/metrics.js';
import { createPolicyValidator } from '../policy/policies.js';
import type { PolicyValidator } from '../policy/validator.js';
import type { MessagePolicy } from '../policy/types.js';
import { createTelemetrySink } from '../telemetry/sinks.js';
import type { TelemetrySink } from '../telemetry/types.js';
import { MessageBroker } from './broker.js';
import { createMessageStore, type MessageStore } from './stores/message-store.js';

export interface MessagingRuntimeOptions {
  /** Policies added after the configured ones */
  policies?: MessagePolicy[];
  /** Database adapter for the pglite store, instead of one opened on `store.dataDir` */
  adapter?: DatabaseAdapter;
  registry?: MetricsRegistry;
  logger?: Logger;
}

export interface MessagingRuntime {
  broker: MessageBroker;
  store: MessageStore;
  telemetry: TelemetrySink;
  validator?: PolicyValidator;
  registry: MetricsRegistry;
  logger: Logger;
  close(): Promise<void>;
}

export async function createMessagingRuntime(
  config: BrokerConfig,
  options: MessagingRuntimeOptions = {}
): Promise<MessagingRuntime> {
  const logger = options.logger ?? createLogger(config.observability.logging);
  const registry = options.registry ?? new MetricsRegistry({ prefix: config.observability.metrics.prefix });

  const store = createMessageStore({
    type: config.store.type,
    dataDir: config.store.dataDir,
    tableName: config.store.tableName,
    adapter: options.adapter,
    logger: logger.child({ module: 'MessageStore' }),
  });
  await store.initialize();

  const telemetry = createTelemetrySink({
    enabled: config.telemetry.enabled,
    sinks: config.telemetry.sinks,
    maxEvents: config.telemetry.maxEvents,
    registry,
    logger: logger.child({ module: 'Telemetry' }),
  });

  const validator = createPolicyValidator(
    config.policies,
    options.policies,
    logger.child({ module: 'PolicyValidator' })
  );

  const broker = new MessageBroker({
    secretKey: config.broker.secretKey,
    store,
    telemetry,
    validator,
    logger: logger.child({ module: 'MessageBroker' }),
    systemAgentId: config.broker.systemAgentId,
    historyLimit: config.broker.historyLimit,
    notifySenderOnFailure: config.broker.notifySenderOnFailure,
  });

  logger.info(
    {
      env: config.env,
      store: config.store.type,
      durable: store.durable,
      signed: broker.signsMessages,
      policies: validator?.listPolicies() ?? [],
      telemetry: config.telemetry.enabled ? config.telemetry.sinks : [],
    },
    'Messaging runtime ready'
  );

  return {
    broker,
    store,
    telemetry,
    validator,
    registry,
    logger,
    close: () => store.close(),
  };
}

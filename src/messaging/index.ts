export {
  MessageType,
  type DeliveryState,
  type DeliveryStatus,
  type SerializedEnvelope,
  type SignatureClaims,
} from './types.js';

export {
  BrokerError,
  InvalidEnvelopeError,
  SignatureError,
  StoreError,
  errorMessage,
} from './errors.js';

export { HmacTokenSigner, defaultSigner, type MessageSigner } from './signing.js';

export {
  MessageEnvelope,
  MessageTypeSchema,
  SerializedEnvelopeSchema,
  type CreateEnvelopeOptions,
} from './envelope.js';

export * from './stores/index.js';

export {
  MessageBroker,
  formatPolicyRejection,
  formatDeliveryFailure,
  type MessageBrokerOptions,
} from './broker.js';

export {
  MessageConsumer,
  type MessageHandler,
  type MessageConsumerConfig,
  type MessageConsumerEvents,
  type DrainResult,
} from './consumer.js';

export {
  createMessagingRuntime,
  type MessagingRuntime,
  type MessagingRuntimeOptions,
} from './factory.js';

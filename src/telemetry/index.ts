export {
  TelemetryEventType,
  type TelemetryEvent,
  type TelemetryEventInput,
  type TelemetryQuery,
  type TelemetrySink,
} from './types.js';

export {
  NoopTelemetrySink,
  InMemoryTelemetrySink,
  LoggingTelemetrySink,
  MetricsTelemetrySink,
  CompositeTelemetrySink,
  createTelemetrySink,
  type TelemetrySinkType,
  type TelemetryOptions,
} from './sinks.js';

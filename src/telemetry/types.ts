/**
 * Telemetry Event Types
 * Structured records of message state transitions
 */

export const TelemetryEventType = {
  /** A message was admitted and queued for its recipient */
  MESSAGE_SENT: 'message_sent',
  /** A message was rejected by policy validation */
  MESSAGE_VALIDATION_FAILED: 'message_validation_failed',
  /** A recipient acknowledged a message */
  MESSAGE_PROCESSED: 'message_processed',
  /** A message exhausted its retries */
  MESSAGE_FAILED: 'message_failed',
  /** A recipient's pending queue changed size */
  QUEUE_LENGTH_CHANGED: 'queue_length_changed',
  /** A failed message was re-queued */
  RETRY: 'retry',
} as const;

export type TelemetryEventType = (typeof TelemetryEventType)[keyof typeof TelemetryEventType];

export interface TelemetryEventInput {
  eventType: TelemetryEventType;
  correlationId?: string;
  /** Agent the event is about (sender, recipient or queue owner) */
  agentId?: string;
  messageId?: string;
  details: Record<string, unknown>;
}

export interface TelemetryEvent extends TelemetryEventInput {
  id: string;
  /** Milliseconds since epoch */
  timestamp: number;
}

/**
 * Structured event recorder. Sinks may be synchronous or asynchronous; the
 * broker never lets a sink failure affect delivery.
 */
export interface TelemetrySink {
  recordEvent(event: TelemetryEventInput): void | Promise<void>;
}

export interface TelemetryQuery {
  eventType?: TelemetryEventType;
  agentId?: string;
  messageId?: string;
  correlationId?: string;
  /** Only events at or after this time (ms) */
  since?: number;
  limit?: number;
}

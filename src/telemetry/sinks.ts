import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import { getLogger } from '../observability/logger.js';
import { MetricsRegistry, type Counter, type Gauge } from '../observability/metrics.js';
import {
  TelemetryEventType,
  type TelemetryEvent,
  type TelemetryEventInput,
  type TelemetryQuery,
  type TelemetrySink,
} from './types.js';

// ============================================================================
// No-op
// ============================================================================

export class NoopTelemetrySink implements TelemetrySink {
  recordEvent(_event: TelemetryEventInput): void {}
}

// ============================================================================
// In-Memory
// ============================================================================

/**
 * Keeps the most recent events in a bounded buffer for inspection.
 */
export class InMemoryTelemetrySink implements TelemetrySink {
  private readonly events: TelemetryEvent[] = [];

  constructor(private readonly maxEvents: number = 1000) {}

  recordEvent(event: TelemetryEventInput): void {
    this.events.push({
      ...event,
      details: { ...event.details },
      id: randomUUID(),
      timestamp: Date.now(),
    });

    if (this.events.length > this.maxEvents) {
      this.events.splice(0, this.events.length - this.maxEvents);
    }
  }

  getEvents(query: TelemetryQuery = {}): TelemetryEvent[] {
    const matches = this.events.filter(
      e =>
        (query.eventType === undefined || e.eventType === query.eventType) &&
        (query.agentId === undefined || e.agentId === query.agentId) &&
        (query.messageId === undefined || e.messageId === query.messageId) &&
        (query.correlationId === undefined || e.correlationId === query.correlationId) &&
        (query.since === undefined || e.timestamp >= query.since)
    );

    return query.limit !== undefined ? matches.slice(-query.limit) : matches;
  }

  get size(): number {
    return this.events.length;
  }

  clear(): void {
    this.events.length = 0;
  }
}

// ============================================================================
// Logging
// ============================================================================

const WARN_EVENTS: ReadonlySet<TelemetryEventType> = new Set<TelemetryEventType>([
  TelemetryEventType.MESSAGE_FAILED,
  TelemetryEventType.MESSAGE_VALIDATION_FAILED,
]);

/**
 * Writes every event as a structured log line.
 */
export class LoggingTelemetrySink implements TelemetrySink {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? getLogger().child({ module: 'Telemetry' });
  }

  recordEvent(event: TelemetryEventInput): void {
    const entry = {
      eventType: event.eventType,
      correlationId: event.correlationId,
      agentId: event.agentId,
      messageId: event.messageId,
      details: event.details,
    };

    if (WARN_EVENTS.has(event.eventType)) {
      this.logger.warn(entry, `telemetry: ${event.eventType}`);
    } else {
      this.logger.info(entry, `telemetry: ${event.eventType}`);
    }
  }
}

// ============================================================================
// Metrics
// ============================================================================

/**
 * Counts events by type and tracks per-agent queue length.
 */
export class MetricsTelemetrySink implements TelemetrySink {
  readonly events: Counter;
  readonly queueLength: Gauge;

  constructor(registry: MetricsRegistry = new MetricsRegistry()) {
    this.events = registry.counter('events_total', 'Broker telemetry events by type');
    this.queueLength = registry.gauge('queue_length', 'Pending messages per agent');
  }

  recordEvent(event: TelemetryEventInput): void {
    this.events.inc({ event_type: event.eventType });

    if (event.eventType === TelemetryEventType.QUEUE_LENGTH_CHANGED && event.agentId) {
      const length = event.details.queueLength;
      if (typeof length === 'number') {
        this.queueLength.set({ agent: event.agentId }, length);
      }
    }
  }
}

// ============================================================================
// Composite
// ============================================================================

/**
 * Fans out to several sinks. A failing sink is logged and does not stop the
 * others.
 */
export class CompositeTelemetrySink implements TelemetrySink {
  private readonly logger: Logger;

  constructor(
    private readonly sinks: TelemetrySink[],
    logger?: Logger
  ) {
    this.logger = logger ?? getLogger().child({ module: 'CompositeTelemetry' });
  }

  async recordEvent(event: TelemetryEventInput): Promise<void> {
    const results = await Promise.allSettled(
      this.sinks.map(async sink => sink.recordEvent(event))
    );

    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.warn(
          { eventType: event.eventType, error: result.reason instanceof Error ? result.reason.message : String(result.reason) },
          'Telemetry sink failed'
        );
      }
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export type TelemetrySinkType = 'log' | 'memory' | 'metrics';

export interface TelemetryOptions {
  enabled: boolean;
  sinks: TelemetrySinkType[];
  maxEvents?: number;
  registry?: MetricsRegistry;
  logger?: Logger;
}

export function createTelemetrySink(options: TelemetryOptions): TelemetrySink {
  if (!options.enabled || options.sinks.length === 0) {
    return new NoopTelemetrySink();
  }

  const sinks = Array.from(new Set(options.sinks)).map((type): TelemetrySink => {
    switch (type) {
      case 'log':
        return new LoggingTelemetrySink(options.logger);
      case 'memory':
        return new InMemoryTelemetrySink(options.maxEvents);
      case 'metrics':
        return new MetricsTelemetrySink(options.registry);
    }
  });

  return sinks.length === 1 ? sinks[0] : new CompositeTelemetrySink(sinks, options.logger);
}

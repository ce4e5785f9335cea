// ============================================================================
// Broker Metrics (Prometheus text exposition)
// ============================================================================

export type Labels = Record<string, string>;

export interface MetricsConfig {
  /** Prefix for all metric names */
  prefix?: string;
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function seriesKey(labels: Labels): string {
  return Object.keys(labels)
    .sort()
    .map(name => `${name}="${escapeLabelValue(labels[name])}"`)
    .join(',');
}

/**
 * One named metric holding a value per label set
 */
abstract class Series {
  abstract readonly type: 'counter' | 'gauge';
  protected readonly values = new Map<string, number>();

  constructor(
    readonly name: string,
    readonly help: string
  ) {}

  get(labels: Labels = {}): number {
    return this.values.get(seriesKey(labels)) ?? 0;
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} ${this.type}`];
    for (const [key, value] of this.values) {
      lines.push(key ? `${this.name}{${key}} ${value}` : `${this.name} ${value}`);
    }
    return lines;
  }
}

/**
 * Event totals, e.g. `events_total{event_type="retry"}`
 */
export class Counter extends Series {
  readonly type = 'counter' as const;

  inc(labels: Labels = {}, by: number = 1): void {
    if (by < 0) {
      throw new Error(`Counter ${this.name} cannot decrease`);
    }
    const key = seriesKey(labels);
    this.values.set(key, (this.values.get(key) ?? 0) + by);
  }
}

/**
 * Last observed value, e.g. `queue_length{agent="B"}`
 */
export class Gauge extends Series {
  readonly type = 'gauge' as const;

  set(labels: Labels, value: number): void {
    this.values.set(seriesKey(labels), value);
  }
}

export class MetricsRegistry {
  private readonly series = new Map<string, Counter | Gauge>();
  readonly prefix: string;

  constructor(config: MetricsConfig = {}) {
    this.prefix = config.prefix ?? 'broker';
  }

  /** Register a counter, or return the one already under this name */
  counter(name: string, help: string): Counter {
    const existing = this.lookup(name, 'counter');
    if (existing instanceof Counter) return existing;

    const counter = new Counter(this.fullName(name), help);
    this.series.set(counter.name, counter);
    return counter;
  }

  /** Register a gauge, or return the one already under this name */
  gauge(name: string, help: string): Gauge {
    const existing = this.lookup(name, 'gauge');
    if (existing instanceof Gauge) return existing;

    const gauge = new Gauge(this.fullName(name), help);
    this.series.set(gauge.name, gauge);
    return gauge;
  }

  /** Prometheus text format */
  export(): string {
    const lines: string[] = [];
    for (const metric of this.series.values()) {
      lines.push(...metric.render(), '');
    }
    return lines.join('\n');
  }

  private lookup(name: string, type: 'counter' | 'gauge'): Counter | Gauge | undefined {
    const existing = this.series.get(this.fullName(name));
    if (existing && existing.type !== type) {
      throw new Error(`Metric ${existing.name} already registered as a ${existing.type}`);
    }
    return existing;
  }

  private fullName(name: string): string {
    return this.prefix ? `${this.prefix}_${name}` : name;
  }
}

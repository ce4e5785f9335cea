import { z } from 'zod';

// Environment validation
const NodeEnvSchema = z.enum(['development', 'test', 'staging', 'production']).default('development');

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
}

// Broker behaviour
const BrokerSettingsSchema = z.object({
  // Shared secret for signing; unsigned operation when absent
  secretKey: z.string().min(1).optional(),
  systemAgentId: z.string().min(1).default('broker'),
  historyLimit: z.number().int().min(0).max(1000).default(10),
  // Off by default: exhausted messages are dropped silently
  notifySenderOnFailure: z.boolean().default(false),
});

// Message store
const StoreConfigSchema = z.object({
  type: z.enum(['none', 'memory', 'pglite']).default('memory'),
  // PGlite data directory; the database lives in memory when absent
  dataDir: z.string().min(1).optional(),
  tableName: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid SQL identifier')
    .default('messages'),
});

// Admission policies; all disabled unless configured
const PoliciesConfigSchema = z.object({
  contentLength: z.object({
    enabled: z.boolean().default(false),
    maxLength: z.number().int().positive().default(10_000),
  }).default({}),

  forbiddenContent: z.object({
    enabled: z.boolean().default(false),
    patterns: z.array(z.string().refine(isValidPattern, 'must be a valid regular expression')).default([]),
  }).default({}),

  pii: z.object({
    enabled: z.boolean().default(false),
  }).default({}),

  // Counted from conversation history, so maxMessages should stay below broker.historyLimit
  rateLimit: z.object({
    enabled: z.boolean().default(false),
    maxMessages: z.number().int().positive().default(5),
    windowSeconds: z.number().positive().default(60),
  }).default({}),
});

const TelemetryConfigSchema = z.object({
  enabled: z.boolean().default(true),
  sinks: z.array(z.enum(['log', 'memory', 'metrics'])).default(['log']),
  maxEvents: z.number().int().positive().default(1000),
});

const ObservabilityConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    prettyPrint: z.boolean().default(false),
  }).default({}),

  metrics: z.object({
    prefix: z.string().default('broker'),
  }).default({}),
});

// Root configuration schema
export const BrokerConfigSchema = z.object({
  env: NodeEnvSchema,
  broker: BrokerSettingsSchema.default({}),
  store: StoreConfigSchema.default({}),
  policies: PoliciesConfigSchema.default({}),
  telemetry: TelemetryConfigSchema.default({}),
  observability: ObservabilityConfigSchema.default({}),
});

export type BrokerConfig = z.infer<typeof BrokerConfigSchema>;
export type BrokerConfigInput = z.input<typeof BrokerConfigSchema>;
export type BrokerSettings = z.infer<typeof BrokerSettingsSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type PoliciesConfig = z.infer<typeof PoliciesConfigSchema>;
export type TelemetryConfig = z.infer<typeof TelemetryConfigSchema>;
export type ObservabilityConfig = z.infer<typeof ObservabilityConfigSchema>;

const MIN_PRODUCTION_SECRET_LENGTH = 32;

// Configuration loader with validation
export class ConfigLoader {
  static load(raw: unknown): BrokerConfig {
    const result = BrokerConfigSchema.safeParse(raw);

    if (!result.success) {
      throw new ConfigValidationError(
        result.error.errors.map(e => ({ path: e.path.join('.'), message: e.message }))
      );
    }

    this.validateProduction(result.data);
    return result.data;
  }

  private static validateProduction(config: BrokerConfig): void {
    if (config.env !== 'production') {
      return;
    }

    const secret = config.broker.secretKey;
    if (!secret || secret.length < MIN_PRODUCTION_SECRET_LENGTH) {
      throw new ConfigValidationError([
        {
          path: 'broker.secretKey',
          message: `must be at least ${MIN_PRODUCTION_SECRET_LENGTH} characters in production`,
        },
      ]);
    }
  }
}

/**
 * Configuration validation error
 * Supports both string[] and {path, message}[] formats
 */
export class ConfigValidationError extends Error {
  public readonly errors: Array<{ path: string; message: string }>;

  constructor(errors: string[] | Array<{ path: string; message: string }>) {
    const normalizedErrors = errors.map(e => {
      if (typeof e === 'string') {
        return { path: '', message: e };
      }
      return e;
    });

    const message = normalizedErrors.map(e =>
      e.path ? `${e.path}: ${e.message}` : e.message
    ).join(', ');

    super(`Configuration validation failed: ${message}`);
    this.name = 'ConfigValidationError';
    this.errors = normalizedErrors;
  }
}

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

const DEFAULT_REDACT_PATHS = [
  'secret',
  'secretKey',
  'secret_key',
  'signingSecret',
  'signature',
  'token',
  'password',
  'apiKey',
  'authorization',
  '*.secret',
  '*.secretKey',
  '*.signature',
  '*.token',
  '*.password',
];

const SENSITIVE_PATTERNS = [
  { pattern: /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g, replacement: '[REDACTED_TOKEN]' },
  { pattern: /Bearer\s+[a-zA-Z0-9._-]+/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /:\/\/[^:/\s]+:[^@/\s]+@/g, replacement: '://[REDACTED]@' },
];

export interface LoggerConfig {
  level?: LogLevel;
  prettyPrint?: boolean;
  redactPaths?: string[];
  serviceName?: string;
  version?: string;
}

function redactSensitiveStrings(value: unknown): unknown {
  if (typeof value === 'string') {
    let result = value;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
      result = result.replace(pattern, replacement);
    }
    return result;
  }

  if (Array.isArray(value)) {
    return value.map(redactSensitiveStrings);
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = redactSensitiveStrings(val);
    }
    return result;
  }

  return value;
}

function levelFromEnv(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS.find(level => level === raw);
}

export function createLogger(config: LoggerConfig = {}, destination?: DestinationStream): Logger {
  const {
    level = levelFromEnv() ?? 'info',
    prettyPrint = false,
    redactPaths = [],
    serviceName = 'agent-message-broker',
    version = '0.1.0',
  } = config;

  const options: LoggerOptions = {
    level,
    name: serviceName,
    redact: {
      paths: [...DEFAULT_REDACT_PATHS, ...redactPaths],
      censor: '[REDACTED]',
    },
    base: {
      service: serviceName,
      version,
      pid: process.pid,
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
      log: (obj: Record<string, unknown>) => {
        const redacted: Record<string, unknown> = {};
        for (const [key, val] of Object.entries(obj)) {
          redacted[key] = redactSensitiveStrings(val);
        }
        return redacted;
      },
    },
  };

  if (destination) {
    return pino(options, destination);
  }

  if (prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(options);
}

let loggerInstance: Logger | null = null;

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
}

export function initLogger(config: LoggerConfig): Logger {
  loggerInstance = createLogger(config);
  return loggerInstance;
}

export type { Logger };

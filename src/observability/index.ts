export {
  createLogger,
  getLogger,
  initLogger,
  type Logger,
  type LoggerConfig,
  type LogLevel,
} from './logger.js';

export {
  MetricsRegistry,
  Counter,
  Gauge,
  type Labels,
  type MetricsConfig,
} from './metrics.js';

/**
 * @package @resilient-bridge/core
 * Resilience layer for request-processing backends: admission control,
 * circuit breaking, result caching, telemetry and health reporting.
 */

export * from './bridge';
export * from './resilience';
export * from './errors';

export {
  BridgeConfigSchema,
  loadConfig,
  resolveConfig,
  type BridgeConfig,
  type BridgeConfigInput,
  type CacheScope,
} from './config';

export {
  ResultCache,
  type ResultCacheOptions,
  type CacheMetric,
} from './cache/result-cache';

export {
  StructuredLogger,
  LogLevel,
  createLogger,
  parseLogLevel,
  serializeError,
  type LogContext,
  type LogEntry,
  type LoggerOptions,
  type SerializedError,
} from './observability/structured-logger';

export {
  TelemetryRecorder,
  type TelemetryLabels,
  type TelemetryRecorderOptions,
  type TelemetrySample,
  type TelemetrySink,
  type TelemetrySnapshot,
} from './observability/telemetry-recorder';

export {
  BridgeHealthReporter,
  HealthStatus,
  type BridgeHealth,
  type BridgeMetrics,
} from './health/health-reporter';

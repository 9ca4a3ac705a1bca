/**
 * Public API barrel.
 *
 * Re-exports the logger, its request-scoped view, the record schema,
 * configuration helpers, HTTP middleware and adapters.
 * @module
 */

// Adapters
export type { LoggingConnectObserverOptions } from "./adapters/logging-connect-observer.js";
export { LoggingConnectObserver } from "./adapters/logging-connect-observer.js";
export { createLogStream } from "./adapters/log-stream.js";
export type { PrometheusHttpMetricsOptions } from "./adapters/prometheus-http-metrics.js";
export {
  DEFAULT_DURATION_BUCKETS,
  PrometheusHttpMetrics,
} from "./adapters/prometheus-http-metrics.js";
// Config
export type { LoggerConfig, LoggerConfigInput } from "./config/config-schema.js";
export { levelSchema, loggerConfigSchema } from "./config/config-schema.js";
export {
  createLoggerFromEnv,
  ENV_KEYS,
  loadLoggerConfig,
  resolveLoggerConfig,
} from "./config/logger-config.js";
// Core
export { formatMessage } from "./core/format.js";
export type { LevelName } from "./core/level.js";
export { Level, LEVELS, levelString, parseLevel, validLevel } from "./core/level.js";
export type {
  EcsClient,
  EcsLog,
  EcsNetwork,
  EcsService,
  EcsTrace,
  LogRecord,
  RecordInput,
  RecordSupplier,
  RequestFields,
} from "./core/log-record.js";
export { buildRecord } from "./core/log-record.js";
export type { LoggerOptions } from "./core/logger.js";
export { createLogger, Logger } from "./core/logger.js";
export type {
  ExtractedRequestFields,
  InboundRequest,
  RequestHeaders,
  RequestInfo,
} from "./core/request-fields.js";
export {
  extractRequestFields,
  FORWARDED_FOR_HEADER,
  headerValue,
  peerAddress,
  REQUEST_ID_HEADER,
} from "./core/request-fields.js";
export { ScopedLogger } from "./core/scoped-logger.js";
// Errors
export {
  AddressParseError,
  ConfigError,
  errorMessage,
  InvalidLevelError,
  LoggingError,
} from "./errors.js";
// HTTP
export { instrumentRequests } from "./http/instrumentation.js";
export type { MetricsSource } from "./http/metrics-endpoint.js";
export { handleMetrics } from "./http/metrics-endpoint.js";
export { requestLogger, requestLoggerFor, withRequestLogger } from "./http/request-logger.js";
export type { Middleware, RequestHandler } from "./http/types.js";
// Interfaces
export type { ConnectObserver, ObservedConnect } from "./interfaces/connect-observer.js";
export type { LevelLogger } from "./interfaces/logger.js";
export type {
  DurationHistogram,
  RequestCounter,
  RequestLabels,
} from "./interfaces/metrics.js";
export type { Sink } from "./interfaces/sink.js";
// Utils
export type { HostPort } from "./utils/host-port.js";
export { joinHostPort, splitHostPort } from "./utils/host-port.js";

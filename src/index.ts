// SPDX-License-Identifier: MIT

export { TsdbClient } from './client.js';
export { MetricsReporter } from './reporter.js';
export { HttpTransport, METRICS_PATH, agentOptions } from './transport.js';
export { partition } from './batch.js';
export {
  createMetric,
  metricKey,
  metricsEqual,
  uniqueMetrics,
  toWireMetric,
  formatMetric,
} from './metric.js';
export { basicAuth, basicAuthHeader } from './auth.js';
export {
  resolveConfig,
  configFromEnv,
  DEFAULT_BATCH_SIZE_LIMIT,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_READ_TIMEOUT_MS,
} from './config.js';
export { consoleLogger } from './logger.js';
export { ConfigurationError, InvalidMetricError } from './errors.js';
export type {
  Metric,
  WireMetric,
  BatchResult,
  Logger,
  OutgoingRequest,
  RequestDecorator,
  FetchLike,
  Transport,
  TransportResponse,
  ClientOptions,
  Config,
  ResolvedConfig,
  ValuesProvider,
  ReporterConfig,
} from './types.js';

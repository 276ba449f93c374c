// SPDX-License-Identifier: MIT

import type { Config, ResolvedConfig } from './types.js';
import { ConfigurationError } from './errors.js';

export const DEFAULT_BATCH_SIZE_LIMIT = 0;
export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
export const DEFAULT_READ_TIMEOUT_MS = 5000;

/**
 * Validates configuration once and applies defaults.
 *
 * @param config - Client configuration.
 * @returns Frozen configuration.
 * @throws ConfigurationError if a value is invalid.
 */
export function resolveConfig(config: Config): ResolvedConfig {
  const baseUrl = parseBaseUrl(config.baseUrl);
  const connectTimeoutMs = positiveInteger(
    'connectTimeoutMs',
    config.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS
  );
  const readTimeoutMs = positiveInteger('readTimeoutMs', config.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS);
  const batchSizeLimit = validateBatchSizeLimit(config.batchSizeLimit ?? DEFAULT_BATCH_SIZE_LIMIT);

  // Authentication needs both halves
  const { login, password } = config;
  const credentials = login && password ? Object.freeze({ login, password }) : undefined;

  return Object.freeze({
    baseUrl,
    connectTimeoutMs,
    readTimeoutMs,
    batchSizeLimit,
    credentials,
    decorators: Object.freeze([...(config.decorators ?? [])]),
  });
}

/**
 * @throws ConfigurationError unless limit is a non-negative integer.
 */
export function validateBatchSizeLimit(limit: number): number {
  if (!Number.isSafeInteger(limit) || limit < 0) {
    throw new ConfigurationError(`batchSizeLimit must be a non-negative integer, got ${limit}`);
  }
  return limit;
}

/**
 * Builds a configuration from TSDB_* environment variables.
 *
 * @throws ConfigurationError if TSDB_URL is missing or a number is malformed.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Config {
  const baseUrl = env['TSDB_URL'];
  if (!baseUrl) {
    throw new ConfigurationError('TSDB_URL is not set');
  }

  const config: Config = { baseUrl };

  const connectTimeoutMs = integerFromEnv(env, 'TSDB_CONNECT_TIMEOUT_MS');
  if (connectTimeoutMs !== undefined) config.connectTimeoutMs = connectTimeoutMs;

  const readTimeoutMs = integerFromEnv(env, 'TSDB_READ_TIMEOUT_MS');
  if (readTimeoutMs !== undefined) config.readTimeoutMs = readTimeoutMs;

  const batchSizeLimit = integerFromEnv(env, 'TSDB_BATCH_SIZE_LIMIT');
  if (batchSizeLimit !== undefined) config.batchSizeLimit = batchSizeLimit;

  if (env['TSDB_LOGIN']) config.login = env['TSDB_LOGIN'];
  if (env['TSDB_PASSWORD']) config.password = env['TSDB_PASSWORD'];

  return config;
}

function parseBaseUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch (err) {
    throw new ConfigurationError(`invalid baseUrl: ${value}`, { cause: err });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`baseUrl must use http or https, got ${url.protocol}`);
  }
  return value.replace(/\/+$/, '');
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function integerFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = (env[name] ?? '').trim();
  if (raw === '') {
    return undefined;
  }
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
  }
  return Number(raw);
}

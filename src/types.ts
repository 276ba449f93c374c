// SPDX-License-Identifier: MIT

import type { RequestInit, Response } from 'undici';

/**
 * A single time-series data point.
 * Instances returned by `createMetric` are frozen.
 */
export interface Metric {
  readonly name: string;
  /** Epoch timestamp, seconds or milliseconds as the server accepts */
  readonly timestamp: number;
  readonly value: number;
  readonly tags: Readonly<Record<string, string>>;
}

/**
 * Wire representation of a metric (body element of POST /api/put).
 */
export interface WireMetric {
  metric: string;
  timestamp: number;
  value: number;
  tags: Record<string, string>;
}

/**
 * Outcome of submitting one batch.
 */
export type BatchResult =
  | { ok: true; size: number; status: number }
  | { ok: false; size: number; status?: number; error: string };

/**
 * Destination for client log output.
 */
export interface Logger {
  info(message: string): void;
  error(message: string, err?: unknown): void;
}

/**
 * An outgoing HTTP request, before it is handed to fetch.
 */
export interface OutgoingRequest {
  url: string;
  method: 'POST';
  headers: Record<string, string>;
  body: string;
}

/**
 * Hook applied to every outgoing request. Must return the request to send.
 */
export type RequestDecorator = (request: OutgoingRequest) => OutgoingRequest;

/**
 * Subset of undici's fetch used by the HTTP transport.
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface TransportResponse {
  status: number;
}

/**
 * Something able to POST a batch of metrics to a path.
 * Resolves with the HTTP status; rejects on serialization or network failure.
 */
export interface Transport {
  post(path: string, batch: readonly Metric[]): Promise<TransportResponse>;
  /** Releases pooled connections */
  close?(): Promise<void>;
}

/**
 * Options shared by every client, whatever its transport.
 */
export interface ClientOptions {
  /** Maximum metrics per request; 0 sends everything at once (default: 0) */
  batchSizeLimit?: number;
  /** Log destination (default: console, prefixed with "[tsdb]") */
  logger?: Logger;
  /** Called after every send with one result per submitted batch */
  onSendComplete?: (results: readonly BatchResult[]) => void;
}

/**
 * Configuration for a client talking HTTP to a time-series database.
 */
export interface Config extends ClientOptions {
  /** Base URL of the server (e.g., "http://tsdb.example.com:4242") */
  baseUrl: string;
  /** Connect timeout in milliseconds (default: 5000) */
  connectTimeoutMs?: number;
  /** Read timeout in milliseconds (default: 5000) */
  readTimeoutMs?: number;
  /** Basic auth login, used only together with a non-empty password */
  login?: string;
  /** Basic auth password, used only together with a non-empty login */
  password?: string;
  /** Extra hooks applied to every request, after authentication */
  decorators?: RequestDecorator[];
  /** fetch implementation (default: undici's fetch) */
  fetch?: FetchLike;
}

/**
 * Validated configuration with defaults applied.
 */
export interface ResolvedConfig {
  readonly baseUrl: string;
  readonly connectTimeoutMs: number;
  readonly readTimeoutMs: number;
  readonly batchSizeLimit: number;
  readonly credentials?: Readonly<{ login: string; password: string }>;
  readonly decorators: readonly RequestDecorator[];
}

/**
 * Function that returns the values to report, keyed by metric name.
 */
export type ValuesProvider = () => Record<string, number> | Promise<Record<string, number>>;

/**
 * Configuration for a periodic reporter.
 */
export interface ReporterConfig {
  provider: ValuesProvider;
  /** Interval between reports in milliseconds (default: 60000, minimum: 1000) */
  intervalMs?: number;
  /** Prepended to every name, joined with "." */
  prefix?: string;
  /** Tags attached to every reported metric */
  tags?: Record<string, string>;
  /** Current time in epoch milliseconds (default: Date.now) */
  clock?: () => number;
  /** Log destination for provider failures (default: console) */
  logger?: Logger;
}

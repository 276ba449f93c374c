// SPDX-License-Identifier: MIT

import { Agent, fetch } from 'undici';
import type {
  FetchLike,
  Metric,
  OutgoingRequest,
  RequestDecorator,
  ResolvedConfig,
  Transport,
  TransportResponse,
} from './types.js';
import { toWireMetric } from './metric.js';
import { basicAuth } from './auth.js';

/** Ingestion endpoint of the HTTP API */
export const METRICS_PATH = '/api/put';

/**
 * Connection pool options for the configured timeouts.
 * The connect timeout bounds socket setup; the read timeout bounds the wait
 * for response headers and each gap while reading the body.
 */
export function agentOptions(config: ResolvedConfig): Agent.Options {
  return {
    connect: { timeout: config.connectTimeoutMs },
    headersTimeout: config.readTimeoutMs,
    bodyTimeout: config.readTimeoutMs,
  };
}

/**
 * Transport posting JSON batches with fetch over a dedicated connection pool.
 */
export class HttpTransport implements Transport {
  private readonly decorators: readonly RequestDecorator[];
  private readonly agent: Agent;

  constructor(
    private readonly config: ResolvedConfig,
    private readonly fetchImpl: FetchLike = fetch
  ) {
    const auth = config.credentials
      ? [basicAuth(config.credentials.login, config.credentials.password)]
      : [];
    this.decorators = [...auth, ...config.decorators];
    this.agent = new Agent(agentOptions(config));
  }

  async post(path: string, batch: readonly Metric[]): Promise<TransportResponse> {
    let request: OutgoingRequest = {
      url: `${this.config.baseUrl}${path}`,
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(batch.map(toWireMetric)),
    };
    for (const decorate of this.decorators) {
      request = decorate(request);
    }

    const response = await this.fetchImpl(request.url, {
      method: request.method,
      body: request.body,
      headers: request.headers,
      dispatcher: this.agent,
    });
    // Release the connection; the body carries nothing we use
    await response.arrayBuffer();
    return { status: response.status };
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}

// SPDX-License-Identifier: MIT

import type { BatchResult, ClientOptions, Config, Logger, Metric, Transport } from './types.js';
import { resolveConfig, validateBatchSizeLimit, DEFAULT_BATCH_SIZE_LIMIT } from './config.js';
import { HttpTransport, METRICS_PATH } from './transport.js';
import { partition } from './batch.js';
import { uniqueMetrics } from './metric.js';
import { consoleLogger } from './logger.js';

/**
 * Client submitting metrics to a time-series database.
 *
 * @example
 * ```typescript
 * import { TsdbClient, createMetric } from 'tsdb-client';
 *
 * const client = TsdbClient.forService({
 *   baseUrl: 'http://tsdb.example.com:4242',
 *   batchSizeLimit: 10,
 * });
 *
 * await client.send([
 *   createMetric('sys.cpu.user', 1700000000, 42.5, { host: 'web01' }),
 *   createMetric('sys.cpu.user', 1700000000, 12.5, { host: 'web02' }),
 * ]);
 * ```
 */
export class TsdbClient {
  private readonly logger: Logger;
  private readonly onSendComplete: ((results: readonly BatchResult[]) => void) | null;
  private limit: number;

  /**
   * Creates a client over the given HTTP configuration.
   *
   * @throws ConfigurationError if the configuration is invalid.
   */
  static forService(config: Config): TsdbClient {
    const resolved = resolveConfig(config);
    const transport = new HttpTransport(resolved, config.fetch);
    return new TsdbClient(transport, { ...config, batchSizeLimit: resolved.batchSizeLimit });
  }

  /**
   * Creates a client over an existing transport.
   *
   * @throws ConfigurationError if batchSizeLimit is invalid.
   */
  constructor(
    private readonly transport: Transport,
    options: ClientOptions = {}
  ) {
    this.limit = validateBatchSizeLimit(options.batchSizeLimit ?? DEFAULT_BATCH_SIZE_LIMIT);
    this.logger = options.logger ?? consoleLogger();
    this.onSendComplete = options.onSendComplete ?? null;
  }

  get batchSizeLimit(): number {
    return this.limit;
  }

  /**
   * Sets the maximum number of metrics per request for later sends.
   * 0 disables splitting.
   */
  setBatchSizeLimit(limit: number): void {
    this.limit = validateBatchSizeLimit(limit);
  }

  /**
   * Releases the transport's pooled connections.
   */
  async close(): Promise<void> {
    await this.transport.close?.();
  }

  /**
   * Sends one metric or a collection of metrics.
   * Metrics equal by value are sent once. Batches are sent one after another;
   * a failed batch is logged and does not stop the following ones.
   * The returned promise never rejects.
   */
  async send(metrics: Metric | Iterable<Metric>): Promise<void> {
    const unique = uniqueMetrics(isMetric(metrics) ? [metrics] : metrics);
    if (unique.length === 0) {
      return;
    }

    const results: BatchResult[] = [];
    for (const batch of partition(unique, this.limit)) {
      if (batch.length === 0) continue;
      results.push(await this.sendBatch(batch));
    }

    if (this.onSendComplete) {
      try {
        this.onSendComplete(results);
      } catch (err) {
        this.log('error', 'onSendComplete hook failed', err);
      }
    }
  }

  private async sendBatch(batch: readonly Metric[]): Promise<BatchResult> {
    let status: number;
    try {
      ({ status } = await this.transport.post(METRICS_PATH, batch));
    } catch (err) {
      this.log('error', `Failed to send batch of ${batch.length} metrics`, err);
      return { ok: false, size: batch.length, error: err instanceof Error ? err.message : String(err) };
    }

    if (status < 200 || status > 299) {
      this.log('error', `Batch of ${batch.length} metrics rejected: ${status}`);
      return { ok: false, size: batch.length, status, error: `server returned ${status}` };
    }
    this.log('info', `Sent batch of ${batch.length} metrics`);
    return { ok: true, size: batch.length, status };
  }

  /**
   * Writes to the injected logger. Errors thrown by the logger itself go to the console.
   */
  private log(level: 'info' | 'error', message: string, err?: unknown): void {
    try {
      if (level === 'info') {
        this.logger.info(message);
      } else {
        this.logger.error(message, err);
      }
    } catch (logErr) {
      console.error(`[tsdb] logger failed while writing "${message}"`, logErr);
    }
  }
}

function isMetric(value: Metric | Iterable<Metric>): value is Metric {
  return !(Symbol.iterator in value);
}

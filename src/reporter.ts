// SPDX-License-Identifier: MIT

import type { Logger, Metric, ReporterConfig, ValuesProvider } from './types.js';
import type { TsdbClient } from './client.js';
import { createMetric } from './metric.js';
import { consoleLogger } from './logger.js';

const DEFAULT_INTERVAL_MS = 60000; // 1 minute
const MIN_INTERVAL_MS = 1000; // 1 second

/**
 * Periodically collects values from a provider and sends them.
 *
 * @example
 * ```typescript
 * const reporter = new MetricsReporter(client, {
 *   prefix: 'app',
 *   tags: { host: 'web01' },
 *   provider: () => ({ 'queue.depth': queue.length }),
 * });
 *
 * reporter.start();
 * // later
 * reporter.stop();
 * ```
 */
export class MetricsReporter {
  private readonly provider: ValuesProvider;
  private readonly intervalMs: number;
  private readonly prefix: string;
  private readonly tags: Readonly<Record<string, string>>;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private abortController: AbortController | null = null;
  private reporting = false;

  /**
   * @throws InvalidMetricError if the prefix or tags cannot form a metric.
   */
  constructor(
    private readonly client: TsdbClient,
    config: ReporterConfig
  ) {
    let intervalMs = config.intervalMs || DEFAULT_INTERVAL_MS;
    if (intervalMs < MIN_INTERVAL_MS) {
      intervalMs = MIN_INTERVAL_MS;
    }

    this.provider = config.provider;
    this.intervalMs = intervalMs;
    this.prefix = config.prefix ?? '';
    this.tags = createMetric(this.metricName('value'), 0, 0, config.tags).tags;
    this.clock = config.clock ?? Date.now;
    this.logger = config.logger ?? consoleLogger('[tsdb-reporter]');
  }

  get interval(): number {
    return this.intervalMs;
  }

  /**
   * Collects values once and sends them.
   * Provider errors are logged; nothing is sent in that case.
   *
   * @returns The metrics that were sent.
   */
  async report(): Promise<Metric[]> {
    let values: Record<string, number>;
    try {
      values = await this.provider();
    } catch (err) {
      this.logger.error('Provider failed', err);
      return [];
    }

    const timestamp = Math.floor(this.clock() / 1000);
    const metrics: Metric[] = [];
    for (const [key, value] of Object.entries(values)) {
      // Skip values the server cannot store
      if (key.length === 0 || !Number.isFinite(value)) continue;
      metrics.push(createMetric(this.metricName(key), timestamp, value, this.tags));
    }

    await this.client.send(metrics);
    return metrics;
  }

  /**
   * Reports once, then every interval until stopped.
   *
   * @returns AbortController to stop the reporter.
   */
  start(): AbortController {
    this.stop();
    const controller = new AbortController();
    this.abortController = controller;

    this.tick(controller.signal);
    this.intervalId = setInterval(() => this.tick(controller.signal), this.intervalMs);

    controller.signal.addEventListener('abort', () => {
      if (this.intervalId) {
        clearInterval(this.intervalId);
        this.intervalId = null;
      }
    });

    return controller;
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    if (this.abortController) {
      this.abortController.abort();
      this.abortController = null;
    }
  }

  private tick(signal: AbortSignal): void {
    // Skip while the previous report is still in flight
    if (signal.aborted || this.reporting) return;
    this.reporting = true;
    this.report()
      .finally(() => {
        this.reporting = false;
      })
      .catch((err) => {
        this.logger.error('Report failed', err);
      });
  }

  private metricName(key: string): string {
    return this.prefix ? `${this.prefix}.${key}` : key;
  }
}

// SPDX-License-Identifier: MIT

import type { Metric, WireMetric } from './types.js';
import { InvalidMetricError } from './errors.js';

/**
 * Creates a validated, frozen metric.
 *
 * @throws InvalidMetricError if a field is invalid.
 */
export function createMetric(
  name: string,
  timestamp: number,
  value: number,
  tags: Record<string, string> = {}
): Metric {
  if (typeof name !== 'string' || name.length === 0) {
    throw new InvalidMetricError('metric name must be a non-empty string');
  }
  if (!Number.isSafeInteger(timestamp)) {
    throw new InvalidMetricError(`timestamp of "${name}" must be an integer, got ${timestamp}`);
  }
  if (!Number.isFinite(value)) {
    throw new InvalidMetricError(`value of "${name}" must be a finite number, got ${value}`);
  }

  const entries = Object.entries(tags);
  for (const [key, tagValue] of entries) {
    if (key.length === 0) {
      throw new InvalidMetricError(`tag keys of "${name}" must be non-empty`);
    }
    if (typeof tagValue !== 'string') {
      throw new InvalidMetricError(`tag "${key}" of "${name}" must be a string`);
    }
  }
  // Own data properties only, so a "__proto__" key stays a tag
  const copy: Record<string, string> = Object.fromEntries(entries);

  return Object.freeze({
    name,
    timestamp,
    value,
    tags: Object.freeze(copy),
  });
}

/**
 * Canonical key of a metric. Two metrics are equal iff their keys are equal.
 */
export function metricKey(metric: Metric): string {
  const tags = Object.entries(metric.tags).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify([metric.name, metric.timestamp, metric.value, tags]);
}

export function metricsEqual(a: Metric, b: Metric): boolean {
  return metricKey(a) === metricKey(b);
}

/**
 * Drops metrics equal by value to an earlier one.
 */
export function uniqueMetrics(metrics: Iterable<Metric>): Metric[] {
  const seen = new Map<string, Metric>();
  for (const metric of metrics) {
    const key = metricKey(metric);
    if (!seen.has(key)) {
      seen.set(key, metric);
    }
  }
  return [...seen.values()];
}

export function toWireMetric(metric: Metric): WireMetric {
  return {
    metric: metric.name,
    timestamp: metric.timestamp,
    value: metric.value,
    tags: { ...metric.tags },
  };
}

/**
 * Formats a metric the way the telnet-style put line reads:
 * `name timestamp value key=value ...`.
 */
export function formatMetric(metric: Metric): string {
  const tags = Object.entries(metric.tags).map(([key, value]) => `${key}=${value}`);
  return [metric.name, String(metric.timestamp), String(metric.value), ...tags].join(' ');
}

// SPDX-License-Identifier: MIT

import type { Metric } from './types.js';

/**
 * Splits metrics into batches of at most `limit` entries.
 * A limit of 0 yields a single batch holding everything, even when empty.
 *
 * Membership order is not part of the contract: callers must not rely on
 * which metrics share a batch.
 *
 * @throws RangeError if limit is not a non-negative integer.
 */
export function partition(metrics: readonly Metric[], limit: number): Metric[][] {
  if (!Number.isSafeInteger(limit) || limit < 0) {
    throw new RangeError(`batch size limit must be a non-negative integer, got ${limit}`);
  }

  if (limit === 0 || metrics.length <= limit) {
    return [[...metrics]];
  }

  const batches: Metric[][] = [];
  let current: Metric[] = [];
  for (const metric of metrics) {
    current.push(metric);
    if (current.length >= limit) {
      batches.push(current);
      current = [];
    }
  }
  // Remainder only; a full final batch was already pushed
  if (current.length > 0) {
    batches.push(current);
  }
  return batches;
}

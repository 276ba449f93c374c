// SPDX-License-Identifier: MIT

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  createMetric,
  formatMetric,
  metricKey,
  metricsEqual,
  toWireMetric,
  uniqueMetrics,
} from './metric.js';
import { InvalidMetricError } from './errors.js';

describe('createMetric', () => {
  it('should build a frozen metric with a copy of the tags', () => {
    const tags = { host: 'web01' };
    const metric = createMetric('sys.cpu.user', 1700000000, 42.5, tags);
    tags.host = 'changed';

    assert.strictEqual(metric.name, 'sys.cpu.user');
    assert.strictEqual(metric.timestamp, 1700000000);
    assert.strictEqual(metric.value, 42.5);
    assert.deepStrictEqual(metric.tags, { host: 'web01' });
    assert.ok(Object.isFrozen(metric));
    assert.ok(Object.isFrozen(metric.tags));
  });

  it('should default to no tags', () => {
    assert.deepStrictEqual(createMetric('a', 1, 1).tags, {});
  });

  it('should keep a "__proto__" tag from parsed JSON as a tag', () => {
    const tags: Record<string, string> = JSON.parse('{"__proto__":"x","host":"a"}');
    const metric = createMetric('m', 1, 1, tags);

    assert.deepStrictEqual(Object.keys(metric.tags), ['__proto__', 'host']);
    assert.strictEqual(Object.getPrototypeOf(metric.tags), Object.prototype);
    assert.strictEqual(
      JSON.stringify(toWireMetric(metric)),
      '{"metric":"m","timestamp":1,"value":1,"tags":{"__proto__":"x","host":"a"}}'
    );
    assert.strictEqual(metricKey(metric), '["m",1,1,[["__proto__","x"],["host","a"]]]');
  });

  const invalid: [string, () => unknown][] = [
    ['empty name', () => createMetric('', 1, 1)],
    ['fractional timestamp', () => createMetric('a', 1.5, 1)],
    ['NaN value', () => createMetric('a', 1, Number.NaN)],
    ['infinite value', () => createMetric('a', 1, Number.POSITIVE_INFINITY)],
    ['empty tag key', () => createMetric('a', 1, 1, { '': 'x' })],
  ];

  for (const [label, build] of invalid) {
    it(`should reject ${label}`, () => {
      assert.throws(build, InvalidMetricError);
    });
  }
});

describe('metric identity', () => {
  it('should treat metrics with the same fields as equal regardless of tag order', () => {
    const a = createMetric('m', 1, 2, { host: 'a', dc: 'eu' });
    const b = createMetric('m', 1, 2, { dc: 'eu', host: 'a' });

    assert.strictEqual(metricKey(a), metricKey(b));
    assert.strictEqual(metricsEqual(a, b), true);
  });

  it('should distinguish metrics differing in any field', () => {
    const base = createMetric('m', 1, 2, { host: 'a' });

    assert.strictEqual(metricsEqual(base, createMetric('n', 1, 2, { host: 'a' })), false);
    assert.strictEqual(metricsEqual(base, createMetric('m', 2, 2, { host: 'a' })), false);
    assert.strictEqual(metricsEqual(base, createMetric('m', 1, 3, { host: 'a' })), false);
    assert.strictEqual(metricsEqual(base, createMetric('m', 1, 2, { host: 'b' })), false);
  });

  it('should drop value duplicates and keep the first occurrence', () => {
    const first = createMetric('m', 1, 2);
    const duplicate = createMetric('m', 1, 2);
    const other = createMetric('m', 2, 2);

    const unique = uniqueMetrics([first, duplicate, other]);

    assert.strictEqual(unique.length, 2);
    assert.strictEqual(unique[0], first);
    assert.strictEqual(unique[1], other);
  });
});

describe('serialization', () => {
  it('should map a metric to its wire form', () => {
    const metric = createMetric('sys.cpu.user', 1700000000, 42.5, { host: 'web01' });

    assert.deepStrictEqual(toWireMetric(metric), {
      metric: 'sys.cpu.user',
      timestamp: 1700000000,
      value: 42.5,
      tags: { host: 'web01' },
    });
  });

  it('should format a metric as a put line', () => {
    const metric = createMetric('sys.cpu.user', 1700000000, 42.5, { host: 'web01', cpu: '0' });

    assert.strictEqual(formatMetric(metric), 'sys.cpu.user 1700000000 42.5 host=web01 cpu=0');
  });
});

// SPDX-License-Identifier: MIT

/**
 * Thrown when a client cannot be built from the given configuration.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when a metric is created from invalid fields.
 */
export class InvalidMetricError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMetricError';
  }
}

// SPDX-License-Identifier: MIT

import type { Logger } from './types.js';

/**
 * Logger writing prefixed lines to the console.
 */
export function consoleLogger(prefix = '[tsdb]'): Logger {
  return {
    info(message: string): void {
      console.log(`${prefix} ${message}`);
    },
    error(message: string, err?: unknown): void {
      if (err === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}`, err);
      }
    },
  };
}

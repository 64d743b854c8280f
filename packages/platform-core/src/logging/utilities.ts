/**
 * Logging Utilities
 *
 * Helper functions for logging operations
 */

import type { Logger } from 'winston';

/**
 * Performance timer utility. The returned function logs at debug level and
 * reports the elapsed milliseconds.
 */
export function createTimer(logger: Logger, label: string): () => number {
  const start = Date.now();
  return () => {
    const duration = Date.now() - start;
    logger.debug(`Timer: ${label}`, { duration, label });
    return duration;
  };
}

/**
 * Environment Configuration Utilities
 *
 * Typed reads of environment variables with defaults. Numbers are parsed as
 * floats because timing thresholds are fractional seconds.
 */

import { getLogger } from '../logging/logger';
import { errorMessage } from '../error-handling/errors';

const logger = getLogger('environment-config');

export function getConfig(key: string, defaultValue: number): number;
export function getConfig(key: string, defaultValue: boolean): boolean;
export function getConfig(key: string, defaultValue: string): string;
export function getConfig<T>(key: string, defaultValue: T, parser: (value: string) => T): T;
export function getConfig(key: string, defaultValue: unknown, parser?: (value: string) => unknown): unknown {
  const value = process.env[key];

  if (value === undefined || value === '') {
    return defaultValue;
  }

  if (parser) {
    try {
      return parser(value);
    } catch (error) {
      logger.warn('Config parser rejected value, using default', { key, reason: errorMessage(error) });
      return defaultValue;
    }
  }

  if (typeof defaultValue === 'boolean') {
    return value.toLowerCase() === 'true';
  }

  if (typeof defaultValue === 'number') {
    const parsed = Number.parseFloat(value);
    if (Number.isNaN(parsed)) {
      logger.warn('Non-numeric config value, using default', { key, defaultValue });
      return defaultValue;
    }
    return parsed;
  }

  return value;
}

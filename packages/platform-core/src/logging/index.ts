/**
 * Logging Module - Index
 *
 * Exports all logging functionality for platform-core
 */

// Types
export * from './types';

// Core logger
export * from './logger';

// Formatting utilities
export * from './formatting';

// Correlation context
export * from './correlation';

// Utilities
export * from './utilities';

// Error serialization for logging
export * from './error-serializer';

// Re-export winston for convenience
import * as winston from 'winston';
export { winston };

/**
 * Platform Core - Shared Utilities for the lyricsync packages
 *
 * Provides consistent platform patterns across packages:
 * - Structured logging with correlation tracking
 * - Error handling patterns
 * - Configuration management utilities
 */

export * from './config/index';
export * from './error-handling/index';
export * from './logging/index';

/**
 * Configuration Module - Index
 *
 * Exports all configuration functionality for platform-core
 */

// Environment configuration utilities
export * from './environment-config';

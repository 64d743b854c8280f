/**
 * Log Formatting
 *
 * Log formatters and redaction utilities
 */

import * as winston from 'winston';
import type { LogContext } from './types';

// Secret patterns to redact (key-based matching)
const SECRET_PATTERNS = [/authorization/i, /api[-_]?key/i, /token/i, /secret/i, /password/i, /bearer/i];

// Full lyrics bodies are copyrighted material and stay out of production logs
const LYRICS_CONTENT_FIELDS = ['lyricsContent', 'rawLyrics', 'lyricsText', 'fullText'];

/**
 * Redacts sensitive information from objects
 * Includes secrets (API keys, tokens) and lyrics bodies
 */
export function maskSecrets(obj: unknown, maxDepth = 3): unknown {
  if (maxDepth <= 0 || obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(item => maskSecrets(item, maxDepth - 1));
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const isSecret = SECRET_PATTERNS.some(pattern => pattern.test(key));
    const isLyricsContent = LYRICS_CONTENT_FIELDS.includes(key);

    if (isSecret) {
      masked[key] = '[REDACTED]';
    } else if (isLyricsContent) {
      masked[key] = typeof value === 'string' ? `[LYRICS_REDACTED:${value.length}]` : '[LYRICS_REDACTED]';
    } else if (typeof value === 'object' && value !== null) {
      masked[key] = maskSecrets(value, maxDepth - 1);
    } else {
      masked[key] = value;
    }
  }

  return masked;
}

/**
 * Safe JSON stringification with size limits
 */
export function safeStringify(obj: unknown, maxSize = 10000): string {
  try {
    const str = JSON.stringify(maskSecrets(obj, 5));
    return str.length > maxSize ? str.substring(0, maxSize) + '...[TRUNCATED]' : str;
  } catch {
    return '[CIRCULAR_OR_INVALID_JSON]';
  }
}

/**
 * Development console format
 */
export function createDevFormat(correlationStorage: {
  getStore: () => LogContext | undefined;
}): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, correlationId, module: moduleCtx, ...meta }) => {
      const context = correlationStorage.getStore();
      const finalCorrelationId = correlationId || context?.correlationId;

      const correlation = finalCorrelationId ? ` [${String(finalCorrelationId).slice(0, 8)}]` : '';
      const moduleInfo = moduleCtx ? ` ${String(moduleCtx)}` : '';
      const serviceInfo = service ? `[${String(service)}]` : '';
      const metaStr = Object.keys(meta).length > 0 ? ` ${safeStringify(meta, 1000)}` : '';

      return `${String(timestamp)} ${level}${serviceInfo}${correlation}${moduleInfo}: ${String(message)}${metaStr}`;
    })
  );
}

/**
 * Production JSON format
 */
export function createProdFormat(correlationStorage: {
  getStore: () => LogContext | undefined;
}): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(info => {
      const context = correlationStorage.getStore();
      if (context) {
        info.correlationId = info.correlationId || context.correlationId;
        info.jobId = info.jobId || context.jobId;
      }

      return safeStringify(info, 50000);
    })
  );
}

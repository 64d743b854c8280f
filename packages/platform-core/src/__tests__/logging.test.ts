import { describe, it, expect } from 'vitest';
import { maskSecrets, safeStringify } from '../logging/formatting';
import { getLogger, resolveLogLevel } from '../logging/logger';
import { generateCorrelationId, getCorrelationContext, runWithContext } from '../logging/correlation';
import { createTimer } from '../logging/utilities';
import { serializeError } from '../logging/error-serializer';
import { DomainError } from '../error-handling/errors';

describe('formatting', () => {
  it('should redact secrets and lyrics bodies', () => {
    const masked = maskSecrets({
      apiKey: 'test-secret',
      nested: { token: 'test-token', lines: 3 },
      lyricsText: 'Zeile eins',
      segments: 2,
    });

    expect(masked).toEqual({
      apiKey: '[REDACTED]',
      nested: { token: '[REDACTED]', lines: 3 },
      lyricsText: '[LYRICS_REDACTED:10]',
      segments: 2,
    });
  });

  it('should survive circular structures', () => {
    const circular: Record<string, unknown> = { name: 'loop' };
    circular.self = circular;

    expect(safeStringify(circular)).toBe('[CIRCULAR_OR_INVALID_JSON]');
  });
});

describe('logger', () => {
  it('should resolve levels from LOG_LEVEL first, then NODE_ENV', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'error', NODE_ENV: 'production' })).toBe('error');
    expect(resolveLogLevel({ NODE_ENV: 'test' })).toBe('warn');
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe('info');
    expect(resolveLogLevel({})).toBe('debug');
  });

  it('should cache loggers per name', () => {
    expect(getLogger('cache-check')).toBe(getLogger('cache-check'));
    expect(getLogger('cache-check')).not.toBe(getLogger('other-module'));
  });

  it('should return elapsed milliseconds from timers', () => {
    const stop = createTimer(getLogger('timer-check'), 'noop');
    expect(stop()).toBeGreaterThanOrEqual(0);
  });
});

describe('correlation', () => {
  it('should expose the context only inside runWithContext', () => {
    const id = generateCorrelationId();
    const seen = runWithContext({ correlationId: id }, () => getCorrelationContext()?.correlationId);

    expect(seen).toBe(id);
    expect(getCorrelationContext()).toBeUndefined();
  });
});

describe('serializeError', () => {
  it('should keep code, details and cause chain', () => {
    const error = new DomainError('outer', 400, new Error('inner'), 'BAD_INPUT', { field: 'text' });
    const serialized = serializeError(error);

    expect(serialized.message).toBe('outer');
    expect(serialized.code).toBe('BAD_INPUT');
    expect(serialized.details).toEqual({ field: 'text' });
    expect(serialized.cause?.message).toBe('inner');
  });

  it('should handle strings and plain objects', () => {
    expect(serializeError('oops')).toEqual({ message: 'oops' });
    expect(serializeError({ message: 'plain', code: 'E1' })).toEqual({
      message: 'plain',
      name: undefined,
      code: 'E1',
    });
  });
});

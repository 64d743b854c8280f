import { describe, it, expect, afterEach, vi } from 'vitest';
import { getConfig } from '../config/environment-config';
import { getLogger } from '../logging/logger';

describe('getConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should return the default when the variable is unset', () => {
    expect(getConfig('LYRICSYNC_TEST_UNSET', 22)).toBe(22);
    expect(getConfig('LYRICSYNC_TEST_UNSET', '♪')).toBe('♪');
  });

  it('should parse fractional numbers', () => {
    vi.stubEnv('LYRICSYNC_TEST_NUMBER', '0.35');
    expect(getConfig('LYRICSYNC_TEST_NUMBER', 0.3)).toBe(0.35);
  });

  it('should fall back when a number does not parse', () => {
    vi.stubEnv('LYRICSYNC_TEST_NUMBER', 'fast');
    expect(getConfig('LYRICSYNC_TEST_NUMBER', 22)).toBe(22);
  });

  it('should parse booleans case-insensitively', () => {
    vi.stubEnv('LYRICSYNC_TEST_FLAG', 'TRUE');
    expect(getConfig('LYRICSYNC_TEST_FLAG', false)).toBe(true);
  });

  it('should use a custom parser and fall back when it throws', () => {
    vi.stubEnv('LYRICSYNC_TEST_LIST', 'a,b');
    expect(getConfig('LYRICSYNC_TEST_LIST', ['x'], value => value.split(','))).toEqual(['a', 'b']);

    const rejecting = (): string[] => {
      throw new Error('nope');
    };
    expect(getConfig('LYRICSYNC_TEST_LIST', ['x'], rejecting)).toEqual(['x']);
  });

  it('should log why a custom parser was rejected', () => {
    const warn = vi.spyOn(getLogger('environment-config'), 'warn').mockReturnThis();
    vi.stubEnv('LYRICSYNC_TEST_LIST', 'a,b');

    getConfig('LYRICSYNC_TEST_LIST', ['x'], () => {
      throw new Error('nope');
    });

    expect(warn).toHaveBeenCalledWith('Config parser rejected value, using default', {
      key: 'LYRICSYNC_TEST_LIST',
      reason: 'nope',
    });
    warn.mockRestore();
  });
});

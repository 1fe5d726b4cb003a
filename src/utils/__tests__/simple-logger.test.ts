import { describe, it, expect, vi, afterEach } from 'vitest';
import { getLogger, resolveLogLevel } from '../simple-logger';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('resolveLogLevel', () => {
  it('maps level names case-insensitively', () => {
    expect(resolveLogLevel('silent')).toBe(0);
    expect(resolveLogLevel('ERROR')).toBe(1);
    expect(resolveLogLevel('debug')).toBe(4);
  });

  it('falls back to info', () => {
    expect(resolveLogLevel(undefined)).toBe(3);
    expect(resolveLogLevel('verbose')).toBe(3);
  });
});

describe('SimpleLogger', () => {
  it('stays quiet below the configured level', () => {
    // the test environment runs with LOG_LEVEL=silent
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    getLogger('worker', 'LoadWorker#0').warn('GET request error: boom');
    expect(warn).not.toHaveBeenCalled();
  });
});

import { describe, it, expect } from 'vitest';
import { GuestbookConfigError, loadGuestbookConfig } from '../config';

describe('loadGuestbookConfig', () => {
  it('uses local defaults', () => {
    expect(loadGuestbookConfig({})).toEqual({
      redisUrl: 'redis://localhost:6379',
      port: 8080,
      commentsKey: 'comments',
      recentLimit: 10
    });
  });

  it('reads overrides from the environment', () => {
    expect(
      loadGuestbookConfig({
        REDIS_URL: 'redis://cache:6380',
        PORT: '9090',
        COMMENTS_KEY: 'guestbook:comments',
        RECENT_COMMENTS_LIMIT: '25'
      })
    ).toEqual({
      redisUrl: 'redis://cache:6380',
      port: 9090,
      commentsKey: 'guestbook:comments',
      recentLimit: 25
    });
  });

  it('rejects a port that is not a number or out of range', () => {
    expect(() => loadGuestbookConfig({ PORT: 'http' })).toThrow('PORT: expected an integer, got "http"');
    expect(() => loadGuestbookConfig({ PORT: '0' })).toThrow('PORT: must be between 1 and 65535, got 0');
    expect(() => loadGuestbookConfig({ PORT: '70000' })).toThrow(GuestbookConfigError);
  });

  it('rejects a recent-comments limit below one', () => {
    expect(() => loadGuestbookConfig({ RECENT_COMMENTS_LIMIT: '0' })).toThrow(
      'RECENT_COMMENTS_LIMIT: must be between 1 and 9007199254740991, got 0'
    );
    expect(() => loadGuestbookConfig({ RECENT_COMMENTS_LIMIT: '-5' })).toThrow(GuestbookConfigError);
  });
});

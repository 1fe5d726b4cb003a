export interface GuestbookConfig {
  redisUrl: string;
  port: number;
  commentsKey: string;
  recentLimit: number;
}

export class GuestbookConfigError extends Error {
  constructor(public readonly field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = 'GuestbookConfigError';
  }
}

const readInteger = (field: string, raw: string, min: number, max: number): number => {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new GuestbookConfigError(field, `expected an integer, got "${raw}"`);
  }
  const value = parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    throw new GuestbookConfigError(field, `must be between ${min} and ${max}, got ${trimmed}`);
  }
  return value;
};

export const loadGuestbookConfig = (env: NodeJS.ProcessEnv = process.env): GuestbookConfig => ({
  redisUrl: env.REDIS_URL || 'redis://localhost:6379',
  port: readInteger('PORT', env.PORT || '8080', 1, 65535),
  commentsKey: env.COMMENTS_KEY || 'comments',
  // LRANGE 0 -1 would return the whole list, so 0 is not allowed
  recentLimit: readInteger('RECENT_COMMENTS_LIMIT', env.RECENT_COMMENTS_LIMIT || '10', 1, Number.MAX_SAFE_INTEGER)
});

import type { Redis } from 'ioredis';

/** Newest-first list of serialized comments. */
export interface CommentStore {
  push(serialized: string): Promise<void>;
  recent(limit: number): Promise<string[]>;
  ping(): Promise<boolean>;
}

export class RedisCommentStore implements CommentStore {
  constructor(private redis: Redis, private key: string = 'comments') {}

  async push(serialized: string): Promise<void> {
    await this.redis.lpush(this.key, serialized);
  }

  recent(limit: number): Promise<string[]> {
    return this.redis.lrange(this.key, 0, limit - 1);
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch {
      return false;
    }
  }
}

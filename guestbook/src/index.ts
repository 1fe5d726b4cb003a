import dotenv from 'dotenv';
import { Redis } from 'ioredis';
import { serve, type ServerType } from '@hono/node-server';
import { getLogger } from '../../src/utils/simple-logger';
import { createApiServer } from './api/index';
import { loadGuestbookConfig, type GuestbookConfig } from './config';
import { RedisCommentStore } from './store';

dotenv.config();

const logger = getLogger('guestbook', 'GuestbookService');

class GuestbookService {
  private config: GuestbookConfig;
  private redis: Redis;
  private store: RedisCommentStore;
  private server: ServerType | null = null;

  constructor(config: GuestbookConfig) {
    this.config = config;
    this.redis = new Redis(config.redisUrl, {
      lazyConnect: true,
      maxRetriesPerRequest: 3
    });
    this.redis.on('error', (error) => {
      logger.error('Redis client error', error);
    });
    this.store = new RedisCommentStore(this.redis, config.commentsKey);
  }

  async start() {
    logger.info('Starting Guestbook Service...');

    await this.testConnections();

    const app = createApiServer(this.store, { recentLimit: this.config.recentLimit });
    this.server = serve({
      fetch: app.fetch,
      port: this.config.port
    });

    this.setupGracefulShutdown();

    logger.info(`Guestbook Service listening on port ${this.config.port}`);
  }

  private async testConnections() {
    await this.redis.connect();
    if (!(await this.store.ping())) {
      throw new Error('Redis ping failed');
    }
    logger.info('✓ Redis connection successful');
  }

  private setupGracefulShutdown() {
    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, shutting down gracefully...`);
      await new Promise<void>((resolve, reject) => {
        if (!this.server) return resolve();
        this.server.close(err => (err ? reject(err) : resolve()));
      });
      await this.redis.quit();
      logger.info('Guestbook Service stopped');
    };

    const onSignal = (signal: string) => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Error during shutdown', error);
          process.exit(1);
        }
      );
    };

    process.once('SIGINT', () => onSignal('SIGINT'));
    process.once('SIGTERM', () => onSignal('SIGTERM'));
  }
}

if (require.main === module) {
  Promise.resolve()
    .then(() => new GuestbookService(loadGuestbookConfig()).start())
    .catch((error: unknown) => {
      logger.error('Failed to start Guestbook Service', error);
      process.exit(1);
    });
}

import { Hono } from 'hono';
import { createComment, isCommentPayload, isNewCommentBody, toCommentPayload, type CommentPayload } from '../../../src/types/comment';
import { getLogger } from '../../../src/utils/simple-logger';
import type { CommentStore } from '../store';

export interface ApiOptions {
  recentLimit?: number;
  now?: () => Date;
}

const logger = getLogger('guestbook', 'api');

const decodeComments = (entries: string[]): CommentPayload[] =>
  entries.map(entry => {
    const parsed: unknown = JSON.parse(entry);
    if (!isCommentPayload(parsed)) {
      throw new Error('stored entry is not a comment');
    }
    return parsed;
  });

export function createApiServer(store: CommentStore, options: ApiOptions = {}) {
  const app = new Hono();
  const recentLimit = options.recentLimit ?? 10;
  const now = options.now || (() => new Date());

  // Health check
  app.get('/health', async (c) => {
    const healthy = await store.ping();
    return c.json({
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: now().toISOString()
    }, healthy ? 200 : 503);
  });

  // Add a comment; the server assigns its timestamp
  app.post('/comment', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (error) {
      return c.json({ error: `invalid JSON body: ${error instanceof Error ? error.message : String(error)}` }, 400);
    }

    if (!isNewCommentBody(body)) {
      return c.json({ error: 'username and message must be strings' }, 400);
    }

    const comment = createComment(body.username, body.message, now());
    try {
      await store.push(JSON.stringify(toCommentPayload(comment)));
    } catch (error) {
      logger.error('failed to store comment', error);
      return c.json({ error: 'failed to store comment' }, 500);
    }

    return c.body(null, 201);
  });

  // Most recent comments, newest first
  app.get('/comments', async (c) => {
    let comments: CommentPayload[];
    try {
      comments = decodeComments(await store.recent(recentLimit));
    } catch (error) {
      logger.error('failed to load comments', error);
      return c.json({ error: 'failed to load comments' }, 500);
    }
    return c.json(comments);
  });

  return app;
}

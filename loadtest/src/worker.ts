import { createComment, toCommentPayload } from '../../src/types/comment';
import { getLogger, type SimpleLogger } from '../../src/utils/simple-logger';
import { endpoints } from './config';
import { errorMessage } from './errors';
import { randomString, type RandomSource } from './random';
import type { BackoffRequester } from './requester';
import { emptyStats, type HttpMethod, type RequestOutcome, type Stats } from './types';

export const COMMENT_USERNAME = 'test';
export const COMMENT_LENGTH = 30;
const QUERY_TOKEN_LENGTH = 10;

export interface WorkerOptions {
  id: number;
  baseUrl: string;
  iterations: number;
  random?: RandomSource;
  now?: () => Date;
}

/** Appends a throwaway query parameter so consecutive requests never share a URL. */
export const buildUrl = (baseUrl: string, path: string, key: string, value: string): string => {
  const url = new URL(`${baseUrl}${path}`);
  url.searchParams.append(key, value);
  return url.toString();
};

export const chooseMethod = (random: RandomSource): HttpMethod => (random() < 0.5 ? 'GET' : 'POST');

/**
 * Runs its iterations one after another and hands back a single Stats
 * record. A failed request only bumps the error counter.
 */
export class LoadWorker {
  private options: WorkerOptions;
  private requester: BackoffRequester;
  private random: RandomSource;
  private now: () => Date;
  private logger: SimpleLogger;

  constructor(options: WorkerOptions, requester: BackoffRequester) {
    this.options = options;
    this.requester = requester;
    this.random = options.random || Math.random;
    this.now = options.now || (() => new Date());
    this.logger = getLogger('worker', `LoadWorker#${options.id}`);
  }

  async run(): Promise<Stats> {
    const stats = emptyStats();

    for (let i = 0; i < this.options.iterations; i++) {
      const queryKey = randomString(QUERY_TOKEN_LENGTH, this.random);
      const queryValue = randomString(QUERY_TOKEN_LENGTH, this.random);
      const method = chooseMethod(this.random);

      try {
        const outcome = method === 'GET'
          ? await this.listComments(queryKey, queryValue)
          : await this.addComment(queryKey, queryValue);
        record(stats, method, outcome);
      } catch (error) {
        stats.errors++;
        this.logger.warn(`${method} request error: ${errorMessage(error)}`);
      }
    }

    this.logger.debug('finished', {
      iterations: this.options.iterations,
      errors: stats.errors
    });
    return stats;
  }

  private listComments(queryKey: string, queryValue: string): Promise<RequestOutcome> {
    const url = buildUrl(this.options.baseUrl, endpoints.listComments.path, queryKey, queryValue);
    return this.requester.get(url);
  }

  private addComment(queryKey: string, queryValue: string): Promise<RequestOutcome> {
    const url = buildUrl(this.options.baseUrl, endpoints.addComment.path, queryKey, queryValue);
    const comment = createComment(COMMENT_USERNAME, randomString(COMMENT_LENGTH, this.random), this.now());
    return this.requester.post(url, toCommentPayload(comment));
  }
}

const record = (stats: Stats, method: HttpMethod, outcome: RequestOutcome): void => {
  if (method === 'GET') {
    stats.successfulGet++;
  } else {
    stats.successfulPost++;
  }
  stats.totalBytesSent += outcome.bytesSent;
  stats.totalBytesReceived += outcome.bytesReceived;
  stats.latencies.push(outcome.latencyMs);
};

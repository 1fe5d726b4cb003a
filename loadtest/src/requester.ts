import { type BackoffPolicy, DEFAULT_BACKOFF } from './config';
import {
  BackoffExhaustedError,
  errorMessage,
  NetworkFailureError,
  SerializationFailedError
} from './errors';
import type { HttpTransport, OutgoingRequest, TransportResponse } from './transport';
import type { RequestOutcome } from './types';
import { getLogger } from '../../src/utils/simple-logger';

export type Sleep = (ms: number) => Promise<void>;
/** Monotonic clock in nanoseconds. */
export type Clock = () => bigint;

export const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));
export const defaultClock: Clock = () => process.hrtime.bigint();

/** Delay to wait after the given failed attempt (1-based). */
export const backoffDelay = (attempt: number, policy: BackoffPolicy = DEFAULT_BACKOFF): number =>
  Math.min(policy.initialDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);

export const serializeJson = (payload: unknown): Buffer => {
  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(payload);
  } catch (error) {
    throw new SerializationFailedError(error);
  }
  if (encoded === undefined) {
    throw new SerializationFailedError(new Error('value has no JSON representation'));
  }
  return Buffer.from(encoded, 'utf8');
};

const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;

export interface BackoffRequesterOptions {
  policy?: BackoffPolicy;
  sleep?: Sleep;
  clock?: Clock;
}

/**
 * Issues one logical request, retrying failed attempts with exponential
 * backoff. Only the final attempt's latency is reported.
 */
export class BackoffRequester {
  private transport: HttpTransport;
  private policy: BackoffPolicy;
  private sleep: Sleep;
  private clock: Clock;
  private logger = getLogger('requester', 'BackoffRequester');

  constructor(transport: HttpTransport, options: BackoffRequesterOptions = {}) {
    this.transport = transport;
    this.policy = options.policy || DEFAULT_BACKOFF;
    this.sleep = options.sleep || defaultSleep;
    this.clock = options.clock || defaultClock;
  }

  get(url: string): Promise<RequestOutcome> {
    return this.execute({ method: 'GET', url });
  }

  /** Serialization happens once, up front, and is never retried. */
  async post(url: string, payload: unknown): Promise<RequestOutcome> {
    const body = serializeJson(payload);
    return this.execute({
      method: 'POST',
      url,
      body,
      headers: { 'Content-Type': 'application/json' }
    });
  }

  private async execute(request: OutgoingRequest): Promise<RequestOutcome> {
    const bytesSent = request.body ? request.body.length : 0;
    let lastError = new NetworkFailureError('no attempt made');

    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt++) {
      try {
        const { status, latencyMs, bytesReceived } = await this.attempt(request);
        return { status, latencyMs, bytesSent, bytesReceived, attempts: attempt };
      } catch (error) {
        lastError = error instanceof NetworkFailureError ? error : new NetworkFailureError(errorMessage(error));
      }

      if (attempt < this.policy.maxAttempts) {
        const delay = backoffDelay(attempt, this.policy);
        this.logger.debug(`${request.method} ${request.url} failed, retrying`, {
          attempt,
          delay,
          error: lastError.message
        });
        await this.sleep(delay);
      }
    }

    throw new BackoffExhaustedError(this.policy.maxAttempts, lastError);
  }

  private async attempt(request: OutgoingRequest): Promise<{ status: number; latencyMs: number; bytesReceived: number }> {
    const start = this.clock();
    let response: TransportResponse;
    try {
      response = await this.transport.send(request);
    } catch (error) {
      throw new NetworkFailureError(errorMessage(error));
    }
    const latencyMs = Number(this.clock() - start) / 1_000_000;

    try {
      const bytesReceived = await response.drain();
      if (!isSuccessStatus(response.status)) {
        throw new NetworkFailureError(`unexpected status ${response.status}`, response.status);
      }
      return { status: response.status, latencyMs, bytesReceived };
    } finally {
      response.release();
    }
  }
}

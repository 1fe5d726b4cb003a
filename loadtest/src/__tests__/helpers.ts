import type { HttpTransport, OutgoingRequest, TransportResponse } from '../transport';
import type { Clock, Sleep } from '../requester';

export type ScriptStep = { status: number; body?: string } | { error: string };

/**
 * Replays scripted responses in order, then falls back to `respond`
 * for every further request.
 */
export class ScriptedTransport implements HttpTransport {
  calls: OutgoingRequest[] = [];
  drained = 0;
  released = 0;
  private steps: ScriptStep[];
  private respond?: (request: OutgoingRequest) => ScriptStep;

  constructor(steps: ScriptStep[] = [], respond?: (request: OutgoingRequest) => ScriptStep) {
    this.steps = [...steps];
    this.respond = respond;
  }

  async send(request: OutgoingRequest): Promise<TransportResponse> {
    this.calls.push(request);
    const step = this.steps.shift() ?? this.respond?.(request);
    if (!step) {
      throw new Error('no scripted response left');
    }
    if ('error' in step) {
      throw new Error(step.error);
    }
    const body = step.body ?? '';
    return {
      status: step.status,
      drain: async () => {
        this.drained++;
        return Buffer.byteLength(body);
      },
      release: () => {
        this.released++;
      }
    };
  }
}

export const recordingSleep = () => {
  const delays: number[] = [];
  const sleep: Sleep = async ms => {
    delays.push(ms);
  };
  return { delays, sleep };
};

/** Each call advances the clock by `stepMs` and returns the new reading. */
export const tickingClock = (stepMs = 1): Clock => {
  let now = 0n;
  const step = BigInt(stepMs) * 1_000_000n;
  return () => {
    now += step;
    return now;
  };
};

/** Returns the given readings (in ms) in order. */
export const scriptedClock = (readingsMs: number[]): Clock => {
  const readings = [...readingsMs];
  return () => {
    const next = readings.shift();
    if (next === undefined) {
      throw new Error('clock read more often than scripted');
    }
    return BigInt(next) * 1_000_000n;
  };
};

/**
 * Holds every response until `width` requests are in flight, then answers
 * them all at once. A caller that never reaches `width` concurrent
 * requests is left waiting.
 */
export class GatedTransport implements HttpTransport {
  events: Array<'sent' | 'answered'> = [];
  inFlight = 0;
  maxInFlight = 0;
  private width: number;
  private waiting: Array<() => void> = [];

  constructor(width: number) {
    this.width = width;
  }

  async send(request: OutgoingRequest): Promise<TransportResponse> {
    this.events.push('sent');
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    const opened = new Promise<void>(resolve => this.waiting.push(resolve));
    if (this.waiting.length === this.width) {
      const batch = this.waiting;
      this.waiting = [];
      batch.forEach(open => open());
    }
    await opened;

    this.inFlight--;
    this.events.push('answered');
    return {
      status: request.method === 'GET' ? 200 : 201,
      drain: async () => 0,
      release: () => undefined
    };
  }
}

/**
 * Many-producer, single-consumer join barrier: `wait()` resolves once
 * exactly `expected` values have been published.
 */
export class JoinBarrier<T> {
  private received: T[] = [];
  private resolveWait?: (values: T[]) => void;
  private readonly done: Promise<T[]>;

  constructor(private readonly expected: number) {
    if (!Number.isInteger(expected) || expected < 0) {
      throw new RangeError(`expected producer count must be a non-negative integer, got ${expected}`);
    }
    this.done = new Promise(resolve => {
      this.resolveWait = resolve;
    });
    this.settleIfComplete();
  }

  get pending(): number {
    return this.expected - this.received.length;
  }

  publish(value: T): void {
    if (this.received.length >= this.expected) {
      throw new Error(`join barrier already received all ${this.expected} values`);
    }
    this.received.push(value);
    this.settleIfComplete();
  }

  wait(): Promise<T[]> {
    return this.done;
  }

  private settleIfComplete(): void {
    if (this.received.length === this.expected && this.resolveWait) {
      this.resolveWait([...this.received]);
      this.resolveWait = undefined;
    }
  }
}

import { getLogger } from '../../src/utils/simple-logger';
import { buildPercentileTable, mergeStats } from './aggregator';
import { JoinBarrier } from './channel';
import type { TestConfig } from './config';
import type { RandomSource } from './random';
import { ResultReporter } from './reporter';
import { BackoffRequester, type Clock, defaultClock, type Sleep } from './requester';
import { AxiosTransport, type HttpTransport } from './transport';
import { emptyStats, type RunSummary, type Stats } from './types';
import { LoadWorker } from './worker';

export interface RunnerDependencies {
  transport?: HttpTransport;
  sleep?: Sleep;
  clock?: Clock;
  random?: RandomSource;
  now?: () => Date;
}

/**
 * Splits `total` into `workers` shares that sum to `total`; the first
 * `total % workers` shares carry one extra iteration.
 */
export const partitionRequests = (total: number, workers: number): number[] => {
  const base = Math.floor(total / workers);
  const remainder = total % workers;
  return Array.from({ length: workers }, (_, i) => base + (i < remainder ? 1 : 0));
};

export class LoadTestRunner {
  private config: TestConfig;
  private deps: RunnerDependencies;
  private logger = getLogger('runner', 'LoadTestRunner');

  constructor(config: TestConfig, deps: RunnerDependencies = {}) {
    this.config = config;
    this.deps = deps;
  }

  async run(): Promise<RunSummary> {
    const clock = this.deps.clock || defaultClock;
    const transport = this.deps.transport || new AxiosTransport(this.config.timeout);
    const requester = new BackoffRequester(transport, {
      policy: this.config.backoff,
      sleep: this.deps.sleep,
      clock
    });

    const shares = partitionRequests(this.config.totalRequests, this.config.workers);
    const barrier = new JoinBarrier<Stats>(shares.length);

    this.logger.info('starting workers', {
      workers: shares.length,
      totalRequests: this.config.totalRequests
    });

    const startTime = clock();

    const handoffs = shares.map((iterations, id) => {
      const worker = new LoadWorker(
        {
          id,
          baseUrl: this.config.baseUrl,
          iterations,
          random: this.deps.random,
          now: this.deps.now
        },
        requester
      );

      return worker.run().then(
        stats => barrier.publish(stats),
        error => {
          // Workers contain per-request failures; anything reaching here is a bug
          this.logger.error(`worker ${id} crashed`, error);
          barrier.publish({ ...emptyStats(), errors: iterations });
        }
      );
    });

    await Promise.all(handoffs);
    const reports = await barrier.wait();
    const elapsedMs = Number(clock() - startTime) / 1_000_000;

    const merged = mergeStats(reports);
    const percentiles = buildPercentileTable(merged.latencies, this.config.percentiles);
    if (!percentiles.available) {
      this.logger.warn(`no percentile data: ${percentiles.reason}`);
    }

    this.logger.debug('run complete', { elapsedMs, errors: merged.errors });

    return ResultReporter.buildSummary({
      stats: merged,
      percentiles,
      elapsedMs,
      totalRequests: this.config.totalRequests,
      workerCount: shares.length
    });
  }
}

export type HttpMethod = 'GET' | 'POST';

/** Per-worker accumulator; merged into a single record once every worker reports. */
export interface Stats {
  successfulGet: number;
  successfulPost: number;
  totalBytesSent: number;
  totalBytesReceived: number;
  errors: number;
  /** Milliseconds, in the order the requests completed. */
  latencies: number[];
}

export interface RequestOutcome {
  status: number;
  latencyMs: number;
  bytesSent: number;
  bytesReceived: number;
  attempts: number;
}

export interface PercentileEntry {
  percentile: number;
  latencyMs: number;
}

export type PercentileTable =
  | { available: true; sampleCount: number; entries: PercentileEntry[] }
  | { available: false; reason: string };

export interface RunSummary {
  readonly elapsedMs: number;
  readonly totalRequests: number;
  readonly workerCount: number;
  readonly totalBytesSent: number;
  readonly totalBytesReceived: number;
  readonly successfulGet: number;
  readonly successfulPost: number;
  readonly errors: number;
  readonly percentiles: PercentileTable;
  readonly requestsPerSecond: number;
}

export const emptyStats = (): Stats => ({
  successfulGet: 0,
  successfulPost: 0,
  totalBytesSent: 0,
  totalBytesReceived: 0,
  errors: 0,
  latencies: []
});

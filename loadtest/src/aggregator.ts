import { EmptyLatencyDataError } from './errors';
import { emptyStats, type PercentileTable, type Stats } from './types';

export const NO_LATENCY_DATA = 'no successful requests';

export const mergeStats = (records: readonly Stats[]): Stats =>
  records.reduce<Stats>((merged, s) => {
    merged.successfulGet += s.successfulGet;
    merged.successfulPost += s.successfulPost;
    merged.totalBytesSent += s.totalBytesSent;
    merged.totalBytesReceived += s.totalBytesReceived;
    merged.errors += s.errors;
    for (const latency of s.latencies) {
      merged.latencies.push(latency);
    }
    return merged;
  }, emptyStats());

export const sortLatencies = (latencies: readonly number[]): number[] => [...latencies].sort((a, b) => a - b);

/**
 * Nearest-rank percentile over an ascending sequence: the element at
 * floor(n * p / 100), clamped to the last index so p = 100 stays in bounds.
 */
export const percentileAt = (sorted: readonly number[], percentile: number): number => {
  if (sorted.length === 0) {
    throw new EmptyLatencyDataError(percentile);
  }
  const index = Math.min(Math.floor((sorted.length * percentile) / 100), sorted.length - 1);
  return sorted[index];
};

export const buildPercentileTable = (latencies: readonly number[], percentiles: readonly number[]): PercentileTable => {
  if (latencies.length === 0) {
    return { available: false, reason: NO_LATENCY_DATA };
  }

  const sorted = sortLatencies(latencies);
  return {
    available: true,
    sampleCount: sorted.length,
    entries: percentiles.map(percentile => ({
      percentile,
      latencyMs: percentileAt(sorted, percentile)
    }))
  };
};

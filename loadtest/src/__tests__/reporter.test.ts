import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildPercentileTable } from '../aggregator';
import { ResultReporter } from '../reporter';
import type { RunSummary } from '../types';

afterEach(() => {
  vi.restoreAllMocks();
});

const sampleSummary = (): RunSummary =>
  ResultReporter.buildSummary({
    stats: {
      successfulGet: 3,
      successfulPost: 2,
      totalBytesSent: 250,
      totalBytesReceived: 1024,
      errors: 1,
      latencies: [50, 10, 40, 20, 30]
    },
    percentiles: buildPercentileTable([50, 10, 40, 20, 30], [50, 90]),
    elapsedMs: 2000,
    totalRequests: 6,
    workerCount: 2
  });

describe('ResultReporter.buildSummary', () => {
  it('derives requests per second from the configured total and wall time', () => {
    const summary = sampleSummary();

    expect(summary.requestsPerSecond).toBe(3);
    expect(summary.successfulGet).toBe(3);
    expect(Object.isFrozen(summary)).toBe(true);
  });

  it('reports zero throughput for a zero-length run', () => {
    const summary = ResultReporter.buildSummary({
      stats: { successfulGet: 0, successfulPost: 0, totalBytesSent: 0, totalBytesReceived: 0, errors: 0, latencies: [] },
      percentiles: buildPercentileTable([], [50]),
      elapsedMs: 0,
      totalRequests: 0,
      workerCount: 1
    });

    expect(summary.requestsPerSecond).toBe(0);
  });
});

describe('ResultReporter formatting', () => {
  it('formats durations by magnitude', () => {
    expect(ResultReporter.formatTime(0.5)).toBe('500.0μs');
    expect(ResultReporter.formatTime(12.345)).toBe('12.3ms');
    expect(ResultReporter.formatTime(1500)).toBe('1.50s');
  });

  it('labels percentiles with English ordinals', () => {
    expect([1, 2, 3, 11, 12, 13, 21, 50, 99.9, 100].map(p => ResultReporter.ordinal(p))).toEqual([
      '1st', '2nd', '3rd', '11th', '12th', '13th', '21st', '50th', '99.9th', '100th'
    ]);
  });

  it('renders the fixed-format summary', () => {
    expect(ResultReporter.formatSummary(sampleSummary())).toEqual([
      'Elapsed Time: 2.00s',
      'Total Bytes Sent: 250',
      'Total Bytes Received: 1024',
      'Successful GET Requests: 3',
      'Successful POST Requests: 2',
      'Total Errors: 1',
      '50th Percentile Latency: 30.0ms',
      '90th Percentile Latency: 50.0ms',
      'Requests per Second: 3.00'
    ]);
  });

  it('says so when there is no percentile data', () => {
    expect(ResultReporter.formatPercentiles({ available: false, reason: 'no successful requests' })).toEqual([
      'Percentile Latency: no data (no successful requests)'
    ]);
  });

  it('warns on the console instead of drawing an empty table', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const summary = ResultReporter.buildSummary({
      stats: { successfulGet: 0, successfulPost: 0, totalBytesSent: 0, totalBytesReceived: 0, errors: 4, latencies: [] },
      percentiles: buildPercentileTable([], [50]),
      elapsedMs: 100,
      totalRequests: 4,
      workerCount: 1
    });

    ResultReporter.printRunSummary(summary);

    expect(log).toHaveBeenCalledWith(expect.stringContaining('latency percentiles unavailable'));
    expect(log).toHaveBeenCalledWith(expect.stringContaining('4 requests failed after retries (100.0%)'));
  });
});

describe('ResultReporter.exportResults', () => {
  it('writes the summary as JSON', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const dir = mkdtempSync(join(tmpdir(), 'loadtest-'));
    const file = join(dir, 'summary.json');

    try {
      expect(ResultReporter.exportResults(sampleSummary(), file)).toBe(file);
      const written = JSON.parse(readFileSync(file, 'utf8'));
      expect(written).toMatchObject({
        successfulGet: 3,
        errors: 1,
        requestsPerSecond: 3,
        percentiles: { available: true, sampleCount: 5 }
      });
      expect(typeof written.generatedAt).toBe('string');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('returns undefined when the file cannot be written', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const missingDir = join(tmpdir(), 'loadtest-missing-dir-for-export', 'nested', 'summary.json');

    expect(ResultReporter.exportResults(sampleSummary(), missingDir)).toBeUndefined();
  });
});

import chalk from 'chalk';
import Table from 'cli-table3';
import { writeFileSync } from 'fs';
import type { PercentileTable, RunSummary, Stats } from './types';

export interface SummaryInput {
  stats: Stats;
  percentiles: PercentileTable;
  elapsedMs: number;
  totalRequests: number;
  workerCount: number;
}

export class ResultReporter {
  static buildSummary(input: SummaryInput): RunSummary {
    const elapsedSeconds = input.elapsedMs / 1000;
    return Object.freeze({
      elapsedMs: input.elapsedMs,
      totalRequests: input.totalRequests,
      workerCount: input.workerCount,
      totalBytesSent: input.stats.totalBytesSent,
      totalBytesReceived: input.stats.totalBytesReceived,
      successfulGet: input.stats.successfulGet,
      successfulPost: input.stats.successfulPost,
      errors: input.stats.errors,
      percentiles: input.percentiles,
      requestsPerSecond: elapsedSeconds > 0 ? input.totalRequests / elapsedSeconds : 0
    });
  }

  static formatTime(ms: number): string {
    if (ms < 1) {
      return `${(ms * 1000).toFixed(1)}μs`;
    } else if (ms < 1000) {
      return `${ms.toFixed(1)}ms`;
    } else {
      return `${(ms / 1000).toFixed(2)}s`;
    }
  }

  static ordinal(percentile: number): string {
    if (!Number.isInteger(percentile)) {
      return `${percentile}th`;
    }
    const lastTwo = percentile % 100;
    if (lastTwo >= 11 && lastTwo <= 13) {
      return `${percentile}th`;
    }
    switch (percentile % 10) {
      case 1:
        return `${percentile}st`;
      case 2:
        return `${percentile}nd`;
      case 3:
        return `${percentile}rd`;
      default:
        return `${percentile}th`;
    }
  }

  static formatPercentiles(table: PercentileTable): string[] {
    if (!table.available) {
      return [`Percentile Latency: no data (${table.reason})`];
    }
    return table.entries.map(
      entry => `${this.ordinal(entry.percentile)} Percentile Latency: ${this.formatTime(entry.latencyMs)}`
    );
  }

  /** The fixed-format summary, one line per metric, without colour. */
  static formatSummary(summary: RunSummary): string[] {
    return [
      `Elapsed Time: ${this.formatTime(summary.elapsedMs)}`,
      `Total Bytes Sent: ${summary.totalBytesSent}`,
      `Total Bytes Received: ${summary.totalBytesReceived}`,
      `Successful GET Requests: ${summary.successfulGet}`,
      `Successful POST Requests: ${summary.successfulPost}`,
      `Total Errors: ${summary.errors}`,
      ...this.formatPercentiles(summary.percentiles),
      `Requests per Second: ${summary.requestsPerSecond.toFixed(2)}`
    ];
  }

  static printRunSummary(summary: RunSummary): void {
    console.log(`\n${chalk.bold.white('🎯 LOAD TEST SUMMARY')}`);
    console.log(chalk.bold.white('═'.repeat(50)));

    for (const line of this.formatSummary(summary)) {
      const [label, value] = line.split(/: (.*)/s);
      console.log(`${chalk.white(label)}: ${chalk.cyan(value)}`);
    }

    if (summary.errors > 0) {
      const errorRate = (summary.errors / Math.max(summary.totalRequests, 1)) * 100;
      console.log(chalk.red(`\n${summary.errors} requests failed after retries (${errorRate.toFixed(1)}%)`));
    }

    if (!summary.percentiles.available) {
      console.log(chalk.yellow('\n⚠️  No successful requests, latency percentiles unavailable'));
      return;
    }

    const table = new Table({
      head: ['Percentile', 'Latency'],
      colWidths: [15, 15]
    });
    summary.percentiles.entries.forEach(entry => {
      table.push([this.ordinal(entry.percentile), this.formatTime(entry.latencyMs)]);
    });
    console.log(`\n${chalk.bold.white(`Latency over ${summary.percentiles.sampleCount} successful requests`)}`);
    console.log(table.toString());
  }

  static exportResults(summary: RunSummary, filename?: string): string | undefined {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const file = filename || `loadtest-summary-${timestamp}.json`;

    try {
      writeFileSync(file, JSON.stringify({ generatedAt: new Date().toISOString(), ...summary }, null, 2));
      console.log(chalk.blue(`\n📊 Results exported to: ${file}`));
      return file;
    } catch (error) {
      console.log(chalk.red(`❌ Failed to export results: ${error instanceof Error ? error.message : String(error)}`));
      return undefined;
    }
  }
}

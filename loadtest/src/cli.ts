import chalk from 'chalk';
import { Command } from 'commander';
import { configFromEnv, loadConfig, type ConfigInput, type TestConfig } from './config';
import { ResultReporter } from './reporter';
import { LoadTestRunner, type RunnerDependencies } from './runner';
import type { RunSummary } from './types';

export const buildProgram = (
  onRun: (config: TestConfig) => Promise<void>,
  env: NodeJS.ProcessEnv = process.env
): Command => {
  const program = new Command();

  program
    .name('guestbook-loadtest')
    .description('Fire a 50/50 mix of GET /comments and POST /comment at a guestbook service')
    .option('--host <url>', 'Host and port of the guestbook app')
    .option('-n, --requests <count>', 'Total number of requests')
    .option('-t, --threads <count>', 'Number of concurrent workers')
    .option('-p, --percentiles <list>', 'Comma-separated latency percentiles to report')
    .option('--timeout <ms>', 'Per-attempt request timeout in milliseconds')
    .option('-o, --output <file>', 'Also write the summary as JSON to this file')
    .action(async (options: ConfigInput) => {
      await onRun(loadConfig(configFromEnv(env), options));
    });

  return program;
};

export async function runLoadTest(config: TestConfig, deps: RunnerDependencies = {}): Promise<RunSummary> {
  console.log(chalk.bold.blue('🚀 Guestbook Load Test'));
  console.log(chalk.gray('═'.repeat(50)));

  console.log(chalk.white(`Target URL: ${config.baseUrl}`));
  console.log(chalk.white(`Total requests: ${config.totalRequests}`));
  console.log(chalk.white(`Workers: ${config.workers}`));
  console.log(chalk.white(`Percentiles: ${config.percentiles.join(', ')}`));
  console.log(chalk.white(`Timeout: ${config.timeout}ms`));
  console.log('');

  const summary = await new LoadTestRunner(config, deps).run();

  ResultReporter.printRunSummary(summary);
  if (config.outputFile) {
    ResultReporter.exportResults(summary, config.outputFile);
  }

  console.log(chalk.bold.green('\n✅ Load test completed!'));
  return summary;
}

#!/usr/bin/env node

import dotenv from 'dotenv';
import chalk from 'chalk';
import { buildProgram, runLoadTest } from './cli';
import { errorMessage } from './errors';

dotenv.config();

async function main() {
  const program = buildProgram(async config => {
    await runLoadTest(config);
  });
  await program.parseAsync(process.argv);
}

if (require.main === module) {
  // Handle process interruption
  process.on('SIGINT', () => {
    console.log(chalk.yellow('\n\n⚠️  Test interrupted by user'));
    process.exit(0);
  });

  main().catch((error: unknown) => {
    console.error(chalk.red(`❌ Load test failed: ${errorMessage(error)}`));
    process.exit(1);
  });
}

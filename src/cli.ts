#!/usr/bin/env node
import chalk from 'chalk';
import * as dotenv from 'dotenv';
import { parseArgs, resolveRunConfig } from './args.js';
import { formatBenchmarkResult, runBenchmarks } from './bench/benchmark.js';
import { configureEvents } from './config.js';
import { logger } from './logger.js';

function main() {
  // Load local environment variables from .env
  dotenv.config();

  try {
    const args = parseArgs(process.argv.slice(2));
    if (args.quiet) logger.setConsoleOutputEnabled(false);

    const config = resolveRunConfig(args);
    configureEvents(config);

    const { sizes, runs } = config.bench;
    logger.info(`Running benchmarks for sizes [${sizes.join(', ')}], ${runs} runs each`);

    for (const result of runBenchmarks(sizes, runs)) {
      console.log(`${chalk.green('✔')} ${formatBenchmarkResult(result)}`);
    }
  } catch (error) {
    console.error(chalk.red('Fatal Error:'), error);
    process.exitCode = 1;
  }
}

main();

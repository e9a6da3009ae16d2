#!/usr/bin/env node
/**
 * x12-delimiters CLI
 *
 * Usage: x12-delimiters [options] <command> [arguments]
 */

import chalk from 'chalk';
import { shutdownLogging } from '../logging/index.js';
import { createProgram } from './program.js';

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } finally {
    await shutdownLogging();
  }
}

main().catch((error: unknown) => {
  console.error(chalk.red('Fatal error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});

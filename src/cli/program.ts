/**
 * CLI program definition, kept apart from the entry point so it can be
 * driven from tests.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { LogLevel, setGlobalLevel } from '../logging/index.js';
import { registerDelimiterCommands } from './commands/delimiters.js';
import type { GlobalOptions } from './types/index.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('x12-delimiters')
    .description('Read and check the delimiters of X12 interchanges')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output');

  program.hook('preAction', (thisCommand) => {
    if (thisCommand.opts<GlobalOptions>().verbose) {
      setGlobalLevel(LogLevel.DEBUG);
    }
  });

  registerDelimiterCommands(program);

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# Delimiters from the first segment of a file')}
  $ x12-delimiters inspect @interchange.x12

  ${chalk.gray('# Same, as JSON')}
  $ x12-delimiters --json inspect @interchange.x12

  ${chalk.gray('# Fall back to configured delimiters for non-X12 input')}
  $ x12-delimiters resolve @message.edi --config delimiters.yaml
`
  );

  return program;
}

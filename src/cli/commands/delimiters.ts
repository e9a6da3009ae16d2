/**
 * Delimiter Commands
 *
 * Inspect the delimiters declared by an ISA header, print the defaults, or
 * resolve delimiters for a message under a properties file.
 */

import { Command } from 'commander';
import {
  X12Delimiters,
  getDefaultX12DelimiterProperties,
  loadDelimiterProperties,
  resolveDelimiters,
} from '../../x12/index.js';
import { getLogger } from '../../logging/index.js';
import { readHeader } from '../lib/HeaderReader.js';
import { OutputFormatter } from '../lib/OutputFormatter.js';
import type { GlobalOptions } from '../types/index.js';

const logger = getLogger('cli');

/** Header could not be read or is too short */
export const EXIT_EXTRACTION_FAILED = 1;
/** Delimiters were read but reuse a character */
export const EXIT_INVALID_DELIMITERS = 2;

function getRootProgram(cmd: Command): Command {
  let current = cmd;
  while (current.parent) {
    current = current.parent;
  }
  return current;
}

function getGlobalOpts(cmd: Command): GlobalOptions {
  return getRootProgram(cmd).opts<GlobalOptions>();
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function registerDelimiterCommands(program: Command): void {
  // ==========================================================================
  // inspect <header|@file>
  // ==========================================================================
  program
    .command('inspect <header>')
    .description('Read the delimiters from an ISA header (literal text or @file)')
    .action((header: string, _options: unknown, cmd: Command) => {
      const formatter = new OutputFormatter(getGlobalOpts(cmd).json);

      let bytes: Buffer;
      try {
        bytes = readHeader(header);
      } catch (error) {
        formatter.error('Failed to read header', errorMessage(error));
        process.exitCode = EXIT_EXTRACTION_FAILED;
        return;
      }

      const result = X12Delimiters.fromIsa(bytes);
      if (!result.ok) {
        logger.debug('Header rejected', { length: result.error.length });
        formatter.error(result.error.message, { kind: result.error.kind, length: result.error.length });
        process.exitCode = EXIT_EXTRACTION_FAILED;
        return;
      }

      formatter.delimiters(result.delimiters);
      if (!result.delimiters.areValid()) {
        process.exitCode = EXIT_INVALID_DELIMITERS;
      }
    });

  // ==========================================================================
  // defaults
  // ==========================================================================
  program
    .command('defaults')
    .description('Show the standard X12 delimiters')
    .action((_options: unknown, cmd: Command) => {
      new OutputFormatter(getGlobalOpts(cmd).json).delimiters(X12Delimiters.getDefault());
    });

  // ==========================================================================
  // resolve <message|@file> [--config <file>]
  // ==========================================================================
  program
    .command('resolve <message>')
    .description('Pick the delimiters for a message, inferring them from ISA when enabled')
    .option('-c, --config <file>', 'Delimiter properties file (YAML or JSON)')
    .option('--no-infer', 'Always use the configured delimiters')
    .action((message: string, _options: unknown, cmd: Command) => {
      const formatter = new OutputFormatter(getGlobalOpts(cmd).json);
      const opts = cmd.opts<{ config?: string; infer: boolean }>();

      try {
        const properties = opts.config
          ? loadDelimiterProperties(opts.config)
          : getDefaultX12DelimiterProperties();
        if (!opts.infer) {
          properties.inferX12Delimiters = false;
        }

        formatter.delimiters(resolveDelimiters(readHeader(message), properties));
      } catch (error) {
        formatter.error('Failed to resolve delimiters', errorMessage(error));
        process.exitCode = EXIT_EXTRACTION_FAILED;
      }
    });
}

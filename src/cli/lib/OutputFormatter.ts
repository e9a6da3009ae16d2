/**
 * Output Formatter
 *
 * Consistent output for CLI commands, as aligned text or JSON.
 */

import chalk from 'chalk';
import { X12Delimiters, describeDelimiter, formatHex } from '../../x12/index.js';
import type { DelimiterReport } from '../types/index.js';

const LABEL_WIDTH = 23;

/**
 * Format JSON output
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function toDelimiterReport(delimiters: X12Delimiters): DelimiterReport {
  return {
    segmentTerminator: describeDelimiter(delimiters.getSegmentTerminator()),
    elementSeparator: describeDelimiter(delimiters.getElementSeparator()),
    subElementSeparator: describeDelimiter(delimiters.getSubElementSeparator()),
    codes: delimiters.toJSON(),
    valid: delimiters.areValid(),
  };
}

function formatRow(label: string, code: number): string {
  return `  ${chalk.gray((label + ':').padEnd(LABEL_WIDTH))} ${describeDelimiter(code).padEnd(4)} ${chalk.gray(formatHex(code))}`;
}

/**
 * One row per delimiter plus the validity verdict
 */
export function formatDelimiterTable(delimiters: X12Delimiters): string {
  const verdict = delimiters.areValid()
    ? chalk.green('yes')
    : chalk.red('no (delimiters must be distinct)');

  return [
    formatRow('Segment terminator', delimiters.getSegmentTerminator()),
    formatRow('Element separator', delimiters.getElementSeparator()),
    formatRow('Sub-element separator', delimiters.getSubElementSeparator()),
    `  ${chalk.gray('Valid:'.padEnd(LABEL_WIDTH))} ${verdict}`,
  ].join('\n');
}

export class OutputFormatter {
  constructor(private readonly jsonMode: boolean = false) {}

  /**
   * Output data (text or JSON based on mode)
   */
  output(textOutput: string, jsonData: unknown): void {
    if (this.jsonMode) {
      console.log(formatJson(jsonData));
    } else {
      console.log(textOutput);
    }
  }

  delimiters(delimiters: X12Delimiters): void {
    this.output(formatDelimiterTable(delimiters), toDelimiterReport(delimiters));
  }

  /**
   * Output error message; JSON mode keeps it on stdout
   */
  error(message: string, details?: unknown): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: false, error: message, details }));
    } else {
      console.error(chalk.red('✖') + ' ' + message);
      if (details) {
        console.error(chalk.gray(typeof details === 'string' ? details : formatJson(details)));
      }
    }
  }
}

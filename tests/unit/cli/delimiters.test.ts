/**
 * Delimiter CLI Commands — Unit Tests
 *
 * Drives the commander program in-process and checks what it prints.
 * chalk is replaced with a passthrough so text output can be compared exactly.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

jest.mock('chalk', () => {
  const passthrough = (s: string): string => s;
  return {
    __esModule: true,
    default: { gray: passthrough, green: passthrough, red: passthrough, bold: passthrough },
  };
});

import { createProgram } from '../../../src/cli/program.js';
import {
  EXIT_EXTRACTION_FAILED,
  EXIT_INVALID_DELIMITERS,
} from '../../../src/cli/commands/delimiters.js';
import { initializeLogging, resetLogging, resetLoggingConfig } from '../../../src/logging/index.js';
import { captureTransport, flushLogs } from '../logging/captureTransport.js';
import { ISA_STANDARD, ISA_ALTERNATE, INTERCHANGE, withByteAt } from '../x12/fixtures.js';

const DEFAULT_TABLE = [
  '  Segment terminator:     ~    0x7E',
  '  Element separator:      *    0x2A',
  '  Sub-element separator:  :    0x3A',
  '  Valid:                  yes',
].join('\n');

async function run(...args: string[]): Promise<void> {
  await createProgram().parseAsync(['node', 'x12-delimiters', ...args]);
}

describe('delimiter commands', () => {
  let logSpy: jest.SpiedFunction<typeof console.log>;
  let errorSpy: jest.SpiedFunction<typeof console.error>;
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'x12-cli-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
  });

  function jsonOutput(): unknown {
    expect(logSpy).toHaveBeenCalledTimes(1);
    return JSON.parse(String(logSpy.mock.calls[0]?.[0]));
  }

  describe('inspect', () => {
    it('should print the delimiters of a literal header', async () => {
      await run('inspect', ISA_STANDARD);

      expect(logSpy).toHaveBeenCalledWith(DEFAULT_TABLE);
      expect(process.exitCode).toBeUndefined();
    });

    it('should print JSON with --json', async () => {
      await run('--json', 'inspect', ISA_ALTERNATE);

      expect(jsonOutput()).toEqual({
        segmentTerminator: '}',
        elementSeparator: '^',
        subElementSeparator: '>',
        codes: { segmentTerminator: 0x7d, elementSeparator: 0x5e, subElementSeparator: 0x3e },
        valid: true,
      });
    });

    it('should read a header from @file', async () => {
      const file = path.join(dir, 'interchange.x12');
      fs.writeFileSync(file, INTERCHANGE, 'latin1');

      await run('inspect', `@${file}`);

      expect(logSpy).toHaveBeenCalledWith(DEFAULT_TABLE);
    });

    it('should fail with exit code 1 for a short header', async () => {
      await run('inspect', 'ISA*00*');

      expect(errorSpy).toHaveBeenNthCalledWith(1, '✖ header must be at least 106 bytes to extract delimiters');
      expect(errorSpy).toHaveBeenNthCalledWith(
        2,
        JSON.stringify({ kind: 'InvalidHeaderLength', length: 7 }, null, 2)
      );
      expect(logSpy).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(EXIT_EXTRACTION_FAILED);
    });

    it('should report a short header as JSON with --json', async () => {
      await run('--json', 'inspect', 'ISA*00*');

      expect(jsonOutput()).toEqual({
        success: false,
        error: 'header must be at least 106 bytes to extract delimiters',
        details: { kind: 'InvalidHeaderLength', length: 7 },
      });
    });

    it('should fail with exit code 1 for a missing file', async () => {
      const missing = path.join(dir, 'missing.x12');

      await run('inspect', `@${missing}`);

      expect(errorSpy).toHaveBeenNthCalledWith(1, '✖ Failed to read header');
      expect(errorSpy).toHaveBeenNthCalledWith(2, `File not found: ${missing}`);
      expect(process.exitCode).toBe(EXIT_EXTRACTION_FAILED);
    });

    it('should exit with code 2 when delimiters repeat', async () => {
      await run('--json', 'inspect', withByteAt(ISA_STANDARD, 104, '*'));

      expect(jsonOutput()).toEqual({
        segmentTerminator: '~',
        elementSeparator: '*',
        subElementSeparator: '*',
        codes: { segmentTerminator: 0x7e, elementSeparator: 0x2a, subElementSeparator: 0x2a },
        valid: false,
      });
      expect(process.exitCode).toBe(EXIT_INVALID_DELIMITERS);
    });

    it('should explain an invalid verdict in text mode', async () => {
      await run('inspect', withByteAt(ISA_STANDARD, 104, '*'));

      expect(String(logSpy.mock.calls[0]?.[0]).split('\n')[3]).toBe(
        '  Valid:                  no (delimiters must be distinct)'
      );
    });
  });

  describe('defaults', () => {
    it('should print the standard delimiters', async () => {
      await run('defaults');

      expect(logSpy).toHaveBeenCalledWith(DEFAULT_TABLE);
    });
  });

  describe('resolve', () => {
    it('should infer delimiters from an ISA message', async () => {
      await run('--json', 'resolve', ISA_ALTERNATE);

      expect(jsonOutput()).toMatchObject({ segmentTerminator: '}', elementSeparator: '^' });
    });

    it('should use the defaults with --no-infer', async () => {
      await run('--json', 'resolve', '--no-infer', ISA_ALTERNATE);

      expect(jsonOutput()).toMatchObject({ segmentTerminator: '~', elementSeparator: '*' });
    });

    it('should use configured delimiters for non-X12 messages', async () => {
      const config = path.join(dir, 'delimiters.yaml');
      fs.writeFileSync(config, "segmentDelimiter: \"'\"\nelementDelimiter: '+'\n");

      await run('--json', 'resolve', '--config', config, 'UNB+UNOA:4+SENDER+RECEIVER');

      expect(jsonOutput()).toEqual({
        segmentTerminator: "'",
        elementSeparator: '+',
        subElementSeparator: ':',
        codes: { segmentTerminator: 0x27, elementSeparator: 0x2b, subElementSeparator: 0x3a },
        valid: true,
      });
    });

    it('should fail with exit code 1 for invalid properties', async () => {
      const config = path.join(dir, 'bad.json');
      fs.writeFileSync(config, JSON.stringify({ segmentDelimiter: 7 }));

      await run('--json', 'resolve', '--config', config, ISA_STANDARD);

      expect(jsonOutput()).toEqual({
        success: false,
        error: 'Failed to resolve delimiters',
        details: 'Invalid delimiter properties: segmentDelimiter: Expected string, received number',
      });
      expect(process.exitCode).toBe(EXIT_EXTRACTION_FAILED);
    });
  });

  describe('--verbose', () => {
    afterEach(() => {
      resetLogging();
      resetLoggingConfig();
    });

    it('should log rejected headers at debug level', async () => {
      const capture = captureTransport();
      initializeLogging([capture.transport]);

      await run('-v', 'inspect', 'ISA*00*');
      await flushLogs();

      expect(capture.records).toEqual([
        expect.objectContaining({ level: 'debug', message: 'Header rejected', component: 'cli', length: 7 }),
      ]);
      expect(process.exitCode).toBe(EXIT_EXTRACTION_FAILED);
    });

    it('should stay quiet without it', async () => {
      const capture = captureTransport();
      initializeLogging([capture.transport]);

      await run('inspect', 'ISA*00*');
      await flushLogs();

      expect(capture.records).toEqual([]);
    });
  });
});

/**
 * X12 Delimiters
 *
 * The three control characters that govern the syntax of an X12 interchange,
 * read from the fixed-width ISA header segment:
 *
 *   ISA*00*          *00*          *ZZ*...*00501*000000001*0*P*:~
 *   Position 3: element separator
 *   Position 104: sub-element separator
 *   Position 105: segment terminator
 *
 * Values are single-byte character codes. Nothing is validated at
 * construction; call areValid() before handing the set to a tokenizer.
 */

import {
  X12DelimiterError,
  invalidDelimiterCharacter,
  invalidHeaderLength,
} from './X12DelimiterError.js';

export const ISA_SEGMENT_ID = 'ISA';
export const ISA_MIN_LENGTH = 106;
export const ISA_ELEMENT_SEPARATOR_INDEX = 3;
export const ISA_SUB_ELEMENT_SEPARATOR_INDEX = 104;
export const ISA_SEGMENT_TERMINATOR_INDEX = 105;

const DEFAULT_SEGMENT_TERMINATOR = 0x7e; // ~
const DEFAULT_ELEMENT_SEPARATOR = 0x2a; // *
const DEFAULT_SUB_ELEMENT_SEPARATOR = 0x3a; // :

/**
 * Raw ISA header input. Strings are read one byte per UTF-16 code unit and
 * units above 0xFF keep only their low byte, so a header decoded as anything
 * but latin1 should be passed as bytes.
 */
export type IsaHeader = Uint8Array | string;

/**
 * Outcome of reading delimiters from a header
 */
export type DelimiterResult =
  | { ok: true; delimiters: X12Delimiters }
  | { ok: false; error: X12DelimiterError };

/**
 * Delimiters as one-character strings, the shape EDI parsers split on
 */
export interface X12DelimiterChars {
  segmentDelimiter: string;
  elementDelimiter: string;
  subelementDelimiter: string;
}

function byteAt(header: IsaHeader, index: number): number {
  if (typeof header === 'string') {
    return header.charCodeAt(index) & 0xff;
  }
  return header[index] ?? 0;
}

function charToCode(role: string, value: string): number {
  const code = value.charCodeAt(0);
  if (value.length !== 1 || code > 0xff) {
    throw invalidDelimiterCharacter(role, value);
  }
  return code;
}

export class X12Delimiters {
  constructor(
    private readonly segmentTerminator: number,
    private readonly elementSeparator: number,
    private readonly subElementSeparator: number
  ) {}

  /**
   * Standard delimiters: segment `~`, element `*`, sub-element `:`.
   */
  static getDefault(): X12Delimiters {
    return new X12Delimiters(
      DEFAULT_SEGMENT_TERMINATOR,
      DEFAULT_ELEMENT_SEPARATOR,
      DEFAULT_SUB_ELEMENT_SEPARATOR
    );
  }

  /**
   * Read delimiters from the start of an ISA segment.
   *
   * Fails with InvalidHeaderLength when fewer than 106 bytes are supplied.
   * Anything after position 105 is ignored, and neither the segment ID nor
   * the extracted bytes are checked.
   */
  static fromIsa(header: IsaHeader): DelimiterResult {
    if (header.length < ISA_MIN_LENGTH) {
      return { ok: false, error: invalidHeaderLength(header.length) };
    }

    return {
      ok: true,
      delimiters: new X12Delimiters(
        byteAt(header, ISA_SEGMENT_TERMINATOR_INDEX),
        byteAt(header, ISA_ELEMENT_SEPARATOR_INDEX),
        byteAt(header, ISA_SUB_ELEMENT_SEPARATOR_INDEX)
      ),
    };
  }

  /**
   * Same as fromIsa(), throwing the X12DelimiterError on failure.
   */
  static fromIsaOrThrow(header: IsaHeader): X12Delimiters {
    const result = X12Delimiters.fromIsa(header);
    if (!result.ok) {
      throw result.error;
    }
    return result.delimiters;
  }

  /**
   * Build from one-character strings.
   * @throws X12DelimiterError (InvalidDelimiterCharacter) for empty, multi-character or non-byte values
   */
  static fromChars(chars: X12DelimiterChars): X12Delimiters {
    return new X12Delimiters(
      charToCode('segment delimiter', chars.segmentDelimiter),
      charToCode('element delimiter', chars.elementDelimiter),
      charToCode('subelement delimiter', chars.subelementDelimiter)
    );
  }

  getSegmentTerminator(): number {
    return this.segmentTerminator;
  }

  getElementSeparator(): number {
    return this.elementSeparator;
  }

  getSubElementSeparator(): number {
    return this.subElementSeparator;
  }

  /**
   * True when no character is used for two roles.
   */
  areValid(): boolean {
    return (
      this.segmentTerminator !== this.elementSeparator &&
      this.segmentTerminator !== this.subElementSeparator &&
      this.elementSeparator !== this.subElementSeparator
    );
  }

  equals(other: X12Delimiters): boolean {
    return (
      this.segmentTerminator === other.segmentTerminator &&
      this.elementSeparator === other.elementSeparator &&
      this.subElementSeparator === other.subElementSeparator
    );
  }

  toChars(): X12DelimiterChars {
    return {
      segmentDelimiter: String.fromCharCode(this.segmentTerminator),
      elementDelimiter: String.fromCharCode(this.elementSeparator),
      subelementDelimiter: String.fromCharCode(this.subElementSeparator),
    };
  }

  toJSON(): { segmentTerminator: number; elementSeparator: number; subElementSeparator: number } {
    return {
      segmentTerminator: this.segmentTerminator,
      elementSeparator: this.elementSeparator,
      subElementSeparator: this.subElementSeparator,
    };
  }
}

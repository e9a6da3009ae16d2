/**
 * X12 Delimiter Errors
 *
 * Failure kinds raised while reading or building an X12 delimiter set.
 */

export type X12DelimiterErrorKind = 'InvalidHeaderLength' | 'InvalidDelimiterCharacter';

export class X12DelimiterError extends Error {
  constructor(
    message: string,
    public readonly kind: X12DelimiterErrorKind,
    public readonly length?: number
  ) {
    super(message);
    this.name = 'X12DelimiterError';
  }
}

/**
 * The header handed to the extractor is too short to reach the segment terminator.
 */
export function invalidHeaderLength(length: number): X12DelimiterError {
  return new X12DelimiterError(
    'header must be at least 106 bytes to extract delimiters',
    'InvalidHeaderLength',
    length
  );
}

export function invalidDelimiterCharacter(role: string, value: string): X12DelimiterError {
  return new X12DelimiterError(
    `${role} must be a single-byte character, got ${JSON.stringify(value)}`,
    'InvalidDelimiterCharacter'
  );
}

/**
 * Printable rendering of delimiter codes for logs and CLI output.
 */

const NAMED_CODES: Record<number, string> = {
  0x09: '\\t',
  0x0a: '\\n',
  0x0d: '\\r',
  0x20: 'SP',
};

export function describeDelimiter(code: number): string {
  const named = NAMED_CODES[code];
  if (named !== undefined) return named;
  if (code >= 0x21 && code <= 0x7e) return String.fromCharCode(code);
  return formatHex(code);
}

/**
 * e.g. 0x7E
 */
export function formatHex(code: number): string {
  return '0x' + code.toString(16).toUpperCase().padStart(2, '0');
}

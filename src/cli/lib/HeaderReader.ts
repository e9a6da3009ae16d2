/**
 * Header Reader
 *
 * Turns a command argument into header bytes: "@path" reads the file
 * as-is, anything else is taken literally (one byte per character).
 */

import * as fs from 'fs';
import * as path from 'path';

export function readHeader(headerOrFile: string): Buffer {
  if (headerOrFile.startsWith('@')) {
    const filePath = headerOrFile.slice(1);
    const absolutePath = path.isAbsolute(filePath)
      ? filePath
      : path.resolve(process.cwd(), filePath);

    if (!fs.existsSync(absolutePath)) {
      throw new Error(`File not found: ${absolutePath}`);
    }

    return fs.readFileSync(absolutePath);
  }

  return Buffer.from(headerOrFile, 'latin1');
}

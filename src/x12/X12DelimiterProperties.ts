/**
 * X12 Delimiter Properties
 *
 * Configured delimiters for X12/EDI processing, and resolution of the
 * delimiters to use for a given message:
 * - Segment, element, and subelement delimiters, with \n \r \t escapes
 * - Inference from the ISA segment when inferX12Delimiters is set
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { getLogger } from '../logging/index.js';
import { describeDelimiter } from './format.js';
import { ISA_SEGMENT_ID, X12Delimiters } from './X12Delimiters.js';
import type { IsaHeader, X12DelimiterChars } from './X12Delimiters.js';

const logger = getLogger('x12-delimiters');

export interface X12DelimiterProperties extends X12DelimiterChars {
  /** Infer delimiters from the ISA segment instead of using the configured ones (default: true) */
  inferX12Delimiters: boolean;
}

export function getDefaultX12DelimiterProperties(): X12DelimiterProperties {
  return {
    ...X12Delimiters.getDefault().toChars(),
    inferX12Delimiters: true,
  };
}

export const X12DelimiterPropertiesSchema = z
  .object({
    segmentDelimiter: z.string().min(1),
    elementDelimiter: z.string().min(1),
    subelementDelimiter: z.string().min(1),
    inferX12Delimiters: z.boolean(),
  })
  .partial()
  .strict();

export type X12DelimiterPropertiesInput = z.infer<typeof X12DelimiterPropertiesSchema>;

/**
 * Unescape special characters in delimiter strings
 */
export function unescapeDelimiter(str: string): string {
  return str.replace(/\\([nrt\\])/g, (_match, ch: string) => {
    switch (ch) {
      case 'n':
        return '\n';
      case 'r':
        return '\r';
      case 't':
        return '\t';
      default:
        return '\\';
    }
  });
}

/**
 * Validate raw properties and merge them over the defaults.
 * @throws Error listing every invalid field
 */
export function parseDelimiterProperties(input: unknown): X12DelimiterProperties {
  const parsed = X12DelimiterPropertiesSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid delimiter properties: ${issues}`);
  }

  return {
    ...getDefaultX12DelimiterProperties(),
    ...parsed.data,
  };
}

/**
 * Load properties from a YAML or JSON file.
 */
export function loadDelimiterProperties(filePath: string): X12DelimiterProperties {
  const content = fs.readFileSync(filePath, 'utf8');
  return parseDelimiterProperties(yaml.load(content));
}

/**
 * Does the input start with the ISA segment ID?
 */
export function hasIsaSegmentId(header: IsaHeader): boolean {
  if (typeof header === 'string') {
    return header.startsWith(ISA_SEGMENT_ID);
  }
  return (
    header.length >= ISA_SEGMENT_ID.length &&
    header[0] === ISA_SEGMENT_ID.charCodeAt(0) &&
    header[1] === ISA_SEGMENT_ID.charCodeAt(1) &&
    header[2] === ISA_SEGMENT_ID.charCodeAt(2)
  );
}

/**
 * Configured delimiters, unescaped.
 * @throws X12DelimiterError when a configured delimiter is not a single byte
 */
export function getConfiguredDelimiters(properties: X12DelimiterProperties): X12Delimiters {
  return X12Delimiters.fromChars({
    segmentDelimiter: unescapeDelimiter(properties.segmentDelimiter),
    elementDelimiter: unescapeDelimiter(properties.elementDelimiter),
    subelementDelimiter: unescapeDelimiter(properties.subelementDelimiter),
  });
}

/**
 * Pick the delimiters for a message.
 *
 * With inferX12Delimiters set and a message starting with "ISA", the set read
 * from the header wins and the configured delimiters are not consulted; a
 * header too short to read falls back to them. Non-X12 messages always use
 * the configured ones.
 * @throws X12DelimiterError when the configured delimiters are needed and one is not a single byte
 */
export function resolveDelimiters(
  message: IsaHeader,
  properties: X12DelimiterProperties = getDefaultX12DelimiterProperties()
): X12Delimiters {
  const resolved = inferDelimiters(message, properties) ?? getConfiguredDelimiters(properties);

  if (!resolved.areValid()) {
    logger.warn('Resolved delimiters are not distinct', describeSet(resolved));
  }

  return resolved;
}

function inferDelimiters(message: IsaHeader, properties: X12DelimiterProperties): X12Delimiters | null {
  if (!properties.inferX12Delimiters || !hasIsaSegmentId(message)) {
    return null;
  }

  const result = X12Delimiters.fromIsa(message);
  if (!result.ok) {
    logger.warn(`${result.error.message}; using configured delimiters`, {
      length: result.error.length,
    });
    return null;
  }

  logger.debug('Delimiters inferred from ISA header', describeSet(result.delimiters));
  return result.delimiters;
}

function describeSet(delimiters: X12Delimiters): Record<string, unknown> {
  return {
    segmentTerminator: describeDelimiter(delimiters.getSegmentTerminator()),
    elementSeparator: describeDelimiter(delimiters.getElementSeparator()),
    subElementSeparator: describeDelimiter(delimiters.getSubElementSeparator()),
  };
}

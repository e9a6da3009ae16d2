/**
 * X12 delimiter extraction
 */

export {
  X12Delimiters,
  ISA_SEGMENT_ID,
  ISA_MIN_LENGTH,
  ISA_ELEMENT_SEPARATOR_INDEX,
  ISA_SUB_ELEMENT_SEPARATOR_INDEX,
  ISA_SEGMENT_TERMINATOR_INDEX,
} from './X12Delimiters.js';
export type { IsaHeader, DelimiterResult, X12DelimiterChars } from './X12Delimiters.js';

export {
  X12DelimiterError,
  invalidHeaderLength,
  invalidDelimiterCharacter,
} from './X12DelimiterError.js';
export type { X12DelimiterErrorKind } from './X12DelimiterError.js';

export {
  X12DelimiterPropertiesSchema,
  getDefaultX12DelimiterProperties,
  unescapeDelimiter,
  parseDelimiterProperties,
  loadDelimiterProperties,
  hasIsaSegmentId,
  getConfiguredDelimiters,
  resolveDelimiters,
} from './X12DelimiterProperties.js';
export type { X12DelimiterProperties, X12DelimiterPropertiesInput } from './X12DelimiterProperties.js';

export { describeDelimiter, formatHex } from './format.js';

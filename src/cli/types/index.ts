/**
 * CLI-specific type definitions
 */

/**
 * Global CLI options available on all commands
 */
export type GlobalOptions = {
  json?: boolean;
  verbose?: boolean;
};

/**
 * JSON shape printed for a delimiter set
 */
export interface DelimiterReport {
  segmentTerminator: string;
  elementSeparator: string;
  subElementSeparator: string;
  codes: {
    segmentTerminator: number;
    elementSeparator: number;
    subElementSeparator: number;
  };
  valid: boolean;
}

/**
 * Alignment TSV type definitions
 */

import type { ParserOptions } from "../../types";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Row tokenizer states for RFC 4180 quoting
 */
export enum DSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * Alignment record parser options
 */
export interface DSVParserOptions extends ParserOptions {
  /** Field delimiter (default: tab) */
  delimiter?: string;
  /** Quote character (default: `"`) */
  quote?: string;
  /** Treat the first non-empty row as a header naming the columns */
  hasHeader?: boolean;
}

/**
 * Parser state carried across stream chunks
 */
export interface DSVParserState {
  currentLineNumber: number;
  /** Column names, fixed once the header (or the positional layout) is known */
  columns: readonly string[] | null;
  /** Index of `aa_aln` within `columns` */
  alignmentIndex: number;
}

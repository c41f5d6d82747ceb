/**
 * Alignment TSV constants
 */

import { ALIGNMENT_COLUMNS } from "../../types";

export const DEFAULT_DELIMITER = "\t";

/**
 * Default quote character (RFC 4180)
 */
export const DEFAULT_QUOTE = '"';

/**
 * Column that carries the aligned amino-acid sequence
 */
export const ALIGNMENT_COLUMN = "aa_aln";

/**
 * Column layout assumed when the input has no header row
 */
export const POSITIONAL_COLUMNS: readonly string[] = ALIGNMENT_COLUMNS;

/**
 * Maximum field size for memory safety (100MB)
 */
export const MAX_FIELD_SIZE = 100_000_000;

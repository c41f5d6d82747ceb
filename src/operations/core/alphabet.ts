/**
 * Residue alphabet binning for amino-acid count tables
 *
 * Maps single residue symbols onto a fixed set of 29 bins: one per letter
 * (case folded), plus dedicated bins for alignment gaps, stop codons and
 * anything else. Count tables are indexed by these bins.
 *
 * @module alphabet
 *
 * @example
 * ```typescript
 * symbolToBin("K");  // 10
 * symbolToBin("k");  // 10
 * symbolToBin("-");  // GAP_BIN (26)
 * binToSymbol(27);   // "*"
 * ```
 */

import { ValidationError } from "../../errors";

// =============================================================================
// BIN LAYOUT
// =============================================================================

const LETTER_COUNT = 26;
const UPPER_A = 0x41;
const UPPER_Z = 0x5a;
const LOWER_A = 0x61;
const LOWER_Z = 0x7a;

/** Bin for the alignment gap symbol `-` */
export const GAP_BIN = LETTER_COUNT;

/** Bin for the stop symbol `*` */
export const STOP_BIN = LETTER_COUNT + 1;

/** Bin for every symbol that is neither a letter, a gap nor a stop */
export const ELSE_BIN = LETTER_COUNT + 2;

/** Total number of bins in a per-position count array */
export const ALPHABET_SIZE = LETTER_COUNT + 3;

export const GAP_SYMBOL = "-";
export const STOP_SYMBOL = "*";
export const ELSE_SYMBOL = "?";

/**
 * Residue bin index, `0..ALPHABET_SIZE - 1`
 */
export type ResidueBin = number;

// =============================================================================
// CODEC
// =============================================================================

/**
 * Map a residue symbol to its count-table bin
 *
 * Only the first UTF-16 unit of `symbol` is considered; an empty string
 * falls into the else bin.
 */
export function symbolToBin(symbol: string): ResidueBin {
  return codeToBin(symbol.charCodeAt(0));
}

/**
 * Map a character code to its count-table bin
 *
 * Used by the hot counting loop to avoid allocating one-character strings.
 */
export function codeToBin(code: number): ResidueBin {
  if (code >= UPPER_A && code <= UPPER_Z) return code - UPPER_A;
  if (code >= LOWER_A && code <= LOWER_Z) return code - LOWER_A;
  if (code === 0x2d) return GAP_BIN;
  if (code === 0x2a) return STOP_BIN;
  return ELSE_BIN;
}

/**
 * Map a bin back to its canonical (uppercase) symbol
 *
 * @throws {ValidationError} When `bin` is not a valid bin index
 */
export function binToSymbol(bin: ResidueBin): string {
  if (!isResidueBin(bin)) {
    throw new ValidationError(`Residue bin out of range: ${bin} (expected 0..${ALPHABET_SIZE - 1})`);
  }
  switch (bin) {
    case GAP_BIN:
      return GAP_SYMBOL;
    case STOP_BIN:
      return STOP_SYMBOL;
    case ELSE_BIN:
      return ELSE_SYMBOL;
    default:
      return String.fromCharCode(UPPER_A + bin);
  }
}

export function isResidueBin(bin: number): boolean {
  return Number.isInteger(bin) && bin >= 0 && bin < ALPHABET_SIZE;
}

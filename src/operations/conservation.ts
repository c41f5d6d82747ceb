/**
 * Per-position conservation analysis
 *
 * Counts residues at every alignment position across the whole sequence set
 * and flags the positions whose majority residue falls below the
 * conservation threshold. Only those variable positions are examined for
 * substitutions later on.
 *
 * @example
 * ```typescript
 * const result = analyzeConservation(["MAD", "MAE", "MAE", "MAD"], {
 *   conservationThreshold: 0.97,
 * });
 * result.variablePositions; // [2]
 * result.diagnostics[0];    // { position: 2, majority: "D", frequency: 0.5, total: 4 }
 * ```
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { AlignedSequence } from "../types";
import { ALPHABET_SIZE, binToSymbol, codeToBin } from "./core/alphabet";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Residue counts per alignment position, one ALPHABET_SIZE-wide row each
 */
export type PositionCountTable = readonly Uint32Array[];

/**
 * Summary of one variable position
 */
export interface ConservationDiagnostic {
  /** 0-based alignment position */
  readonly position: number;
  /** Canonical symbol of the majority residue */
  readonly majority: string;
  /** Majority count divided by total count */
  readonly frequency: number;
  /** Number of sequences covering the position */
  readonly total: number;
}

export interface ConservationOptions {
  /** Majority frequency at or above which a position is conserved (default 0.97) */
  conservationThreshold?: number;
  /** Receives each diagnostic as soon as its position is classified */
  onDiagnostic?: (diagnostic: ConservationDiagnostic) => void;
}

export interface ConservationResult {
  /** Variable positions in ascending order */
  readonly variablePositions: readonly number[];
  readonly diagnostics: readonly ConservationDiagnostic[];
  readonly counts: PositionCountTable;
  /** Number of sequences analyzed */
  readonly sequenceCount: number;
  /** Longest sequence length, the width of the count table */
  readonly alignmentLength: number;
}

export const DEFAULT_CONSERVATION_THRESHOLD = 0.97;

const ConservationThresholdSchema = type("0 < number <= 1");

// =============================================================================
// COUNTING
// =============================================================================

/**
 * Build the position count table
 *
 * The table spans the longest sequence; shorter sequences only contribute
 * to the positions they cover.
 */
export function buildPositionCounts(sequences: readonly AlignedSequence[]): PositionCountTable {
  let alignmentLength = 0;
  for (const sequence of sequences) {
    alignmentLength = Math.max(alignmentLength, sequence.length);
  }

  const counts: Uint32Array[] = Array.from(
    { length: alignmentLength },
    () => new Uint32Array(ALPHABET_SIZE)
  );

  for (const sequence of sequences) {
    for (let i = 0; i < sequence.length; i++) {
      const row = counts[i];
      if (row === undefined) continue;
      const bin = codeToBin(sequence.charCodeAt(i));
      row[bin] = (row[bin] ?? 0) + 1;
    }
  }

  return counts;
}

/**
 * Find the majority bin of one count row
 *
 * Ties go to the lowest bin index, i.e. the first bin reaching the maximum
 * in iteration order. Returns undefined for an all-zero row.
 */
export function majorityBin(row: Uint32Array): { bin: number; count: number; total: number } | undefined {
  let total = 0;
  let maxCount = 0;
  let maxBin: number | undefined;

  for (let bin = 0; bin < row.length; bin++) {
    const count = row[bin] ?? 0;
    total += count;
    if (count > maxCount) {
      maxCount = count;
      maxBin = bin;
    }
  }

  return maxBin === undefined ? undefined : { bin: maxBin, count: maxCount, total };
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

/**
 * Classify every alignment position as conserved or variable
 *
 * A position is variable when its majority frequency is strictly below the
 * threshold. Positions no sequence covers are neither.
 *
 * @throws {ValidationError} If the threshold is outside (0, 1]
 */
export function analyzeConservation(
  sequences: readonly AlignedSequence[],
  options: ConservationOptions = {}
): ConservationResult {
  const threshold = options.conservationThreshold ?? DEFAULT_CONSERVATION_THRESHOLD;
  const validation = ConservationThresholdSchema(threshold);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid conservation threshold: ${validation.summary}`);
  }

  const counts = buildPositionCounts(sequences);
  const variablePositions: number[] = [];
  const diagnostics: ConservationDiagnostic[] = [];

  counts.forEach((row, position) => {
    const majority = majorityBin(row);
    if (majority === undefined) return;

    const frequency = majority.count / majority.total;
    if (frequency < threshold) {
      variablePositions.push(position);
      const diagnostic: ConservationDiagnostic = {
        position,
        majority: binToSymbol(majority.bin),
        frequency,
        total: majority.total,
      };
      diagnostics.push(diagnostic);
      options.onDiagnostic?.(diagnostic);
    }
  });

  return {
    variablePositions,
    diagnostics,
    counts,
    sequenceCount: sequences.length,
    alignmentLength: counts.length,
  };
}

/**
 * Render a diagnostic as a stderr line: 1-based zero-padded position,
 * majority symbol, frequency to four places, total count
 *
 * @example
 * ```typescript
 * formatDiagnostic({ position: 2, majority: "D", frequency: 0.5, total: 4 });
 * // "0003 / D: 0.5000 (4)"
 * ```
 */
export function formatDiagnostic(diagnostic: ConservationDiagnostic): string {
  const position = String(diagnostic.position + 1).padStart(4, "0");
  return `${position} / ${diagnostic.majority}: ${diagnostic.frequency.toFixed(4)} (${diagnostic.total})`;
}

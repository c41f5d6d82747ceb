/**
 * Substitution events relative to the reference
 *
 * A substitution is a plain immutable value: the alignment position, the
 * reference (ancestral) residue and the observed (derived) residue. Equality
 * is structural, and `substitutionKey` gives the stable string identity used
 * to key graph nodes.
 */

import type { AlignedSequence } from "../types";

// =============================================================================
// VALUE TYPE
// =============================================================================

export interface Substitution {
  /** 0-based alignment position */
  readonly position: number;
  /** Reference residue at the position */
  readonly ancestral: string;
  /** Residue observed in the sequence */
  readonly derived: string;
}

export function createSubstitution(
  position: number,
  ancestral: string,
  derived: string
): Substitution {
  return Object.freeze({ position, ancestral, derived });
}

/**
 * Stable identity key, unambiguous even when residues are digits
 */
export function substitutionKey(substitution: Substitution): string {
  return `${substitution.position}:${substitution.ancestral}:${substitution.derived}`;
}

/**
 * Conventional mutation label with a 1-based position, e.g. `D614G`
 */
export function substitutionLabel(substitution: Substitution): string {
  return `${substitution.ancestral}${substitution.position + 1}${substitution.derived}`;
}

export function substitutionsEqual(a: Substitution, b: Substitution): boolean {
  return a.position === b.position && a.ancestral === b.ancestral && a.derived === b.derived;
}

/**
 * Total order: position, then ancestral residue, then derived residue
 */
export function compareSubstitutions(a: Substitution, b: Substitution): number {
  if (a.position !== b.position) return a.position - b.position;
  if (a.ancestral !== b.ancestral) return a.ancestral < b.ancestral ? -1 : 1;
  if (a.derived !== b.derived) return a.derived < b.derived ? -1 : 1;
  return 0;
}

// =============================================================================
// EXTRACTION
// =============================================================================

/**
 * List the substitutions one sequence carries at the variable positions
 *
 * Positions beyond the end of either the sequence or the reference are
 * skipped. Residues are compared exactly, so case differences count.
 *
 * @param variablePositions - Ascending positions; the output follows their order
 *
 * @example
 * ```typescript
 * extractSubstitutions("MAE", "MAD", [2]);
 * // [{ position: 2, ancestral: "D", derived: "E" }]
 * ```
 */
export function extractSubstitutions(
  sequence: AlignedSequence,
  reference: AlignedSequence,
  variablePositions: readonly number[]
): Substitution[] {
  const substitutions: Substitution[] = [];

  for (const position of variablePositions) {
    if (position >= sequence.length || position >= reference.length) continue;

    const ancestral = reference.charAt(position);
    const derived = sequence.charAt(position);
    if (ancestral !== derived) {
      substitutions.push(createSubstitution(position, ancestral, derived));
    }
  }

  return substitutions;
}

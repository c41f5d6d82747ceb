/**
 * Co-occurrence graph pruning
 *
 * Two passes, strictly in order: first drop edges lacking absolute support
 * or relative frequency, then drop substitutions left without any edge.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { CooccurrenceGraph } from "./cooccurrence";

// =============================================================================
// TYPES
// =============================================================================

export interface EdgePruneOptions {
  /** Minimum co-occurrence count an edge needs (integer >= 1, default 4) */
  minimumSupport?: number;
  /** Minimum co-occurrence count divided by totalSequences (default 0.10) */
  minimumFrequency?: number;
  /** Number of input sequences, the denominator of edge frequency */
  totalSequences: number;
}

export interface PruneSummary {
  readonly edgesRemoved: number;
  readonly nodesRemoved: number;
  readonly edgesRetained: number;
  readonly nodesRetained: number;
}

export const DEFAULT_MINIMUM_SUPPORT = 4;
export const DEFAULT_MINIMUM_FREQUENCY = 0.1;

const EdgePruneOptionsSchema = type({
  minimumSupport: "number >= 1",
  minimumFrequency: "0 <= number <= 1",
  totalSequences: "number >= 0",
}).narrow((options, ctx) => {
  for (const key of ["minimumSupport", "totalSequences"] as const) {
    if (!Number.isInteger(options[key])) {
      return ctx.reject({
        path: [key],
        expected: "an integer",
        actual: String(options[key]),
      });
    }
  }
  return true;
});

// =============================================================================
// PASSES
// =============================================================================

/**
 * Remove every edge whose weight is below `minimumSupport` or whose
 * frequency (weight / totalSequences) is below `minimumFrequency`.
 * Nodes are left in place even when this isolates them.
 *
 * @returns Number of edges removed
 * @throws {ValidationError} On out-of-range thresholds
 */
export function pruneEdges(graph: CooccurrenceGraph, options: EdgePruneOptions): number {
  const resolved = {
    minimumSupport: options.minimumSupport ?? DEFAULT_MINIMUM_SUPPORT,
    minimumFrequency: options.minimumFrequency ?? DEFAULT_MINIMUM_FREQUENCY,
    totalSequences: options.totalSequences,
  };
  const validation = EdgePruneOptionsSchema(resolved);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid pruning options: ${validation.summary}`);
  }

  let removed = 0;
  // Snapshot first; removal during graph iteration is unsafe
  for (const edge of graph.edges()) {
    const frequency = edge.weight / resolved.totalSequences;
    if (edge.weight < resolved.minimumSupport || frequency < resolved.minimumFrequency) {
      graph.removeEdge(edge.source, edge.target);
      removed++;
    }
  }
  return removed;
}

/**
 * Remove every substitution with no incident edge
 *
 * @returns Number of nodes removed
 */
export function pruneIsolatedNodes(graph: CooccurrenceGraph): number {
  let removed = 0;
  for (const substitution of graph.substitutions()) {
    if (graph.degree(substitution) === 0) {
      graph.removeSubstitution(substitution);
      removed++;
    }
  }
  return removed;
}

/**
 * Run edge pruning to completion, then isolated-node pruning
 */
export function pruneGraph(graph: CooccurrenceGraph, options: EdgePruneOptions): PruneSummary {
  const edgesRemoved = pruneEdges(graph, options);
  const nodesRemoved = pruneIsolatedNodes(graph);
  return {
    edgesRemoved,
    nodesRemoved,
    edgesRetained: graph.size,
    nodesRetained: graph.order,
  };
}

/**
 * Substitution co-occurrence graph
 *
 * An undirected simple graph over substitutions. Each edge carries a
 * `weight`: the number of sequences in which both endpoint substitutions
 * were observed. Backed by an undirected graphology Graph, so node and edge
 * iteration follow insertion order and output is reproducible run to run.
 *
 * @example
 * ```typescript
 * const graph = new CooccurrenceGraph();
 * graph.addSequence(extractSubstitutions(sequence, reference, variablePositions));
 * graph.weight(a, b); // number of sequences carrying both a and b
 * ```
 */

import Graph from "graphology";
import type { Substitution } from "./substitutions";
import { substitutionKey, substitutionLabel } from "./substitutions";

// =============================================================================
// TYPES
// =============================================================================

type SubstitutionNodeAttributes = {
  substitution: Substitution;
  label: string;
};

type CooccurrenceEdgeAttributes = {
  weight: number;
};

/**
 * One edge of the graph with its accumulated support
 */
export interface CooccurrenceEdge {
  readonly source: Substitution;
  readonly target: Substitution;
  readonly weight: number;
}

// =============================================================================
// GRAPH
// =============================================================================

export class CooccurrenceGraph {
  private readonly graph = new Graph<SubstitutionNodeAttributes, CooccurrenceEdgeAttributes>({
    type: "undirected",
    allowSelfLoops: false,
    multi: false,
  });

  /** Number of substitutions (nodes) */
  get order(): number {
    return this.graph.order;
  }

  /** Number of co-occurrence edges */
  get size(): number {
    return this.graph.size;
  }

  /**
   * Insert a substitution node; inserting an existing one is a no-op
   *
   * @returns The node key
   */
  addSubstitution(substitution: Substitution): string {
    const key = substitutionKey(substitution);
    if (!this.graph.hasNode(key)) {
      this.graph.addNode(key, { substitution, label: substitutionLabel(substitution) });
    }
    return key;
  }

  /**
   * Fold one sequence's substitutions into the graph
   *
   * Every substitution becomes a node and every unordered pair gains one
   * unit of weight. Repeats within the list count once, so weights count
   * sequences, not occurrences.
   */
  addSequence(substitutions: readonly Substitution[]): void {
    const keys = new Set<string>();
    for (const substitution of substitutions) {
      keys.add(this.addSubstitution(substitution));
    }

    const distinct = [...keys];
    for (let i = 0; i < distinct.length - 1; i++) {
      for (let j = i + 1; j < distinct.length; j++) {
        const a = distinct[i];
        const b = distinct[j];
        if (a !== undefined && b !== undefined) {
          this.incrementEdge(a, b, 1);
        }
      }
    }
  }

  /**
   * Union another graph's nodes into this one and add its edge weights
   *
   * Merging partial graphs built from disjoint sequence batches yields the
   * same graph as adding every sequence to one graph.
   */
  merge(other: CooccurrenceGraph): this {
    for (const substitution of other.substitutions()) {
      this.addSubstitution(substitution);
    }
    for (const edge of other.edges()) {
      this.incrementEdge(substitutionKey(edge.source), substitutionKey(edge.target), edge.weight);
    }
    return this;
  }

  hasSubstitution(substitution: Substitution): boolean {
    return this.graph.hasNode(substitutionKey(substitution));
  }

  /**
   * Co-occurrence count of two substitutions; 0 when they share no edge
   */
  weight(a: Substitution, b: Substitution): number {
    const edge = this.findEdge(a, b);
    return edge === undefined ? 0 : this.graph.getEdgeAttribute(edge, "weight");
  }

  /**
   * Number of edges incident to a substitution; 0 when it is absent
   */
  degree(substitution: Substitution): number {
    const key = substitutionKey(substitution);
    return this.graph.hasNode(key) ? this.graph.degree(key) : 0;
  }

  /**
   * Substitutions in insertion order
   */
  substitutions(): Substitution[] {
    return this.graph.mapNodes((_key, attributes) => attributes.substitution);
  }

  /**
   * Edges in insertion order, endpoints as first inserted
   */
  edges(): CooccurrenceEdge[] {
    return this.graph.mapEdges(
      (_edge, attributes, _source, _target, sourceAttributes, targetAttributes) => ({
        source: sourceAttributes.substitution,
        target: targetAttributes.substitution,
        weight: attributes.weight,
      })
    );
  }

  /**
   * @returns Whether an edge was removed
   */
  removeEdge(a: Substitution, b: Substitution): boolean {
    const edge = this.findEdge(a, b);
    if (edge === undefined) return false;
    this.graph.dropEdge(edge);
    return true;
  }

  /**
   * Remove a substitution and every edge incident to it
   *
   * @returns Whether the node existed
   */
  removeSubstitution(substitution: Substitution): boolean {
    const key = substitutionKey(substitution);
    if (!this.graph.hasNode(key)) return false;
    this.graph.dropNode(key);
    return true;
  }

  private findEdge(a: Substitution, b: Substitution): string | undefined {
    const source = substitutionKey(a);
    const target = substitutionKey(b);
    if (!this.graph.hasNode(source) || !this.graph.hasNode(target)) return undefined;
    return this.graph.edge(source, target);
  }

  private incrementEdge(source: string, target: string, amount: number): void {
    const edge = this.graph.edge(source, target);
    if (edge === undefined) {
      this.graph.addEdge(source, target, { weight: amount });
    } else {
      const weight = this.graph.getEdgeAttribute(edge, "weight");
      this.graph.setEdgeAttribute(edge, "weight", weight + amount);
    }
  }
}

// =============================================================================
// BUILDERS
// =============================================================================

/**
 * Build a graph from per-sequence substitution lists
 */
export function buildCooccurrenceGraph(
  substitutionLists: Iterable<readonly Substitution[]>
): CooccurrenceGraph {
  const graph = new CooccurrenceGraph();
  for (const substitutions of substitutionLists) {
    graph.addSequence(substitutions);
  }
  return graph;
}

/**
 * Reduce partial graphs into one by summing edge weights
 */
export function mergeCooccurrenceGraphs(graphs: Iterable<CooccurrenceGraph>): CooccurrenceGraph {
  const merged = new CooccurrenceGraph();
  for (const graph of graphs) {
    merged.merge(graph);
  }
  return merged;
}

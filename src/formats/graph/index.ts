/**
 * @module formats/graph
 * @description Serializers for pruned co-occurrence graphs
 */

import type { CooccurrenceGraph } from "../../operations/cooccurrence";
import { DotWriter } from "./dot";
import { EdgeListWriter } from "./edge-list";

export type GraphFormat = "dot" | "tsv";

export const GRAPH_FORMATS: readonly GraphFormat[] = ["dot", "tsv"];

export function formatGraph(
  graph: CooccurrenceGraph,
  format: GraphFormat,
  options: { totalSequences: number }
): string {
  switch (format) {
    case "dot":
      return new DotWriter().format(graph);
    case "tsv":
      return new EdgeListWriter().format(graph, options);
  }
}

export { DotWriter, quoteDotId } from "./dot";
export { EDGE_LIST_COLUMNS, type EdgeListOptions, EdgeListWriter } from "./edge-list";

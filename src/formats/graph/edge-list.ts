/**
 * Tab-separated edge list, the layout Gephi's spreadsheet importer reads
 */

import type { CooccurrenceGraph } from "../../operations/cooccurrence";
import { substitutionLabel } from "../../operations/substitutions";

export const EDGE_LIST_COLUMNS = ["source", "target", "weight", "frequency"] as const;

export interface EdgeListOptions {
  /** Denominator of the frequency column */
  totalSequences: number;
}

export class EdgeListWriter {
  /**
   * Render one header row plus one row per edge, frequency to six places
   */
  format(graph: CooccurrenceGraph, options: EdgeListOptions): string {
    const rows: string[] = [EDGE_LIST_COLUMNS.join("\t")];

    for (const edge of graph.edges()) {
      const frequency = options.totalSequences > 0 ? edge.weight / options.totalSequences : 0;
      rows.push(
        [
          substitutionLabel(edge.source),
          substitutionLabel(edge.target),
          String(edge.weight),
          frequency.toFixed(6),
        ].join("\t")
      );
    }

    return `${rows.join("\n")}\n`;
  }
}

/**
 * Graphviz DOT rendering of a co-occurrence graph
 *
 * Nodes are numbered from 0 in graph iteration order and labelled with the
 * mutation label. Each edge carries its support both as the display label
 * and as a numeric `weight` attribute, which Gephi imports as edge weight.
 *
 * @example Output
 * ```
 * graph {
 *     0 [ label = "D3E" ]
 *     1 [ label = "K5R" ]
 *     0 -- 1 [ label = "7", weight = 7 ]
 * }
 * ```
 */

import type { CooccurrenceGraph } from "../../operations/cooccurrence";
import { substitutionKey, substitutionLabel } from "../../operations/substitutions";

const INDENT = "    ";

/**
 * Quote a DOT ID, escaping embedded quotes and backslashes
 */
export function quoteDotId(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export class DotWriter {
  /**
   * Render the whole graph as one DOT document ending in a newline
   */
  format(graph: CooccurrenceGraph): string {
    const lines: string[] = ["graph {"];
    const ids = new Map<string, number>();

    for (const substitution of graph.substitutions()) {
      const id = ids.size;
      ids.set(substitutionKey(substitution), id);
      lines.push(`${INDENT}${id} [ label = ${quoteDotId(substitutionLabel(substitution))} ]`);
    }

    for (const edge of graph.edges()) {
      const source = ids.get(substitutionKey(edge.source));
      const target = ids.get(substitutionKey(edge.target));
      if (source === undefined || target === undefined) continue;
      lines.push(
        `${INDENT}${source} -- ${target} [ label = ${quoteDotId(String(edge.weight))}, weight = ${edge.weight} ]`
      );
    }

    lines.push("}");
    return `${lines.join("\n")}\n`;
  }
}

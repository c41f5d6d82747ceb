import { describe, expect, test } from "vitest";
import { DotWriter, EdgeListWriter, formatGraph, quoteDotId } from "../../src/formats/graph";
import { buildCooccurrenceGraph, CooccurrenceGraph } from "../../src/operations/cooccurrence";
import { createSubstitution } from "../../src/operations/substitutions";

const d3e = createSubstitution(2, "D", "E");
const k5r = createSubstitution(4, "K", "R");
const m1gap = createSubstitution(0, "M", "-");

function sampleGraph(): CooccurrenceGraph {
  return buildCooccurrenceGraph([[d3e, k5r], [d3e, k5r], [d3e, m1gap]]);
}

describe("Graph output", () => {
  describe("quoteDotId", () => {
    test("escapes quotes and backslashes", () => {
      expect(quoteDotId("D3E")).toBe('"D3E"');
      expect(quoteDotId('a"b\\c')).toBe('"a\\"b\\\\c"');
    });
  });

  describe("DotWriter", () => {
    test("numbers nodes in order and carries weights as attributes", () => {
      expect(new DotWriter().format(sampleGraph())).toBe(
        [
          "graph {",
          '    0 [ label = "D3E" ]',
          '    1 [ label = "K5R" ]',
          '    2 [ label = "M1-" ]',
          '    0 -- 1 [ label = "2", weight = 2 ]',
          '    0 -- 2 [ label = "1", weight = 1 ]',
          "}",
          "",
        ].join("\n")
      );
    });

    test("renders an empty graph", () => {
      expect(new DotWriter().format(new CooccurrenceGraph())).toBe("graph {\n}\n");
    });
  });

  describe("EdgeListWriter", () => {
    test("writes one row per edge with frequency to six places", () => {
      expect(new EdgeListWriter().format(sampleGraph(), { totalSequences: 3 })).toBe(
        "source\ttarget\tweight\tfrequency\nD3E\tK5R\t2\t0.666667\nD3E\tM1-\t1\t0.333333\n"
      );
    });

    test("writes only the header for an empty graph", () => {
      expect(new EdgeListWriter().format(new CooccurrenceGraph(), { totalSequences: 0 })).toBe(
        "source\ttarget\tweight\tfrequency\n"
      );
    });
  });

  describe("formatGraph", () => {
    test("dispatches on the format name", () => {
      const graph = sampleGraph();
      expect(formatGraph(graph, "dot", { totalSequences: 3 })).toBe(new DotWriter().format(graph));
      expect(formatGraph(graph, "tsv", { totalSequences: 3 })).toBe(
        new EdgeListWriter().format(graph, { totalSequences: 3 })
      );
    });
  });
});

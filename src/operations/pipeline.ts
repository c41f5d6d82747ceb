/**
 * End-to-end co-occurrence graph construction
 *
 * Runs the phases strictly in sequence: conservation over the whole set,
 * substitution extraction per sequence, graph accumulation, then pruning.
 * With `batchSize`, extraction and accumulation run per batch into partial
 * graphs that are merged afterwards, which is the shape a worker pool
 * would use; the result is identical to the single-graph build.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { AlignedSequence } from "../types";
import type { ConservationDiagnostic, ConservationResult } from "./conservation";
import { analyzeConservation } from "./conservation";
import { buildCooccurrenceGraph, type CooccurrenceGraph, mergeCooccurrenceGraphs } from "./cooccurrence";
import { type PruneSummary, pruneGraph } from "./pruning";
import { extractSubstitutions, type Substitution } from "./substitutions";

export interface PipelineOptions {
  conservationThreshold?: number;
  minimumSupport?: number;
  minimumFrequency?: number;
  /** Sequences per partial graph; omit to accumulate into one graph */
  batchSize?: number;
  onDiagnostic?: (diagnostic: ConservationDiagnostic) => void;
}

export interface PipelineResult {
  /** The pruned graph */
  readonly graph: CooccurrenceGraph;
  readonly conservation: ConservationResult;
  /** Substitutions per input sequence, in input order */
  readonly substitutionLists: readonly (readonly Substitution[])[];
  readonly prune: PruneSummary;
  readonly totalSequences: number;
}

const BatchSizeSchema = type("number >= 1");

/**
 * Build and prune the co-occurrence graph for a set of aligned sequences
 *
 * @throws {ValidationError} On out-of-range thresholds or batch size
 */
export function runPipeline(
  sequences: readonly AlignedSequence[],
  reference: AlignedSequence,
  options: PipelineOptions = {}
): PipelineResult {
  const conservation = analyzeConservation(sequences, {
    conservationThreshold: options.conservationThreshold,
    onDiagnostic: options.onDiagnostic,
  });

  const substitutionLists = sequences.map((sequence) =>
    extractSubstitutions(sequence, reference, conservation.variablePositions)
  );

  const graph =
    options.batchSize === undefined
      ? buildCooccurrenceGraph(substitutionLists)
      : mergeCooccurrenceGraphs(
          chunk(substitutionLists, validateBatchSize(options.batchSize)).map((batch) =>
            buildCooccurrenceGraph(batch)
          )
        );

  const prune = pruneGraph(graph, {
    minimumSupport: options.minimumSupport,
    minimumFrequency: options.minimumFrequency,
    totalSequences: sequences.length,
  });

  return {
    graph,
    conservation,
    substitutionLists,
    prune,
    totalSequences: sequences.length,
  };
}

function validateBatchSize(batchSize: number): number {
  const validation = BatchSizeSchema(batchSize);
  if (validation instanceof type.errors || !Number.isInteger(batchSize)) {
    throw new ValidationError(`Invalid batch size: ${batchSize} (expected an integer >= 1)`);
  }
  return batchSize;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

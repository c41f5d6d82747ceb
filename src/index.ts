/**
 * convergraph - amino-acid substitution co-occurrence graphs
 *
 * Finds the variable positions of a protein alignment, records which
 * substitutions relative to a reference each sequence carries, and links
 * substitutions that travel together often enough to matter.
 */

// Errors
export {
  ConfigError,
  ConvergraphError,
  DSVParseError,
  FileError,
  ParseError,
  ValidationError,
} from "./errors";

// Core types
export type {
  AlignedSequence,
  AlignmentColumn,
  AlignmentRecord,
  FileMetadata,
  FilePath,
  FileReaderOptions,
  ParserOptions,
} from "./types";
export { ALIGNMENT_COLUMNS } from "./types";

// Configuration
export { type ConvergraphConfig, DEFAULT_CONFIG, resolveConfig } from "./config";

// Alphabet
export {
  ALPHABET_SIZE,
  binToSymbol,
  codeToBin,
  ELSE_BIN,
  GAP_BIN,
  STOP_BIN,
  symbolToBin,
} from "./operations/core/alphabet";

// Analysis
export {
  analyzeConservation,
  buildPositionCounts,
  type ConservationDiagnostic,
  type ConservationOptions,
  type ConservationResult,
  DEFAULT_CONSERVATION_THRESHOLD,
  formatDiagnostic,
  majorityBin,
  type PositionCountTable,
} from "./operations/conservation";
export {
  compareSubstitutions,
  createSubstitution,
  extractSubstitutions,
  type Substitution,
  substitutionKey,
  substitutionLabel,
  substitutionsEqual,
} from "./operations/substitutions";
export {
  buildCooccurrenceGraph,
  type CooccurrenceEdge,
  CooccurrenceGraph,
  mergeCooccurrenceGraphs,
} from "./operations/cooccurrence";
export {
  DEFAULT_MINIMUM_FREQUENCY,
  DEFAULT_MINIMUM_SUPPORT,
  type EdgePruneOptions,
  type PruneSummary,
  pruneEdges,
  pruneGraph,
  pruneIsolatedNodes,
} from "./operations/pruning";
export { type PipelineOptions, type PipelineResult, runPipeline } from "./operations/pipeline";

// Input and output formats
export { AlignmentRecordParser, collectAlignments } from "./formats/dsv";
export { loadReference, parseReference } from "./formats/reference";
export { DotWriter, EdgeListWriter, formatGraph, type GraphFormat } from "./formats/graph";

// File I/O
export { FileReader } from "./io/file-reader";

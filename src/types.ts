/**
 * Core types and runtime schemas shared across convergraph modules
 */

import { type } from "arktype";

// =============================================================================
// SEQUENCE DATA
// =============================================================================

/**
 * One aligned amino-acid sequence, one residue symbol per alignment position
 */
export type AlignedSequence = string;

/**
 * The alignment columns of an input record, in their canonical order
 */
export const ALIGNMENT_COLUMNS = [
  "cds_id",
  "accession",
  "date_first_seen",
  "strain_count",
  "country_first_seen",
  "aa_aln",
  "cds_aln",
] as const;

export type AlignmentColumn = (typeof ALIGNMENT_COLUMNS)[number];

/**
 * One parsed input record. Only `aa_aln` feeds the graph; the remaining
 * columns are carried for callers that want them.
 */
export interface AlignmentRecord {
  readonly cds_id: string;
  readonly accession: string;
  readonly date_first_seen: string;
  readonly strain_count: string;
  readonly country_first_seen: string;
  readonly aa_aln: string;
  readonly cds_aln: string;
  /** Source line number for error reporting */
  readonly lineNumber: number;
}

// =============================================================================
// PARSER OPTIONS
// =============================================================================

/**
 * Options common to every input parser
 */
export interface ParserOptions {
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

// =============================================================================
// FILE I/O
// =============================================================================

/**
 * Branded file path, produced only by FilePathSchema
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

export interface FileReaderOptions {
  /** Maximum file size in bytes */
  maxFileSize?: number;
  /** Number of chunks the file stream buffers ahead of the consumer */
  bufferSize?: number;
}

export interface FileMetadata {
  readonly path: FilePath;
  readonly size: number;
  readonly lastModified: Date;
}

export const FilePathSchema = type("string>0").pipe((path: string): FilePath => {
  if (path.includes("\0")) {
    throw new Error("File paths cannot contain null characters");
  }
  if (/[<>"|*?]/.test(path)) {
    throw new Error("File path contains invalid characters");
  }
  return path as FilePath;
});

export const FileReaderOptionsSchema = type({
  "maxFileSize?": "number>0",
  "bufferSize?": "number>0",
});

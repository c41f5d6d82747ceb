/**
 * @module formats/dsv/parser
 * @description Streaming parser for tab-delimited alignment records
 *
 * Reads records carrying an `aa_aln` column, either by header name or by the
 * canonical positional layout. Any malformed row aborts the parse: a skipped
 * record would silently skew the per-position conservation statistics.
 */

// =============================================================================
// IMPORTS
// =============================================================================

import { type } from "arktype";
import { ConvergraphError, DSVParseError, FileError, ValidationError } from "../../errors";
import { createStream } from "../../io/file-reader";
import type { AlignedSequence, AlignmentRecord } from "../../types";
import { AbstractParser } from "../abstract-parser";
import {
  ALIGNMENT_COLUMN,
  DEFAULT_DELIMITER,
  DEFAULT_QUOTE,
  POSITIONAL_COLUMNS,
} from "./constants";
import { parseDelimitedRow } from "./state-machine";
import type { DSVParserOptions, DSVParserState } from "./types";
import { removeBOM, splitCompleteLines } from "./utils";
import { DSVParserOptionsSchema, validateFieldSize } from "./validation";

// =============================================================================
// CLASSES - MAIN PARSER
// =============================================================================

/**
 * AlignmentRecordParser - TSV reader for aligned protein records
 *
 * @example
 * ```typescript
 * const parser = new AlignmentRecordParser({ hasHeader: true });
 * for await (const record of parser.parseFile("alignments.tsv")) {
 *   console.log(record.accession, record.aa_aln.length);
 * }
 * ```
 */
export class AlignmentRecordParser extends AbstractParser<AlignmentRecord, DSVParserOptions> {
  private readonly delimiter: string;
  private readonly quote: string;
  private readonly hasHeader: boolean;

  protected getDefaultOptions(): Partial<DSVParserOptions> {
    return {
      delimiter: DEFAULT_DELIMITER,
      quote: DEFAULT_QUOTE,
      hasHeader: false,
    };
  }

  constructor(options: DSVParserOptions = {}) {
    const validation = DSVParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid alignment parser options: ${validation.summary}`);
    }

    super(options);

    this.delimiter = this.options.delimiter ?? DEFAULT_DELIMITER;
    this.quote = this.options.quote ?? DEFAULT_QUOTE;
    this.hasHeader = this.options.hasHeader ?? false;
  }

  getFormatName(): string {
    return this.delimiter === "\t" ? "TSV" : "DSV";
  }

  /**
   * Parse alignment records from a file path
   */
  async *parseFile(path: string): AsyncIterable<AlignmentRecord> {
    let stream: ReadableStream<Uint8Array>;
    try {
      stream = await createStream(path);
    } catch (error) {
      if (error instanceof ConvergraphError) throw error;
      throw FileError.fromSystemError("read", path, error);
    }
    yield* this.parse(stream);
  }

  /**
   * Parse alignment records from an in-memory string
   */
  async *parseString(data: string): AsyncIterable<AlignmentRecord> {
    const state = this.createInitialState();
    yield* this.processLines(removeBOM(data).split(/\r?\n/), state);
  }

  /**
   * Parse alignment records from a byte stream without buffering it whole
   */
  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<AlignmentRecord> {
    const reader = stream.getReader();
    const decoder = new TextDecoder();
    const state = this.createInitialState();
    let buffer = "";
    let firstChunk = true;
    let completed = false;

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        buffer += decoder.decode(value, { stream: true });
        if (firstChunk && buffer.length > 0) {
          buffer = removeBOM(buffer);
          firstChunk = false;
        }

        const { lines, rest } = splitCompleteLines(buffer);
        buffer = rest;
        yield* this.processLines(lines, state);
      }

      buffer += decoder.decode();
      if (buffer.length > 0) {
        yield* this.processLines([buffer], state);
      }
      completed = true;
    } finally {
      // Stopped early: release the source, or an open stdin pipe keeps the process running
      if (!completed) {
        await reader.cancel();
      }
      reader.releaseLock();
    }
  }

  private createInitialState(): DSVParserState {
    return {
      currentLineNumber: 1,
      columns: null,
      alignmentIndex: -1,
    };
  }

  private *processLines(lines: string[], state: DSVParserState): Iterable<AlignmentRecord> {
    for (const line of lines) {
      const lineNumber = state.currentLineNumber++;
      this.throwIfAborted("record parsing");

      if (line.trim() === "") continue;

      const fields = parseDelimitedRow(line, this.delimiter, this.quote, lineNumber);
      for (const field of fields) {
        validateFieldSize(field, lineNumber);
      }

      if (state.columns === null) {
        if (this.hasHeader) {
          this.acceptHeader(fields, state, lineNumber);
          continue;
        }
        if (fields.includes(ALIGNMENT_COLUMN)) {
          this.warn(
            `first row looks like a header but headers are disabled; it is read as data`,
            lineNumber
          );
        }
        state.columns = POSITIONAL_COLUMNS;
        state.alignmentIndex = POSITIONAL_COLUMNS.indexOf(ALIGNMENT_COLUMN);
      }

      yield this.createRecord(fields, state, lineNumber);
    }
  }

  private acceptHeader(fields: string[], state: DSVParserState, lineNumber: number): void {
    const columns = fields.map((field) => field.trim());
    const alignmentIndex = columns.indexOf(ALIGNMENT_COLUMN);
    if (alignmentIndex < 0) {
      throw new DSVParseError(
        `Input is missing the required "${ALIGNMENT_COLUMN}" header`,
        lineNumber
      );
    }
    state.columns = columns;
    state.alignmentIndex = alignmentIndex;
  }

  private createRecord(
    fields: string[],
    state: DSVParserState,
    lineNumber: number
  ): AlignmentRecord {
    const columns = state.columns ?? POSITIONAL_COLUMNS;
    if (fields.length !== columns.length) {
      throw new DSVParseError(
        `Row has ${fields.length} fields, expected ${columns.length}`,
        lineNumber
      );
    }

    const field = (name: string): string => {
      const index = columns.indexOf(name);
      return index < 0 ? "" : (fields[index] ?? "");
    };

    return {
      cds_id: field("cds_id"),
      accession: field("accession"),
      date_first_seen: field("date_first_seen"),
      strain_count: field("strain_count"),
      country_first_seen: field("country_first_seen"),
      aa_aln: fields[state.alignmentIndex] ?? "",
      cds_aln: field("cds_aln"),
      lineNumber,
    };
  }
}

// =============================================================================
// CONVENIENCE
// =============================================================================

/**
 * Collect the aligned amino-acid sequences from a record stream, in input order
 */
export async function collectAlignments(
  records: AsyncIterable<AlignmentRecord>
): Promise<AlignedSequence[]> {
  const sequences: AlignedSequence[] = [];
  for await (const record of records) {
    sequences.push(record.aa_aln);
  }
  return sequences;
}

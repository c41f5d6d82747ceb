/**
 * @module formats/dsv
 * @description Tab-delimited alignment record input
 *
 * @example
 * ```typescript
 * import { AlignmentRecordParser, collectAlignments } from './formats/dsv';
 *
 * const parser = new AlignmentRecordParser({ hasHeader: true });
 * const sequences = await collectAlignments(parser.parseFile('alignments.tsv'));
 * ```
 */

export type { DSVParserOptions, DSVParserState } from "./types";
export { DSVParseState } from "./types";

export { AlignmentRecordParser, collectAlignments } from "./parser";
export { parseDelimitedRow } from "./state-machine";
export { removeBOM, splitCompleteLines } from "./utils";
export { DSVParserOptionsSchema, validateFieldSize } from "./validation";
export {
  ALIGNMENT_COLUMN,
  DEFAULT_DELIMITER,
  DEFAULT_QUOTE,
  MAX_FIELD_SIZE,
  POSITIONAL_COLUMNS,
} from "./constants";

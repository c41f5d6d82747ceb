/**
 * @module formats/dsv/validation
 * @description ArkType schema for parser options and field size checks
 */

import { type } from "arktype";
import { DSVParseError } from "../../errors";
import { MAX_FIELD_SIZE } from "./constants";

/**
 * Validate that a field doesn't exceed the maximum allowed size
 *
 * @throws {DSVParseError} if field exceeds size limit
 */
export function validateFieldSize(
  field: string,
  lineNumber?: number,
  maxSize: number = MAX_FIELD_SIZE
): void {
  // UTF-16 length bounds the UTF-8 size from below; alignments are ASCII anyway
  if (field.length > maxSize) {
    throw new DSVParseError(
      `Field size (${field.length} characters) exceeds maximum allowed (${maxSize})`,
      lineNumber
    );
  }
}

export const DSVParserOptionsSchema = type({
  "delimiter?": "string",
  "quote?": "string",
  "hasHeader?": "boolean",
}).narrow((options, ctx) => {
  if (options.delimiter !== undefined && options.delimiter.length !== 1) {
    return ctx.reject({
      path: ["delimiter"],
      expected: "single character delimiter",
      actual: `${options.delimiter.length} characters`,
    });
  }

  if (options.quote !== undefined && options.quote === options.delimiter) {
    return ctx.reject({
      path: ["quote", "delimiter"],
      expected: "different quote and delimiter characters",
      actual: "same character for both",
    });
  }

  return true;
});

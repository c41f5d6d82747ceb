/**
 * Row tokenizer
 *
 * Splits one line into fields, honoring RFC 4180 double-quoting. Alignment
 * TSVs never carry multi-line fields, so an unclosed quote is an error.
 */

import { DSVParseError } from "../../errors";
import { DSVParseState } from "./types";

/**
 * Parse one delimited row into fields
 *
 * @throws {DSVParseError} On an unclosed quoted field
 */
export function parseDelimitedRow(
  line: string,
  delimiter: string = "\t",
  quote: string = '"',
  lineNumber?: number
): string[] {
  const fields: string[] = [];
  let currentField = "";
  let state = DSVParseState.FIELD_START;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);

    switch (state) {
      case DSVParseState.FIELD_START:
        if (char === quote) {
          state = DSVParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          currentField = char;
          state = DSVParseState.UNQUOTED_FIELD;
        }
        break;

      case DSVParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = DSVParseState.FIELD_START;
        } else {
          currentField += char;
        }
        break;

      case DSVParseState.QUOTED_FIELD:
        if (char === quote) {
          state = DSVParseState.QUOTE_IN_QUOTED;
        } else {
          currentField += char;
        }
        break;

      case DSVParseState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = DSVParseState.FIELD_START;
        } else if (char === quote) {
          // doubled quote
          currentField += quote;
          state = DSVParseState.QUOTED_FIELD;
        } else {
          // Lenient: text after a closing quote joins the field
          currentField += char;
          state = DSVParseState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  if (state === DSVParseState.QUOTED_FIELD) {
    throw new DSVParseError("Unclosed quote in field", lineNumber, fields.length + 1);
  }
  if (state === DSVParseState.UNQUOTED_FIELD || state === DSVParseState.QUOTE_IN_QUOTED) {
    fields.push(currentField);
  } else if (line.endsWith(delimiter)) {
    // Trailing delimiter means empty final field
    fields.push("");
  }

  return fields;
}

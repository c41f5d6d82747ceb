/**
 * Reference sequence loading
 *
 * The reference defines the alignment coordinate system and the ancestral
 * residue at each position. It may be a bare sequence (optionally wrapped
 * over several lines) or a single-record FASTA file.
 */

import { ParseError } from "../errors";
import { readToString } from "../io/file-reader";
import type { AlignedSequence } from "../types";

/**
 * Parse reference text into one gapped-or-ungapped sequence
 *
 * Whitespace is never part of a residue, so line breaks, carriage returns
 * and spaces are all dropped.
 *
 * @throws {ParseError} If the text holds no residues or more than one FASTA record
 *
 * @example
 * ```typescript
 * parseReference("MADE\nKLV\n");           // "MADEKLV"
 * parseReference(">ref wuhan\nMAD\nEK\n"); // "MADEK"
 * ```
 */
export function parseReference(text: string): AlignedSequence {
  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);
  const firstContent = lines.findIndex((line) => line.trim() !== "");

  if (firstContent < 0) {
    throw new ParseError("Reference file is empty", "reference");
  }

  const isFasta = lines[firstContent]?.trimStart().startsWith(">") === true;
  const sequenceLines: string[] = [];

  for (let i = firstContent; i < lines.length; i++) {
    const line = lines[i] ?? "";
    if (isFasta && line.trimStart().startsWith(">")) {
      if (i !== firstContent) {
        throw new ParseError(
          "Reference FASTA must contain exactly one record",
          "reference",
          i + 1
        );
      }
      continue;
    }
    sequenceLines.push(line.replace(/\s+/g, ""));
  }

  const reference = sequenceLines.join("");
  if (reference.length === 0) {
    throw new ParseError("Reference sequence is empty", "reference");
  }
  return reference;
}

/**
 * Read and parse the reference sequence file
 *
 * @throws {FileError} If the file is missing or unreadable
 * @throws {ParseError} If the contents are not a single sequence
 */
export async function loadReference(path: string): Promise<AlignedSequence> {
  return parseReference(await readToString(path));
}

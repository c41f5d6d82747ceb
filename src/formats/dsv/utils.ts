/**
 * Alignment TSV utility functions
 */

/**
 * Remove a UTF-8 Byte Order Mark from the start of text
 */
export function removeBOM(text: string): string {
  if (text.charCodeAt(0) === 0xfeff) {
    return text.slice(1);
  }
  return text;
}

/**
 * Split buffered text into complete lines, returning the trailing partial
 * line separately so chunked input can resume where it stopped
 */
export function splitCompleteLines(buffer: string): { lines: string[]; rest: string } {
  const lines = buffer.split(/\r?\n/);
  const rest = lines.pop() ?? "";
  return { lines, rest };
}

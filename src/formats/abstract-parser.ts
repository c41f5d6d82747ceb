/**
 * Abstract base parser with shared interrupt handling only
 *
 * Gives every input parser the same AbortSignal support and option merging
 * without imposing parsing implementation details.
 */

import { ParseError } from "../errors";
import type { ParserOptions } from "../types";

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions;
  protected readonly signal: AbortSignal | undefined;
  protected readonly warn: (warning: string, lineNumber?: number) => void;

  constructor(options: TOptions) {
    // Merge in order: format-specific defaults -> user options
    this.options = { ...this.getDefaultOptions(), ...options };
    this.signal = this.options.signal;
    this.warn =
      this.options.onWarning ??
      ((warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber ?? "?"}): ${warning}`);
      });
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Throw with context if the caller aborted parsing
   *
   * @throws {ParseError} If the signal has fired
   */
  protected throwIfAborted(context: string): void {
    if (this.signal?.aborted === true) {
      throw new ParseError(
        `Operation aborted during ${this.getFormatName()} ${context}`,
        "ABORTED"
      );
    }
  }

  abstract parseString(data: string): AsyncIterable<T>;

  abstract parseFile(filePath: string): AsyncIterable<T>;

  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format name for error messages and logging
   */
  protected abstract getFormatName(): string;
}

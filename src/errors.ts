/**
 * Error handling for co-occurrence graph construction
 *
 * Every fatal condition in a run surfaces as a subclass of ConvergraphError,
 * carrying a machine-readable code and, where one exists, the input line
 * that triggered it.
 */

/**
 * Base error class for all convergraph errors
 */
export class ConvergraphError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "ConvergraphError";
  }

  /**
   * Create a user-facing error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid option values passed to library functions
 */
export class ValidationError extends ConvergraphError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Bad or missing command-line configuration, raised before any processing
 */
export class ConfigError extends ConvergraphError {
  constructor(
    message: string,
    public readonly option?: string
  ) {
    super(message, "CONFIG_ERROR", undefined, option !== undefined ? `option: ${option}` : undefined);
    this.name = "ConfigError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends ConvergraphError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * DSV-specific parsing error with column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      column !== undefined && `column ${column}`,
      field !== undefined && `field "${field}"`,
    ]
      .filter(Boolean)
      .join(", ");

    super(context ? `${message} (${context})` : message, "TSV", line);
    this.name = "DSVParseError";
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends ConvergraphError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat" | "open",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = describeSystemError(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }
}

/**
 * Render an unknown thrown value, including Effect platform errors whose
 * message lives on `reason`/`description` rather than `message`
 */
function describeSystemError(systemError: unknown): string {
  if (systemError instanceof Error) {
    return systemError.message;
  }
  if (typeof systemError === "object" && systemError !== null) {
    const parts = ["reason", "description"]
      .map((key) => (key in systemError ? Reflect.get(systemError, key) : undefined))
      .filter((value): value is string => typeof value === "string" && value !== "");
    if (parts.length > 0) {
      return parts.join(": ");
    }
  }
  return String(systemError);
}

/**
 * Command-line front end
 *
 * Reads alignment records (stdin or --input), loads the reference, builds
 * and prunes the co-occurrence graph and prints it on stdout. Conservation
 * diagnostics go to stderr. Every failure is fatal: one message on stderr
 * and exit status 1.
 */

import { Readable } from "node:stream";
import { parseArgs } from "node:util";
import { type ConvergraphConfig, resolveConfig } from "./config";
import { ConfigError, ConvergraphError } from "./errors";
import { AlignmentRecordParser, collectAlignments } from "./formats/dsv";
import { formatGraph, GRAPH_FORMATS, type GraphFormat } from "./formats/graph";
import { loadReference } from "./formats/reference";
import { formatDiagnostic } from "./operations/conservation";
import { runPipeline } from "./operations/pipeline";

export const VERSION = "0.1.0";

export const USAGE = `convergraph ${VERSION}
Build an amino-acid substitution co-occurrence graph from aligned protein sequences.

Usage: convergraph --reference-file <path> [options] < records.tsv

Options:
  -r, --reference-file <path>                 Reference sequence (plain or single-record FASTA)
  -s, --minimum-coocurrence-support <int>     Minimum co-occurrence count per edge [default: 4]
  -f, --minimum-cooccurrence-frequency <real> Minimum co-occurrence frequency per edge [default: 0.1]
  -c, --conservation-threshold <real>         Majority frequency treated as conserved [default: 0.97]
  -q, --has-header                            First input row names the columns
  -i, --input <path>                          Read records from a file instead of stdin
  -o, --format <dot|tsv>                      Output format [default: dot]
      --quiet                                 Suppress diagnostics on stderr
  -h, --help                                  Print help
  -V, --version                               Print version
`;

/**
 * Process streams, injectable for tests
 */
export interface CliIO {
  stdin: () => ReadableStream<Uint8Array>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export function processIO(): CliIO {
  return {
    stdin: () => Readable.toWeb(process.stdin),
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  };
}

type ParsedCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "run"; config: ConvergraphConfig };

/**
 * Parse argv (without the node and script entries) into a command
 *
 * @throws {ConfigError} On unknown options, missing values or bad numbers
 */
export function parseCommandLine(argv: readonly string[]): ParsedCommand {
  const values = readOptions(argv);

  if (values.help === true) return { kind: "help" };
  if (values.version === true) return { kind: "version" };

  return {
    kind: "run",
    config: resolveConfig({
      referenceFile: values["reference-file"],
      inputFile: values.input,
      minimumSupport: parseNumber(values["minimum-coocurrence-support"], "minimum-coocurrence-support"),
      minimumFrequency: parseNumber(
        values["minimum-cooccurrence-frequency"],
        "minimum-cooccurrence-frequency"
      ),
      conservationThreshold: parseNumber(values["conservation-threshold"], "conservation-threshold"),
      hasHeader: values["has-header"],
      format: parseFormat(values.format),
      quiet: values.quiet,
    }),
  };
}

/**
 * Run the tool end to end
 *
 * @returns Process exit status
 */
export async function runCli(argv: readonly string[], io: CliIO = processIO()): Promise<number> {
  try {
    const command = parseCommandLine(argv);
    if (command.kind === "help") {
      io.stdout(USAGE);
      return 0;
    }
    if (command.kind === "version") {
      io.stdout(`convergraph ${VERSION}\n`);
      return 0;
    }

    const { config } = command;
    const reference = await loadReference(config.referenceFile);

    const parser = new AlignmentRecordParser({
      hasHeader: config.hasHeader,
      onWarning: (warning, lineNumber) => {
        io.stderr(`Warning (line ${lineNumber ?? "?"}): ${warning}\n`);
      },
    });
    const records =
      config.inputFile === undefined ? parser.parse(io.stdin()) : parser.parseFile(config.inputFile);
    const sequences = await collectAlignments(records);

    if (!config.quiet) {
      const alignmentLength = sequences.reduce((max, sequence) => Math.max(max, sequence.length), 0);
      io.stderr(`Data are ${sequences.length} x ${alignmentLength}\n`);
    }

    const result = runPipeline(sequences, reference, {
      conservationThreshold: config.conservationThreshold,
      minimumSupport: config.minimumSupport,
      minimumFrequency: config.minimumFrequency,
      onDiagnostic: config.quiet
        ? undefined
        : (diagnostic) => io.stderr(`${formatDiagnostic(diagnostic)}\n`),
    });

    io.stdout(formatGraph(result.graph, config.format, { totalSequences: result.totalSequences }));
    return 0;
  } catch (error) {
    if (error instanceof ConvergraphError) {
      io.stderr(`${error.toString()}\n`);
    } else {
      io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    }
    return 1;
  }
}

function readOptions(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        "reference-file": { type: "string", short: "r" },
        "minimum-coocurrence-support": { type: "string", short: "s" },
        "minimum-cooccurrence-frequency": { type: "string", short: "f" },
        "conservation-threshold": { type: "string", short: "c" },
        "has-header": { type: "boolean", short: "q" },
        input: { type: "string", short: "i" },
        format: { type: "string", short: "o" },
        quiet: { type: "boolean" },
        help: { type: "boolean", short: "h" },
        version: { type: "boolean", short: "V" },
      },
    }).values;
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
}

function parseNumber(raw: string | undefined, option: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new ConfigError(`Expected a number for --${option}, got "${raw}"`, option);
  }
  return value;
}

function parseFormat(raw: string | undefined): GraphFormat | undefined {
  if (raw === undefined) return undefined;
  const format = GRAPH_FORMATS.find((candidate) => candidate === raw);
  if (format === undefined) {
    throw new ConfigError(
      `Unknown output format "${raw}" (expected ${GRAPH_FORMATS.join(" or ")})`,
      "format"
    );
  }
  return format;
}

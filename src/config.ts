/**
 * Run configuration
 *
 * One validated object describes a run; the CLI maps its flags onto it and
 * library callers may build it directly with `resolveConfig`.
 */

import { type } from "arktype";
import { ConfigError } from "./errors";
import type { GraphFormat } from "./formats/graph";
import { DEFAULT_CONSERVATION_THRESHOLD } from "./operations/conservation";
import { DEFAULT_MINIMUM_FREQUENCY, DEFAULT_MINIMUM_SUPPORT } from "./operations/pruning";

export interface ConvergraphConfig {
  /** Path of the reference sequence file */
  referenceFile: string;
  /** Path of the alignment records; undefined reads standard input */
  inputFile: string | undefined;
  minimumSupport: number;
  minimumFrequency: number;
  conservationThreshold: number;
  hasHeader: boolean;
  format: GraphFormat;
  /** Suppress per-position diagnostics on stderr */
  quiet: boolean;
}

export const DEFAULT_CONFIG: Omit<ConvergraphConfig, "referenceFile"> = {
  inputFile: undefined,
  minimumSupport: DEFAULT_MINIMUM_SUPPORT,
  minimumFrequency: DEFAULT_MINIMUM_FREQUENCY,
  conservationThreshold: DEFAULT_CONSERVATION_THRESHOLD,
  hasHeader: false,
  format: "dot",
  quiet: false,
};

export const ConvergraphConfigSchema = type({
  referenceFile: "string>0",
  inputFile: "string>0|undefined",
  minimumSupport: "number>=1",
  minimumFrequency: "0<=number<=1",
  conservationThreshold: "0<number<=1",
  hasHeader: "boolean",
  format: '"dot"|"tsv"',
  quiet: "boolean",
}).narrow((config, ctx) => {
  if (!Number.isInteger(config.minimumSupport)) {
    return ctx.reject({
      path: ["minimumSupport"],
      expected: "an integer",
      actual: String(config.minimumSupport),
    });
  }
  return true;
});

/**
 * Merge a partial configuration over the defaults and validate it
 *
 * @throws {ConfigError} When the reference file is missing or a value is out of range
 */
export function resolveConfig(partial: Partial<ConvergraphConfig>): ConvergraphConfig {
  if (partial.referenceFile === undefined || partial.referenceFile === "") {
    throw new ConfigError("A reference file is required", "reference-file");
  }

  const merged: ConvergraphConfig = {
    referenceFile: partial.referenceFile,
    inputFile: partial.inputFile ?? DEFAULT_CONFIG.inputFile,
    minimumSupport: partial.minimumSupport ?? DEFAULT_CONFIG.minimumSupport,
    minimumFrequency: partial.minimumFrequency ?? DEFAULT_CONFIG.minimumFrequency,
    conservationThreshold: partial.conservationThreshold ?? DEFAULT_CONFIG.conservationThreshold,
    hasHeader: partial.hasHeader ?? DEFAULT_CONFIG.hasHeader,
    format: partial.format ?? DEFAULT_CONFIG.format,
    quiet: partial.quiet ?? DEFAULT_CONFIG.quiet,
  };

  const validation = ConvergraphConfigSchema(merged);
  if (validation instanceof type.errors) {
    throw new ConfigError(`Invalid configuration: ${validation.summary}`);
  }
  return merged;
}

import { spawn } from "node:child_process";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { type CliIO, parseCommandLine, runCli, USAGE, VERSION } from "../src/cli";
import { ConfigError } from "../src/errors";

const SEQUENCES = ["ACDEF", "GCHEF", "GCHEK", "GCDEK", "GCHEF", "ACHEK"];

function records(sequences: readonly string[]): string {
  return sequences.map((aa, i) => `cds${i + 1}\tACC${i + 1}\t2021-03-01\t1\tUSA\t${aa}\tATG\n`).join("");
}

interface CapturedIO extends CliIO {
  out: string[];
  err: string[];
}

function captureIO(input = ""): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdin: () =>
      new ReadableStream<Uint8Array>({
        start(controller) {
          if (input !== "") controller.enqueue(new TextEncoder().encode(input));
          controller.close();
        },
      }),
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  };
}

let dir: string;
const file = (name: string): string => join(dir, name);

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "convergraph-cli-"));
  writeFileSync(file("ref.fa"), ">reference\nACDEF\n");
  writeFileSync(
    file("records.tsv"),
    `cds_id\taccession\tdate_first_seen\tstrain_count\tcountry_first_seen\taa_aln\tcds_aln\n${records(SEQUENCES)}`
  );
  writeFileSync(file("no-aln.tsv"), "cds_id\taccession\nc1\tACC1\n");
  writeFileSync(file("mad.txt"), "MAD\n");
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("parseCommandLine", () => {
  test("recognizes help and version", () => {
    expect(parseCommandLine(["-h"])).toEqual({ kind: "help" });
    expect(parseCommandLine(["--help"])).toEqual({ kind: "help" });
    expect(parseCommandLine(["-V"])).toEqual({ kind: "version" });
  });

  test("maps every flag onto the configuration", () => {
    const command = parseCommandLine([
      "-r",
      "ref.fa",
      "-s",
      "2",
      "-f",
      "0.2",
      "-c",
      "0.9",
      "-q",
      "-i",
      "in.tsv",
      "-o",
      "tsv",
      "--quiet",
    ]);

    expect(command).toEqual({
      kind: "run",
      config: {
        referenceFile: "ref.fa",
        inputFile: "in.tsv",
        minimumSupport: 2,
        minimumFrequency: 0.2,
        conservationThreshold: 0.9,
        hasHeader: true,
        format: "tsv",
        quiet: true,
      },
    });
  });

  test("accepts the long option names", () => {
    const command = parseCommandLine([
      "--reference-file=ref.fa",
      "--minimum-coocurrence-support=3",
      "--minimum-cooccurrence-frequency=0.05",
      "--conservation-threshold=0.5",
      "--has-header",
    ]);

    expect(command.kind === "run" && command.config.minimumSupport).toBe(3);
    expect(command.kind === "run" && command.config.minimumFrequency).toBe(0.05);
    expect(command.kind === "run" && command.config.hasHeader).toBe(true);
  });

  test("rejects bad input before any processing", () => {
    expect(() => parseCommandLine([])).toThrow("A reference file is required");
    expect(() => parseCommandLine(["-r", "ref.fa", "--bogus"])).toThrow(ConfigError);
    expect(() => parseCommandLine(["-r", "ref.fa", "extra"])).toThrow(ConfigError);
    expect(() => parseCommandLine(["-r", "ref.fa", "-s", "abc"])).toThrow(
      'Expected a number for --minimum-coocurrence-support, got "abc"'
    );
    expect(() => parseCommandLine(["-r", "ref.fa", "-o", "json"])).toThrow(
      'Unknown output format "json" (expected dot or tsv)'
    );
    expect(() => parseCommandLine(["-r", "ref.fa", "-c", "0"])).toThrow("Invalid configuration");
  });
});

describe("runCli", () => {
  test("prints help and version", async () => {
    const io = captureIO();
    expect(await runCli(["--help"], io)).toBe(0);
    expect(await runCli(["--version"], io)).toBe(0);
    expect(io.out).toEqual([USAGE, `convergraph ${VERSION}\n`]);
  });

  test("writes the graph as DOT and diagnostics to stderr", async () => {
    const io = captureIO(records(SEQUENCES));
    const status = await runCli(["-r", file("ref.fa"), "-s", "2"], io);

    expect(status).toBe(0);
    expect(io.out.join("")).toBe(
      [
        "graph {",
        '    0 [ label = "A1G" ]',
        '    1 [ label = "D3H" ]',
        '    2 [ label = "F5K" ]',
        '    0 -- 1 [ label = "3", weight = 3 ]',
        '    0 -- 2 [ label = "2", weight = 2 ]',
        '    1 -- 2 [ label = "2", weight = 2 ]',
        "}",
        "",
      ].join("\n")
    );
    expect(io.err).toEqual([
      "Data are 6 x 5\n",
      "0001 / G: 0.6667 (6)\n",
      "0003 / H: 0.6667 (6)\n",
      "0005 / F: 0.5000 (6)\n",
    ]);
  });

  test("reads a headed file and writes an edge list quietly", async () => {
    const io = captureIO();
    const status = await runCli(
      ["-r", file("ref.fa"), "-i", file("records.tsv"), "-q", "-s", "3", "-o", "tsv", "--quiet"],
      io
    );

    expect(status).toBe(0);
    expect(io.out.join("")).toBe("source\ttarget\tweight\tfrequency\nA1G\tD3H\t3\t0.500000\n");
    expect(io.err).toEqual([]);
  });

  test("default thresholds prune a small data set to nothing", async () => {
    const io = captureIO(records(SEQUENCES));
    expect(await runCli(["-r", file("ref.fa"), "--quiet"], io)).toBe(0);
    expect(io.out.join("")).toBe("graph {\n}\n");
  });

  test("warns on stderr when a header row arrives without -q", async () => {
    const io = captureIO();
    expect(await runCli(["-r", file("ref.fa"), "-i", file("records.tsv"), "--quiet"], io)).toBe(0);
    expect(io.err).toEqual([
      "Warning (line 1): first row looks like a header but headers are disabled; it is read as data\n",
    ]);
  });

  test("fails with one message when the reference is missing", async () => {
    const io = captureIO(records(SEQUENCES));
    const missing = file("missing.fa");

    expect(await runCli(["-r", missing], io)).toBe(1);
    expect(io.out).toEqual([]);
    expect(io.err).toEqual([`FileError: File does not exist or is not a regular file: ${missing}\n`]);
  });

  test("fails when the header has no aa_aln column", async () => {
    const io = captureIO();
    expect(await runCli(["-r", file("ref.fa"), "-i", file("no-aln.tsv"), "-q"], io)).toBe(1);
    expect(io.err).toEqual(['DSVParseError: Input is missing the required "aa_aln" header (line 1)\n']);
  });

  test("fails on a malformed row", async () => {
    const io = captureIO(`${records(["MAD"])}c2\tACC2\tMAE\n`);
    expect(await runCli(["-r", file("ref.fa")], io)).toBe(1);
    expect(io.err).toEqual(["DSVParseError: Row has 3 fields, expected 7 (line 2)\n"]);
  });

  test("reports configuration errors with the option name", async () => {
    const io = captureIO();
    expect(await runCli(["-r", file("ref.fa"), "-s", "x"], io)).toBe(1);
    expect(io.err).toEqual([
      'ConfigError: Expected a number for --minimum-coocurrence-support, got "x"\nContext: option: minimum-coocurrence-support\n',
    ]);
  });
});

const PROJECT_ROOT = fileURLToPath(new URL("..", import.meta.url));
const BIN = fileURLToPath(new URL("../src/bin.ts", import.meta.url));
const PROCESS_TIMEOUT_MS = 15_000;

interface BinResult {
  status: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Run the installed entry point under Node with tsx, the way the `bin` does
 */
function runBin(args: readonly string[], input: string, closeStdin: boolean): Promise<BinResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(process.execPath, ["--import", "tsx", BIN, ...args], {
      cwd: PROJECT_ROOT,
      env: { ...process.env, NODE_NO_WARNINGS: "1" },
      stdio: ["pipe", "pipe", "pipe"],
    });
    let stdout = "";
    let stderr = "";
    let status: number | null = null;

    child.stdout.setEncoding("utf8").on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.setEncoding("utf8").on("data", (chunk: string) => {
      stderr += chunk;
    });

    const timer = setTimeout(() => {
      child.kill();
      reject(new Error(`convergraph still running after ${PROCESS_TIMEOUT_MS}ms`));
    }, PROCESS_TIMEOUT_MS);

    child.on("error", reject);
    child.on("exit", (code) => {
      clearTimeout(timer);
      status = code;
      child.stdin.destroy();
    });
    child.on("close", () => resolve({ status, stdout, stderr }));

    child.stdin.on("error", () => {
      // the child may exit before reading everything
      child.stdin.destroy();
    });
    child.stdin.write(input);
    if (closeStdin) child.stdin.end();
  });
}

describe("convergraph executable", () => {
  test(
    "prints the graph for piped records",
    async () => {
      const input = records(["MAD", "MAE", "KAE", "KAE"]);
      const result = await runBin(["-r", file("mad.txt"), "-s", "1", "--quiet"], input, true);

      expect(result).toEqual({
        status: 0,
        stdout: [
          "graph {",
          '    0 [ label = "D3E" ]',
          '    1 [ label = "M1K" ]',
          '    1 -- 0 [ label = "2", weight = 2 ]',
          "}",
          "",
        ].join("\n"),
        stderr: "",
      });
    },
    PROCESS_TIMEOUT_MS + 5_000
  );

  test(
    "exits on a malformed row while stdin is still open",
    async () => {
      const result = await runBin(["-r", file("mad.txt")], "c1\tA\tMAD\n", false);

      expect(result.status).toBe(1);
      expect(result.stderr).toBe("DSVParseError: Row has 3 fields, expected 7 (line 1)\n");
    },
    PROCESS_TIMEOUT_MS + 5_000
  );
});

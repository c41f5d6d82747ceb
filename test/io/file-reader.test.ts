/**
 * Tests for Effect-backed file reading
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { createStream, exists, FileReader, getMetadata, readToString } from "../../src/io/file-reader";

let dir: string;
const file = (name: string): string => join(dir, name);

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "convergraph-io-"));
  writeFileSync(file("small.txt"), "MADE\nKLV\n");
  writeFileSync(file("empty.txt"), "");
  writeFileSync(file("large.txt"), "A".repeat(10_000));
  mkdirSync(file("subdir"));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

async function drain(stream: ReadableStream<Uint8Array>): Promise<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let text = "";
  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    text += decoder.decode(value, { stream: true });
  }
  return text + decoder.decode();
}

describe("FileReader", () => {
  describe("exists", () => {
    test("is true for regular files", async () => {
      expect(await exists(file("small.txt"))).toBe(true);
      expect(await exists(file("empty.txt"))).toBe(true);
    });

    test("is false for missing paths and directories", async () => {
      expect(await exists(file("missing.txt"))).toBe(false);
      expect(await exists(file("subdir"))).toBe(false);
    });
  });

  describe("getMetadata", () => {
    test("reports size and modification time", async () => {
      const metadata = await getMetadata(file("small.txt"));
      expect(metadata.size).toBe(9);
      expect(metadata.path).toBe(file("small.txt"));
      expect(metadata.lastModified).toBeInstanceOf(Date);
    });

    test("fails for a missing file", async () => {
      await expect(getMetadata(file("missing.txt"))).rejects.toBeInstanceOf(FileError);
    });
  });

  describe("readToString", () => {
    test("reads the whole file", async () => {
      expect(await readToString(file("small.txt"))).toBe("MADE\nKLV\n");
      expect(await readToString(file("empty.txt"))).toBe("");
    });

    test("enforces the size limit", async () => {
      await expect(readToString(file("large.txt"), { maxFileSize: 100 })).rejects.toThrow(
        "File too large: 10000 bytes exceeds limit of 100 bytes"
      );
    });

    test("rejects invalid paths before touching the disk", async () => {
      await expect(readToString("")).rejects.toThrow("Invalid file path");
      await expect(readToString(file("what?.txt"))).rejects.toThrow("Invalid file path");
    });

    test("rejects invalid options", async () => {
      await expect(readToString(file("small.txt"), { bufferSize: 0 })).rejects.toThrow(
        "Invalid file reader options"
      );
    });
  });

  describe("createStream", () => {
    test("streams the file contents", async () => {
      expect(await drain(await createStream(file("large.txt"), { bufferSize: 4 }))).toBe("A".repeat(10_000));
    });

    test("counts bufferSize in chunks, not bytes", async () => {
      expect(await drain(await createStream(file("large.txt"), { bufferSize: 1 }))).toHaveLength(10_000);
    });

    test("fails for a missing file", async () => {
      await expect(createStream(file("missing.txt"))).rejects.toThrow(
        `File does not exist or is not a regular file: ${file("missing.txt")}`
      );
    });
  });

  test("namespace exposes every reader", () => {
    expect(FileReader.readToString).toBe(readToString);
    expect(FileReader.createStream).toBe(createStream);
    expect(FileReader.exists).toBe(exists);
    expect(FileReader.getMetadata).toBe(getMetadata);
  });
});

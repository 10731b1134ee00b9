/**
 * End-to-end tests for the partition command against real temp directories.
 *
 * Only the memory reading is fixed, so each test decides which buffer
 * variant stages the parts.
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { Effect, Either, Layer, pipe } from "effect";
import { NodeContext } from "@effect/platform-node";
import JSZip from "jszip";
import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { runPartition } from "../cli/handler";
import type { PartitionOptions } from "../cli/options";
import { LoggerServiceLive } from "@services/LoggerService";
import { ScannerServiceLive } from "@services/ScannerService";
import { DirectoryServiceLive } from "@services/DirectoryService";
import { FileStatServiceLive } from "@services/FileStatService";
import { BufferSelectorServiceLive } from "@services/BufferSelector";
import { MemoryStatsServiceFixed } from "@services/MemoryStatsService";
import { ArchiveBuilderServiceLive } from "@services/ArchiveBuilder";
import { PartWriterServiceLive } from "@services/PartWriter";

const buildTestLayer = (availableMemoryBytes: number | undefined) =>
  pipe(
    Layer.mergeAll(
      LoggerServiceLive,
      pipe(ScannerServiceLive, Layer.provide(Layer.merge(DirectoryServiceLive, FileStatServiceLive))),
      pipe(BufferSelectorServiceLive, Layer.provide(MemoryStatsServiceFixed(availableMemoryBytes))),
      ArchiveBuilderServiceLive,
      PartWriterServiceLive
    ),
    Layer.provideMerge(NodeContext.layer)
  );

const ONE_GB = 1024 * 1024 * 1024;

const run = (options: Partial<PartitionOptions>, availableMemoryBytes: number | undefined = ONE_GB) =>
  pipe(
    runPartition({
      input: undefined,
      output: undefined,
      partSize: "100",
      threshold: "100",
      cd: false,
      dvd: false,
      bluray: false,
      dryRun: false,
      ...options
    }),
    Effect.provide(buildTestLayer(availableMemoryBytes)),
    Effect.either,
    Effect.runPromise
  );

const zipEntries = async (archivePath: string) => {
  const zip = await JSZip.loadAsync(await readFile(archivePath));
  return Object.keys(zip.files);
};

let workDir = "";
let inputDir = "";
let outputDir = "";

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), "partzip-e2e-"));
  inputDir = join(workDir, "in");
  outputDir = join(workDir, "out");
  await mkdir(inputDir);
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

const writeInputs = async (sizes: Record<string, number>) => {
  for (const [name, size] of Object.entries(sizes)) {
    await mkdir(join(inputDir, name, ".."), { recursive: true });
    await writeFile(join(inputDir, name), new Uint8Array(size).fill(name.length));
  }
};

describe("runPartition", () => {
  test("packs files greedily into numbered parts using memory buffers", async () => {
    await writeInputs({ "a.bin": 400, "b.bin": 400, "c.bin": 400 });

    const result = await run({ input: inputDir, output: outputDir, partSize: "1000B" });
    const summary = Either.getOrThrow(result);

    expect(summary?.parts.map((p) => p.path)).toEqual([
      join(outputDir, "archive_part000.zip"),
      join(outputDir, "archive_part001.zip")
    ]);
    expect(summary?.fileCount).toBe(3);
    expect(summary?.inputBytes).toBe(1200);
    expect((await readdir(outputDir)).sort()).toEqual(["archive_part000.zip", "archive_part001.zip"]);
    expect(await zipEntries(join(outputDir, "archive_part000.zip"))).toEqual(["a.bin", "b.bin"]);
    expect(await zipEntries(join(outputDir, "archive_part001.zip"))).toEqual(["c.bin"]);
  });

  test("disk buffers produce archives with the same entries and contents", async () => {
    await writeInputs({ "a.bin": 400, "nested/b.bin": 400 });

    const result = await run({ input: inputDir, output: outputDir, partSize: "1000B" }, 0);
    Either.getOrThrow(result);

    const zip = await JSZip.loadAsync(await readFile(join(outputDir, "archive_part000.zip")));
    expect(Object.keys(zip.files)).toEqual(["a.bin", "b.bin"]);
    expect(await zip.file("b.bin")?.async("uint8array")).toEqual(new Uint8Array(400).fill(12));
  });

  test("a file larger than the part size gets a part of its own", async () => {
    await writeInputs({ "big.bin": 2000, "small.bin": 10 });

    const result = await run({ input: inputDir, output: outputDir, partSize: "1000B" });
    const summary = Either.getOrThrow(result);

    expect(summary?.parts).toHaveLength(2);
    expect(await zipEntries(join(outputDir, "archive_part000.zip"))).toEqual(["big.bin"]);
    expect(await zipEntries(join(outputDir, "archive_part001.zip"))).toEqual(["small.bin"]);
  });

  test("creates a missing output directory", async () => {
    await writeInputs({ "a.bin": 5 });
    const nestedOutput = join(outputDir, "deeper", "still");

    const result = await run({ input: inputDir, output: nestedOutput });
    Either.getOrThrow(result);

    expect(await readdir(nestedOutput)).toEqual(["archive_part000.zip"]);
  });

  test("an empty input directory writes no parts", async () => {
    const result = await run({ input: inputDir, output: outputDir });
    const summary = Either.getOrThrow(result);

    expect(summary?.parts).toEqual([]);
    expect(await readdir(outputDir)).toEqual([]);
  });

  test("dry run plans parts without touching the output directory", async () => {
    await writeInputs({ "a.bin": 400, "b.bin": 400, "c.bin": 400 });

    const result = await run({ input: inputDir, output: outputDir, partSize: "1000B", dryRun: true });
    const summary = Either.getOrThrow(result);

    expect(summary?.parts).toEqual([
      { partIndex: 0, path: join(outputDir, "archive_part000.zip"), sizeBytes: 0 },
      { partIndex: 1, path: join(outputDir, "archive_part001.zip"), sizeBytes: 0 }
    ]);
    expect(existsSync(outputDir)).toBe(false);
  });

  test("missing directory arguments stop the run before any work", async () => {
    const result = await run({ input: inputDir });

    expect(Either.getOrThrow(result)).toBeUndefined();
  });

  test("a nonexistent input fails with InputNotFound and creates nothing", async () => {
    const missing = join(workDir, "missing");

    const result = await run({ input: missing, output: outputDir });

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("InputNotFound");
    }
    expect(existsSync(outputDir)).toBe(false);
  });

  test("an input that is a file fails with InputNotADirectory", async () => {
    await writeInputs({ "a.bin": 1 });

    const result = await run({ input: join(inputDir, "a.bin"), output: outputDir });

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("InputNotADirectory");
    }
  });

  test("combined presets are accepted", async () => {
    await writeInputs({ "a.bin": 400, "b.bin": 400, "c.bin": 400 });

    const result = await run({
      input: inputDir,
      output: outputDir,
      partSize: "1000B",
      cd: true,
      bluray: true,
      presetOrder: ["bluray", "cd"]
    });

    expect(Either.getOrThrow(result)?.parts).toHaveLength(2);
  });

  test("an invalid size fails before the output directory is created", async () => {
    await writeInputs({ "a.bin": 1 });

    const result = await run({ input: inputDir, output: outputDir, threshold: "0" });

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("ConfigurationError");
    }
    expect(existsSync(outputDir)).toBe(false);
  });
});

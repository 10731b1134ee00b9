import { Effect, Layer, pipe } from "effect";
import { Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";

export type { SourceFile } from "./domain/SourceFile";
export type { PartBudget, PresetName } from "./domain/PartBudget";
export type { PartGroup, PartPlan } from "./domain/PartPlan";
export type { OutputArtifact, RunSummary } from "./domain/OutputArtifact";
export { planParts, partTotals } from "./domain/PartPlan";
export { partFileName } from "./domain/OutputArtifact";
export { applyPreset, megabytes, PRESETS, DEFAULT_BUDGET } from "./domain/PartBudget";

export type {
  ScanPathNotFound,
  ScanPermissionDenied,
  ScanFailed,
  FileStatFailed
} from "./services/ScannerService/ScannerService";

export type {
  BufferCreateFailed,
  BufferWriteFailed,
  BufferReadFailed,
  BufferDisposed
} from "./services/BufferSource/BufferSource";

export type { ArchiveEntryFailed, ArchiveFailed } from "./services/ArchiveBuilder/ArchiveBuilder";

export type { PartWritePermissionDenied, PartWriteFailed } from "./services/PartWriter/PartWriter";

import { ScannerServiceTag, ScannerServiceLive } from "./services/ScannerService";
import { DirectoryServiceLive } from "./services/DirectoryService";
import { FileStatServiceLive } from "./services/FileStatService";
import { BufferSelectorServiceTag, BufferSelectorServiceLive } from "./services/BufferSelector";
import { MemoryStatsServiceLive } from "./services/MemoryStatsService";
import { ArchiveBuilderServiceTag, ArchiveBuilderServiceLive } from "./services/ArchiveBuilder";
import { PartWriterServiceTag, PartWriterServiceLive } from "./services/PartWriter";
import { LoggerServiceLive } from "./services/LoggerService";

import type { PartBudget } from "./domain/PartBudget";
import type { OutputArtifact, RunSummary } from "./domain/OutputArtifact";
import type { PartGroup } from "./domain/PartPlan";
import { partFileName } from "./domain/OutputArtifact";
import { planParts } from "./domain/PartPlan";
import { totalBytes } from "./domain/SourceFile";

export interface CreatePartsOptions {
  readonly dryRun?: boolean;
  readonly onScanned?: (fileCount: number, totalBytes: number) => Effect.Effect<void>;
  readonly onPlanned?: (groups: ReadonlyArray<PartGroup>) => Effect.Effect<void>;
  readonly onPartWritten?: (artifact: OutputArtifact, group: PartGroup) => Effect.Effect<void>;
}

/**
 * Builds one part: select a buffer, compress the group into it, flush it to
 * the numbered archive. The buffer never outlives this scope.
 */
export const createPart = (
  partIndex: number,
  group: PartGroup,
  outputDir: string,
  memoryThresholdBytes: number
) =>
  Effect.gen(function* () {
    const selector = yield* BufferSelectorServiceTag;
    const builder = yield* ArchiveBuilderServiceTag;
    const writer = yield* PartWriterServiceTag;

    const buffer = yield* selector.select(memoryThresholdBytes);
    yield* builder.build(group, buffer);
    return yield* writer.writePart(partIndex, buffer, outputDir);
  }).pipe(
    Effect.scoped,
    Effect.withLogSpan(`part${partIndex}`)
  );

/**
 * Splits the files under `inputDir` into size-bounded ZIP parts written to
 * `outputDir`, one part at a time. `outputDir` must already exist.
 */
export const createParts = (
  inputDir: string,
  outputDir: string,
  budget: PartBudget,
  options: CreatePartsOptions = {}
) =>
  Effect.gen(function* () {
    const scanner = yield* ScannerServiceTag;
    const path = yield* Path.Path;

    const files = yield* scanner.scan(inputDir);
    const inputBytes = totalBytes(files);
    if (options.onScanned) yield* options.onScanned(files.length, inputBytes);

    const groups = planParts(files, budget.maxPartSizeBytes);
    yield* Effect.logDebug(
      `Planned ${groups.length} parts from ${files.length} files (budget ${budget.maxPartSizeBytes} bytes)`
    );
    if (options.onPlanned) yield* options.onPlanned(groups);

    if (options.dryRun) {
      return {
        parts: groups.map((_, partIndex) => ({
          partIndex,
          path: path.join(outputDir, partFileName(partIndex)),
          sizeBytes: 0
        })),
        fileCount: files.length,
        inputBytes,
        outputBytes: 0
      } satisfies RunSummary;
    }

    const parts = yield* Effect.forEach(groups, (group, partIndex) =>
      pipe(
        createPart(partIndex, group, outputDir, budget.memoryThresholdBytes),
        Effect.tap((artifact) =>
          options.onPartWritten ? options.onPartWritten(artifact, group) : Effect.void
        )
      )
    );

    return {
      parts,
      fileCount: files.length,
      inputBytes,
      outputBytes: parts.reduce((sum, part) => sum + part.sizeBytes, 0)
    } satisfies RunSummary;
  });

export const createAppLayer = () =>
  pipe(
    Layer.mergeAll(
      LoggerServiceLive,
      pipe(ScannerServiceLive, Layer.provide(Layer.merge(DirectoryServiceLive, FileStatServiceLive))),
      pipe(BufferSelectorServiceLive, Layer.provide(MemoryStatsServiceLive)),
      ArchiveBuilderServiceLive,
      PartWriterServiceLive
    ),
    Layer.provide(NodeContext.layer)
  );

export const AppLive = createAppLayer();

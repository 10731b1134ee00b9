/**
 * BufferSelector - picks the staging buffer for one part.
 *
 * Memory is used only when the available-memory reading is strictly above the
 * threshold. A missing reading or a failed query falls back to disk.
 */

import { Context, Effect, Layer, Option, pipe, type Scope } from "effect";
import { FileSystem, Path } from "@effect/platform";
import { MemoryStatsServiceTag } from "../MemoryStatsService";
import {
  makeDiskBuffer,
  makeMemoryBuffer,
  type BufferCreateFailed,
  type BufferKind,
  type BufferSource
} from "../BufferSource";
import { formatSize } from "@lib/parseSize";

export interface BufferSelectorService {
  /** The buffer is disposed when the enclosing scope closes. */
  readonly select: (
    memoryThresholdBytes: number
  ) => Effect.Effect<BufferSource, BufferCreateFailed, Scope.Scope>;
}

export class BufferSelectorServiceTag extends Context.Tag("BufferSelectorService")<
  BufferSelectorServiceTag,
  BufferSelectorService
>() {}

export const chooseBufferKind = (
  reading: Option.Option<number>,
  memoryThresholdBytes: number
): BufferKind =>
  Option.match(reading, {
    onNone: () => "disk",
    onSome: (available) =>
      Number.isFinite(available) && available > memoryThresholdBytes ? "memory" : "disk"
  });

export const BufferSelectorServiceLive = Layer.effect(
  BufferSelectorServiceTag,
  Effect.gen(function* () {
    const memoryStats = yield* MemoryStatsServiceTag;
    const platform = yield* Effect.context<FileSystem.FileSystem | Path.Path>();

    const readAvailableMemory = pipe(
      memoryStats.available,
      Effect.catchAll((e) =>
        pipe(
          Effect.logDebug(`Available memory unknown (${e.reason}); using a disk buffer`),
          Effect.as(Option.none<number>())
        )
      )
    );

    const create = (memoryThresholdBytes: number) =>
      Effect.gen(function* () {
        const reading = yield* readAvailableMemory;
        const kind = chooseBufferKind(reading, memoryThresholdBytes);

        yield* Effect.logDebug(
          `Available memory ${Option.match(reading, {
            onNone: () => "unknown",
            onSome: formatSize
          })}, threshold ${formatSize(memoryThresholdBytes)}: ${kind} buffer`
        );

        return kind === "memory"
          ? yield* makeMemoryBuffer
          : yield* pipe(makeDiskBuffer, Effect.provide(platform));
      });

    const select: BufferSelectorService["select"] = (memoryThresholdBytes) =>
      Effect.acquireRelease(create(memoryThresholdBytes), (buffer) => buffer.dispose);

    return { select };
  })
);

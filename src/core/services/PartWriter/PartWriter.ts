/**
 * PartWriter - flushes a built buffer to its numbered archive file.
 *
 * The buffer is disposed once the copy ends, whether it succeeded or not.
 */

import { Context, Data, Effect, Layer, Stream, pipe } from "effect";
import { FileSystem, Path } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { partFileName, type OutputArtifact } from "@domain/OutputArtifact";
import type { BufferError, BufferSource } from "../BufferSource";

export class PartWritePermissionDenied extends Data.TaggedError("PartWritePermissionDenied")<{
  readonly path: string;
}> {}

export class PartWriteFailed extends Data.TaggedError("PartWriteFailed")<{
  readonly path: string;
  readonly reason: string;
}> {}

export type PartWriteError = PartWritePermissionDenied | PartWriteFailed;

export interface PartWriterService {
  readonly writePart: (
    partIndex: number,
    buffer: BufferSource,
    outputDir: string
  ) => Effect.Effect<OutputArtifact, PartWriteError | BufferError>;
}

export class PartWriterServiceTag extends Context.Tag("PartWriterService")<
  PartWriterServiceTag,
  PartWriterService
>() {}

const toPartWriteError = (path: string, error: PlatformError): PartWriteError =>
  error._tag === "SystemError" && error.reason === "PermissionDenied"
    ? new PartWritePermissionDenied({ path })
    : new PartWriteFailed({ path, reason: error.message });

export const PartWriterServiceLive = Layer.effect(
  PartWriterServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    const writePart: PartWriterService["writePart"] = (partIndex, buffer, outputDir) =>
      Effect.gen(function* () {
        const target = path.join(outputDir, partFileName(partIndex));
        let sizeBytes = 0;

        yield* pipe(
          buffer.readChunks,
          Stream.tap((chunk) =>
            Effect.sync(() => {
              sizeBytes += chunk.byteLength;
            })
          ),
          Stream.run(fs.sink(target)),
          Effect.catchTags({
            SystemError: (e) => Effect.fail(toPartWriteError(target, e)),
            BadArgument: (e) => Effect.fail(toPartWriteError(target, e))
          })
        );

        yield* Effect.logDebug(`Flushed ${sizeBytes} bytes from ${buffer.kind} buffer to ${target}`);

        return { partIndex, path: target, sizeBytes } satisfies OutputArtifact;
      }).pipe(Effect.ensuring(buffer.dispose));

    return { writePart };
  })
);

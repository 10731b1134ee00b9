/**
 * BufferSource - staging area for one part's compressed bytes.
 *
 * Two variants share one contract: the memory variant keeps chunks in the
 * process, the disk variant spills them to a temporary file. Both are written
 * incrementally, read back once from offset 0, and disposed right after the
 * part is flushed.
 */

import { Chunk, Data, Effect, Exit, Option, Scope, Stream, pipe } from "effect";
import { FileSystem, Path } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";

// =============================================================================
// Typed errors
// =============================================================================

export type BufferKind = "memory" | "disk";

export class BufferCreateFailed extends Data.TaggedError("BufferCreateFailed")<{
  readonly kind: BufferKind;
  readonly reason: string;
}> {}

export class BufferWriteFailed extends Data.TaggedError("BufferWriteFailed")<{
  readonly kind: BufferKind;
  readonly reason: string;
}> {}

export class BufferReadFailed extends Data.TaggedError("BufferReadFailed")<{
  readonly kind: BufferKind;
  readonly reason: string;
}> {}

export class BufferDisposed extends Data.TaggedError("BufferDisposed")<{
  readonly kind: BufferKind;
}> {}

export type BufferError = BufferCreateFailed | BufferWriteFailed | BufferReadFailed | BufferDisposed;

// =============================================================================
// Contract
// =============================================================================

interface BufferOperations {
  readonly write: (bytes: Uint8Array) => Effect.Effect<void, BufferError>;
  /** Contents from offset 0, chunk by chunk. */
  readonly readChunks: Stream.Stream<Uint8Array, BufferError>;
  readonly readAll: Effect.Effect<Uint8Array, BufferError>;
  /** Idempotent. Never fails. */
  readonly dispose: Effect.Effect<void>;
}

export interface MemoryBufferSource extends BufferOperations {
  readonly kind: "memory";
}

export interface DiskBufferSource extends BufferOperations {
  readonly kind: "disk";
  readonly tempPath: string;
}

export type BufferSource = MemoryBufferSource | DiskBufferSource;

const READ_CHUNK_SIZE = 64 * 1024;

export const concatChunks = (chunks: Iterable<Uint8Array>): Uint8Array => {
  const parts = Array.from(chunks);
  const length = parts.reduce((sum, part) => sum + part.byteLength, 0);
  const out = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.byteLength;
  }
  return out;
};

const collectAll = (chunks: Stream.Stream<Uint8Array, BufferError>) =>
  pipe(Stream.runCollect(chunks), Effect.map((collected) => concatChunks(Chunk.toReadonlyArray(collected))));

// =============================================================================
// Memory variant
// =============================================================================

export const makeMemoryBuffer: Effect.Effect<MemoryBufferSource> = Effect.sync(() => {
  let chunks: Uint8Array[] = [];
  let disposed = false;

  const ensureOpen: Effect.Effect<void, BufferDisposed> = Effect.suspend(() =>
    disposed ? Effect.fail(new BufferDisposed({ kind: "memory" })) : Effect.void
  );

  // Chunks are copied on write: archive streams may reuse their output buffers.
  const write = (bytes: Uint8Array) =>
    Effect.zipRight(
      ensureOpen,
      Effect.sync(() => {
        chunks.push(Uint8Array.from(bytes));
      })
    );

  const readChunks = Stream.unwrap(
    Effect.zipRight(ensureOpen, Effect.sync(() => Stream.fromIterable([...chunks])))
  );

  const dispose = Effect.sync(() => {
    disposed = true;
    chunks = [];
  });

  return {
    kind: "memory",
    write,
    readChunks,
    readAll: collectAll(readChunks),
    dispose
  } satisfies MemoryBufferSource;
});

// =============================================================================
// Disk variant
// =============================================================================

const reasonOf = (error: PlatformError): string => error.message;

export const makeDiskBuffer: Effect.Effect<
  DiskBufferSource,
  BufferCreateFailed,
  FileSystem.FileSystem | Path.Path
> = Effect.gen(function* () {
  const fs = yield* FileSystem.FileSystem;
  const path = yield* Path.Path;

  const tempPath = yield* pipe(
    fs.makeTempFile({ prefix: "partzip-" }),
    Effect.mapError((e) => new BufferCreateFailed({ kind: "disk", reason: reasonOf(e) }))
  );

  // makeTempFile places the file inside its own fresh temp directory.
  const removeTempFile = pipe(
    fs.remove(path.dirname(tempPath), { recursive: true }),
    Effect.catchTag("SystemError", (e) => (e.reason === "NotFound" ? Effect.void : Effect.fail(e))),
    Effect.catchAll((e) => Effect.logWarning(`Could not delete temp buffer ${tempPath}: ${e.message}`))
  );

  const handleScope = yield* Scope.make();

  const file = yield* pipe(
    fs.open(tempPath, { flag: "w+" }),
    Scope.extend(handleScope),
    Effect.mapError((e) => new BufferCreateFailed({ kind: "disk", reason: reasonOf(e) })),
    Effect.tapError(() => Effect.zipRight(Scope.close(handleScope, Exit.void), removeTempFile))
  );

  let disposed = false;

  const ensureOpen: Effect.Effect<void, BufferDisposed> = Effect.suspend(() =>
    disposed ? Effect.fail(new BufferDisposed({ kind: "disk" })) : Effect.void
  );

  // writeAll fails on an empty chunk, so those only check the buffer is open.
  const write = (bytes: Uint8Array) =>
    bytes.byteLength === 0
      ? ensureOpen
      : Effect.zipRight(
          ensureOpen,
          pipe(
            file.writeAll(bytes),
            Effect.mapError((e) => new BufferWriteFailed({ kind: "disk", reason: reasonOf(e) }))
          )
        );

  const nextChunk: Effect.Effect<Uint8Array, Option.Option<BufferError>> = pipe(
    file.readAlloc(READ_CHUNK_SIZE),
    Effect.mapError((e) => Option.some(new BufferReadFailed({ kind: "disk", reason: reasonOf(e) }))),
    Effect.flatMap(
      Option.match({
        onNone: () => Effect.fail(Option.none()),
        onSome: (bytes) => Effect.succeed(bytes)
      })
    )
  );

  const readChunks = Stream.unwrap(
    pipe(
      ensureOpen,
      Effect.zipRight(file.seek(0, "start")),
      Effect.as(Stream.repeatEffectOption(nextChunk))
    )
  );

  const dispose = Effect.suspend(() => {
    if (disposed) return Effect.void;
    disposed = true;
    return Effect.zipRight(Scope.close(handleScope, Exit.void), removeTempFile);
  });

  yield* Effect.logDebug(`Disk buffer created at ${tempPath}`);

  return {
    kind: "disk",
    tempPath,
    write,
    readChunks,
    readAll: collectAll(readChunks),
    dispose
  } satisfies DiskBufferSource;
});

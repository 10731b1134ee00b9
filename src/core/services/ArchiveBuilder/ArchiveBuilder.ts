/**
 * ArchiveBuilder - compresses one part's files into a ZIP inside a buffer.
 *
 * Live implementation uses archiver. Its output stream is drained into the
 * buffer while entries are appended, so the buffer sees the archive bytes in
 * order. Archiver reports unreadable inputs as warnings; they fail the build.
 * Sources are resolved to their real paths first, so a symlinked file is
 * stored with its target's contents rather than as a link entry.
 */

import { Context, Data, Effect, Layer, Predicate, Stream, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import { NodeStream } from "@effect/platform-node";
import archiver from "archiver";
import type { SourceFile } from "@domain/SourceFile";
import type { BufferError, BufferSource } from "../BufferSource";

// =============================================================================
// Typed errors
// =============================================================================

export class ArchiveEntryFailed extends Data.TaggedError("ArchiveEntryFailed")<{
  readonly path: string;
  readonly reason: string;
}> {}

export class ArchiveFailed extends Data.TaggedError("ArchiveFailed")<{
  readonly reason: string;
}> {}

export type ArchiveError = ArchiveEntryFailed | ArchiveFailed;

// =============================================================================
// Service interface
// =============================================================================

export interface ArchiveBuilderService {
  readonly build: (
    files: ReadonlyArray<SourceFile>,
    buffer: BufferSource
  ) => Effect.Effect<void, ArchiveError | BufferError>;
}

export class ArchiveBuilderServiceTag extends Context.Tag("ArchiveBuilderService")<
  ArchiveBuilderServiceTag,
  ArchiveBuilderService
>() {}

/** Favor smaller output over speed. */
export const COMPRESSION_LEVEL = 9;

const toArchiveError = (error: unknown): ArchiveError => {
  if (error instanceof Error && Predicate.hasProperty(error, "path") && typeof error.path === "string") {
    return new ArchiveEntryFailed({ path: error.path, reason: error.message });
  }
  return new ArchiveFailed({ reason: error instanceof Error ? error.message : String(error) });
};

// =============================================================================
// Live implementation (archiver)
// =============================================================================

export const ArchiveBuilderServiceLive = Layer.effect(
  ArchiveBuilderServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const resolveSource = (file: SourceFile) =>
      pipe(
        fs.realPath(file.absolutePath),
        Effect.map((realPath) => ({ realPath, name: file.relativeName })),
        Effect.mapError((e) => new ArchiveEntryFailed({ path: file.absolutePath, reason: e.message }))
      );

    const compress = (
      sources: ReadonlyArray<{ readonly realPath: string; readonly name: string }>,
      buffer: BufferSource
    ) =>
      Effect.suspend(() => {
        // One stat at a time keeps entries in input order.
        const archive = archiver("zip", { zlib: { level: COMPRESSION_LEVEL }, statConcurrency: 1 });

        archive.on("warning", (error) => {
          archive.destroy(error);
        });

        const drain = pipe(
          NodeStream.fromReadable<ArchiveError>(() => archive, toArchiveError),
          Stream.runForEach((chunk) => buffer.write(chunk))
        );

        const appendEntries = Effect.tryPromise({
          try: () => {
            for (const source of sources) {
              archive.file(source.realPath, { name: source.name });
            }
            return archive.finalize();
          },
          catch: toArchiveError
        });

        return Effect.all([drain, appendEntries], { concurrency: "unbounded", discard: true });
      });

    const build: ArchiveBuilderService["build"] = (files, buffer) =>
      pipe(
        Effect.logDebug(`Compressing ${files.length} entries`),
        Effect.zipRight(Effect.forEach(files, resolveSource)),
        Effect.flatMap((sources) => compress(sources, buffer))
      );

    return { build };
  })
);

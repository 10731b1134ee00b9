import { Context, Data, Effect, Layer, Match, pipe } from "effect";
import { Path } from "@effect/platform";
import { DirectoryServiceTag, type DirectoryError } from "../DirectoryService";
import { FileStatServiceTag, type FileStatError } from "../FileStatService";
import type { SourceFile } from "@domain/SourceFile";

export class ScanPathNotFound extends Data.TaggedError("ScanPathNotFound")<{
  readonly path: string;
}> {}

export class ScanPermissionDenied extends Data.TaggedError("ScanPermissionDenied")<{
  readonly path: string;
}> {}

export class ScanFailed extends Data.TaggedError("ScanFailed")<{
  readonly path: string;
  readonly reason: string;
}> {}

export class FileStatFailed extends Data.TaggedError("FileStatFailed")<{
  readonly path: string;
  readonly reason: string;
}> {}

export type ScannerError = ScanPathNotFound | ScanPermissionDenied | ScanFailed | FileStatFailed;

const fromDirectoryError = Match.typeTags<DirectoryError>()({
  DirectoryNotFound: (e) => new ScanPathNotFound({ path: e.path }),
  DirectoryPermissionDenied: (e) => new ScanPermissionDenied({ path: e.path }),
  DirectoryUnknownError: (e) => new ScanFailed({ path: e.path, reason: e.cause })
});

const fromFileStatError = (path: string) =>
  Match.typeTags<FileStatError>()({
    FileNotFound: () => new ScanPathNotFound({ path }),
    FilePermissionDenied: () => new ScanPermissionDenied({ path }),
    FileStatUnknownError: (e) => new FileStatFailed({ path, reason: e.cause })
  });

export interface ScannerService {
  /**
   * Regular files under `root`, ordered by their path relative to `root`.
   * Directories and special files are left out.
   */
  readonly scan: (root: string) => Effect.Effect<SourceFile[], ScannerError>;
}

export class ScannerServiceTag extends Context.Tag("ScannerService")<
  ScannerServiceTag,
  ScannerService
>() {}

export const ScannerServiceLive = Layer.effect(
  ScannerServiceTag,
  Effect.gen(function* () {
    const directory = yield* DirectoryServiceTag;
    const fileStat = yield* FileStatServiceTag;
    const path = yield* Path.Path;

    const statEntry = (absolutePath: string): Effect.Effect<SourceFile | undefined, ScannerError> =>
      pipe(
        fileStat.stat(absolutePath),
        Effect.map((stat) =>
          stat.kind === "file"
            ? {
                absolutePath,
                relativeName: path.basename(absolutePath),
                sizeBytes: stat.size
              }
            : undefined
        ),
        Effect.mapError(fromFileStatError(absolutePath))
      );

    const scan: ScannerService["scan"] = (root) =>
      pipe(
        directory.listRecursive(root),
        Effect.mapError(fromDirectoryError),
        Effect.map((relativePaths) => [...relativePaths].sort()),
        Effect.flatMap((relativePaths) =>
          Effect.forEach(relativePaths, (relPath) => statEntry(path.join(root, relPath)), {
            concurrency: 32
          })
        ),
        Effect.map((entries) => entries.filter((entry): entry is SourceFile => entry !== undefined)),
        Effect.tap((files) => Effect.logDebug(`Scanned ${files.length} files under ${root}`))
      );

    return { scan };
  })
);

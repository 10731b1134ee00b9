import { Context, Data, Effect, Layer, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";

export class FileNotFound extends Data.TaggedError("FileNotFound")<{
  readonly path: string;
}> {}

export class FilePermissionDenied extends Data.TaggedError("FilePermissionDenied")<{
  readonly path: string;
}> {}

export class FileStatUnknownError extends Data.TaggedError("FileStatUnknownError")<{
  readonly path: string;
  readonly cause: string;
}> {}

export type FileStatError = FileNotFound | FilePermissionDenied | FileStatUnknownError;

export type FileKind = "file" | "directory" | "other";

export interface FileStat {
  readonly size: number;
  readonly kind: FileKind;
}

export interface FileStatService {
  readonly stat: (path: string) => Effect.Effect<FileStat, FileStatError>;
}

export class FileStatServiceTag extends Context.Tag("FileStatService")<
  FileStatServiceTag,
  FileStatService
>() {}

const toFileStatError = (path: string, error: PlatformError): FileStatError => {
  if (error._tag === "SystemError") {
    if (error.reason === "NotFound") return new FileNotFound({ path });
    if (error.reason === "PermissionDenied") return new FilePermissionDenied({ path });
  }
  return new FileStatUnknownError({ path, cause: error.message });
};

const toFileKind = (type: FileSystem.File.Type): FileKind =>
  type === "File" ? "file" : type === "Directory" ? "directory" : "other";

export const FileStatServiceLive = Layer.effect(
  FileStatServiceTag,
  pipe(
    FileSystem.FileSystem,
    Effect.map((fs) => ({
      stat: (path: string) =>
        pipe(
          fs.stat(path),
          Effect.map((s) => ({ size: Number(s.size), kind: toFileKind(s.type) })),
          Effect.mapError((e) => toFileStatError(path, e))
        )
    }))
  )
);

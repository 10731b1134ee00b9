/**
 * DirectoryService - recursive directory listing, wrapped for testability.
 *
 * Live implementation uses @effect/platform FileSystem. Paths are returned
 * relative to the listed root and include directories.
 */

import { Context, Data, Effect, Layer, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";

// =============================================================================
// Typed errors
// =============================================================================

export class DirectoryNotFound extends Data.TaggedError("DirectoryNotFound")<{
  readonly path: string;
}> {}

export class DirectoryPermissionDenied extends Data.TaggedError("DirectoryPermissionDenied")<{
  readonly path: string;
}> {}

export class DirectoryUnknownError extends Data.TaggedError("DirectoryUnknownError")<{
  readonly path: string;
  readonly cause: string;
}> {}

export type DirectoryError = DirectoryNotFound | DirectoryPermissionDenied | DirectoryUnknownError;

// =============================================================================
// Service interface
// =============================================================================

export interface DirectoryService {
  readonly listRecursive: (root: string) => Effect.Effect<string[], DirectoryError>;
}

export class DirectoryServiceTag extends Context.Tag("DirectoryService")<
  DirectoryServiceTag,
  DirectoryService
>() {}

const toDirectoryError = (path: string, error: PlatformError): DirectoryError => {
  if (error._tag === "SystemError") {
    if (error.reason === "NotFound") return new DirectoryNotFound({ path });
    if (error.reason === "PermissionDenied") return new DirectoryPermissionDenied({ path });
  }
  return new DirectoryUnknownError({ path, cause: error.message });
};

// =============================================================================
// Live implementation (uses @effect/platform FileSystem)
// =============================================================================

export const DirectoryServiceLive = Layer.effect(
  DirectoryServiceTag,
  pipe(
    FileSystem.FileSystem,
    Effect.map((fs) => ({
      listRecursive: (root: string) =>
        pipe(
          fs.readDirectory(root, { recursive: true }),
          Effect.map((entries) => [...entries]),
          Effect.mapError((e) => toDirectoryError(root, e))
        )
    }))
  )
);

import { Match, Predicate } from "effect";

import type {
  ScanPathNotFound,
  ScanPermissionDenied,
  ScanFailed,
  FileStatFailed
} from "@services/ScannerService";

import type {
  BufferCreateFailed,
  BufferWriteFailed,
  BufferReadFailed,
  BufferDisposed
} from "@services/BufferSource";

import type { ArchiveEntryFailed, ArchiveFailed } from "@services/ArchiveBuilder";

import type { PartWritePermissionDenied, PartWriteFailed } from "@services/PartWriter";

import type { ConfigurationError } from "./optionParsing";

import type {
  InputNotFound,
  InputPermissionDenied,
  InputNotADirectory,
  OutputDirectoryFailed
} from "./handler";

type ScannerError = ScanPathNotFound | ScanPermissionDenied | ScanFailed | FileStatFailed;

type BufferError = BufferCreateFailed | BufferWriteFailed | BufferReadFailed | BufferDisposed;

type ArchiveError = ArchiveEntryFailed | ArchiveFailed;

type PartWriteError = PartWritePermissionDenied | PartWriteFailed;

type RunError =
  | ConfigurationError
  | InputNotFound
  | InputPermissionDenied
  | InputNotADirectory
  | OutputDirectoryFailed;

type DomainError = ScannerError | BufferError | ArchiveError | PartWriteError | RunError;

export class AppError extends Error {
  readonly _tag = "AppError";

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`);
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`
    ].join("\n");
  }
}

const errors = {
  invalidOption: (option: string, reason: string) =>
    new AppError(
      "Invalid option",
      `${option}: ${reason}`,
      `Sizes are in MB unless a unit is given (e.g., 650, 4.3GB). Run with --help to list the options.`
    ),

  inputNotFound: (path: string) =>
    new AppError(
      "Input directory not found",
      `The input directory '${path}' does not exist.`,
      `Check the --input path. Relative paths are resolved from the current directory.`
    ),

  inputPermissionDenied: (path: string) =>
    new AppError(
      "Cannot read input directory",
      `Permission denied for '${path}'.`,
      `Check that you have read permission on the input directory.`
    ),

  inputNotADirectory: (path: string) =>
    new AppError(
      "Not a directory",
      `The input path '${path}' exists but is not a directory.`,
      `Point --input at the directory whose contents should be archived.`
    ),

  outputDirectoryFailed: (path: string, reason: string) =>
    new AppError(
      "Cannot create output directory",
      `Failed to create '${path}': ${reason}`,
      `Check that you have write permission to the parent directory.`
    ),

  scanFailed: (path: string, reason: string) =>
    new AppError(
      "Scan failed",
      `Could not scan files in "${path}": ${reason}`,
      `Check that the path exists and you have read permission.`
    ),

  scanPermissionDenied: (path: string) =>
    new AppError(
      "Permission denied during scan",
      `Cannot read files in "${path}": permission denied.`,
      `Check file permissions or run with elevated privileges.`
    ),

  bufferCreateFailed: (kind: string, reason: string) =>
    new AppError(
      "Cannot create staging buffer",
      `Failed to create the ${kind} buffer: ${reason}`,
      kind === "disk"
        ? `Check free space and permissions in the system temp directory, or raise available memory above --threshold.`
        : `Lower --threshold so parts are staged on disk.`
    ),

  bufferFailed: (kind: string, reason: string) =>
    new AppError(
      "Staging buffer failed",
      `The ${kind} buffer could not be used: ${reason}`,
      `Check free space in the system temp directory and try again.`
    ),

  sourceReadFailed: (path: string, reason: string) =>
    new AppError(
      "Cannot read source file",
      `Failed to add "${path}" to the archive: ${reason}`,
      `The file may have been moved or deleted during the run, or is not readable.`
    ),

  archiveFailed: (reason: string) =>
    new AppError(
      "Compression failed",
      reason,
      `No part was written for the failing group. Fix the cause and run again.`
    ),

  partWriteFailed: (path: string, reason: string) =>
    new AppError(
      "Cannot write archive part",
      `Failed to write "${path}": ${reason}`,
      `Check free space on the output device.`
    ),

  outputPermissionDenied: (path: string) =>
    new AppError(
      "Cannot write to output directory",
      `Permission denied for "${path}".`,
      `Check that you have write permission on the output directory.`
    ),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`),

  permissionDenied: (message: string) =>
    new AppError(
      "Permission denied",
      message,
      `Check that you have the required permissions. You may need to run with elevated privileges.`
    )
};

const matchDomainError = Match.typeTags<DomainError>()({
  ConfigurationError: (e) => errors.invalidOption(e.option, e.reason),
  InputNotFound: (e) => errors.inputNotFound(e.path),
  InputPermissionDenied: (e) => errors.inputPermissionDenied(e.path),
  InputNotADirectory: (e) => errors.inputNotADirectory(e.path),
  OutputDirectoryFailed: (e) => errors.outputDirectoryFailed(e.path, e.reason),

  ScanPathNotFound: (e) => errors.scanFailed(e.path, "Path does not exist"),
  ScanPermissionDenied: (e) => errors.scanPermissionDenied(e.path),
  ScanFailed: (e) => errors.scanFailed(e.path, e.reason),
  FileStatFailed: (e) => errors.scanFailed(e.path, e.reason),

  BufferCreateFailed: (e) => errors.bufferCreateFailed(e.kind, e.reason),
  BufferWriteFailed: (e) => errors.bufferFailed(e.kind, e.reason),
  BufferReadFailed: (e) => errors.bufferFailed(e.kind, e.reason),
  BufferDisposed: (e) => errors.bufferFailed(e.kind, "used after it was released"),

  ArchiveEntryFailed: (e) => errors.sourceReadFailed(e.path, e.reason),
  ArchiveFailed: (e) => errors.archiveFailed(e.reason),

  PartWritePermissionDenied: (e) => errors.outputPermissionDenied(e.path),
  PartWriteFailed: (e) => errors.partWriteFailed(e.path, e.reason)
});

const DOMAIN_TAGS: ReadonlySet<string> = new Set<DomainError["_tag"]>([
  "ConfigurationError",
  "InputNotFound",
  "InputPermissionDenied",
  "InputNotADirectory",
  "OutputDirectoryFailed",
  "ScanPathNotFound",
  "ScanPermissionDenied",
  "ScanFailed",
  "FileStatFailed",
  "BufferCreateFailed",
  "BufferWriteFailed",
  "BufferReadFailed",
  "BufferDisposed",
  "ArchiveEntryFailed",
  "ArchiveFailed",
  "PartWritePermissionDenied",
  "PartWriteFailed"
]);

const isDomainError = (e: unknown): e is DomainError =>
  Predicate.hasProperty(e, "_tag") && typeof e._tag === "string" && DOMAIN_TAGS.has(e._tag);

const isPermissionError = (message: string): boolean =>
  message.toLowerCase().includes("permission denied") ||
  message.toLowerCase().includes("eacces") ||
  message.toLowerCase().includes("operation not permitted") ||
  message.toLowerCase().includes("eperm");

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (isDomainError(error)) {
    return matchDomainError(error);
  }

  if (error instanceof Error) {
    return isPermissionError(error.message)
      ? errors.permissionDenied(error.message)
      : errors.unexpected(error.message);
  }

  return errors.unexpected(String(error));
};

export const { invalidOption, inputNotFound, bufferCreateFailed, sourceReadFailed, partWriteFailed } =
  errors;

import { Data, Effect, pipe } from "effect";
import { Console } from "effect";
import { FileSystem } from "@effect/platform";

import type { PartitionOptions } from "./options";
import { parsePartitionOptions } from "./optionParsing";
import { fromDomainError } from "./errors";

import { createParts, AppLive, partTotals, type RunSummary } from "@core";
import { LoggerServiceTag } from "@services/LoggerService";

export class InputNotFound extends Data.TaggedError("InputNotFound")<{
  readonly path: string;
}> {}

export class InputPermissionDenied extends Data.TaggedError("InputPermissionDenied")<{
  readonly path: string;
}> {}

export class InputNotADirectory extends Data.TaggedError("InputNotADirectory")<{
  readonly path: string;
}> {}

export class OutputDirectoryFailed extends Data.TaggedError("OutputDirectoryFailed")<{
  readonly path: string;
  readonly reason: string;
}> {}

/**
 * Error handling wrapper for CLI commands
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) => {
      const appError = fromDomainError(error);
      return Console.error(`\n${appError.format()}`);
    }),
    Effect.asVoid
  );

export const ensureInputDirectory = (input: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const info = yield* pipe(
      fs.stat(input),
      Effect.mapError((e) =>
        e._tag === "SystemError" && e.reason === "PermissionDenied"
          ? new InputPermissionDenied({ path: input })
          : new InputNotFound({ path: input })
      )
    );

    if (info.type !== "Directory") {
      return yield* Effect.fail(new InputNotADirectory({ path: input }));
    }
  });

const ensureOutputDirectory = (output: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const logger = yield* LoggerServiceTag;

    const exists = yield* pipe(
      fs.exists(output),
      Effect.catchAll(() => Effect.succeed(false))
    );
    if (exists) return;

    yield* logger.creatingOutputDirectory(output);
    yield* pipe(
      fs.makeDirectory(output, { recursive: true }),
      Effect.mapError((e) => new OutputDirectoryFailed({ path: output, reason: e.message }))
    );
  });

/**
 * Run the partition command. Returns undefined when the run stops early on
 * missing directory arguments.
 */
export const runPartition = (options: PartitionOptions) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag;

    if (!options.input || !options.output) {
      yield* logger.missingDirectories;
      yield* logger.usage;
      return undefined;
    }
    const input = options.input;
    const output = options.output;

    if (options.debug) {
      yield* Effect.logInfo("Debug logging enabled");
    }

    const parsed = yield* parsePartitionOptions(options);

    yield* ensureInputDirectory(input);

    yield* logger.header;
    yield* logger.budget(parsed.budget);

    if (!options.dryRun) {
      yield* ensureOutputDirectory(output);
    }

    yield* logger.scanning(input);

    const summary: RunSummary = yield* createParts(input, output, parsed.budget, {
      dryRun: options.dryRun,
      onScanned: (fileCount, totalBytes) =>
        fileCount === 0 ? logger.noFiles : logger.scanned(fileCount, totalBytes),
      onPlanned: (groups) =>
        Effect.gen(function* () {
          if (groups.length === 0) return;
          yield* logger.planned(groups, parsed.budget.maxPartSizeBytes);
          if (options.dryRun) {
            const totals = partTotals(groups);
            for (const [index, group] of groups.entries()) {
              yield* logger.dryRunPart(index, group.length, totals[index] ?? 0);
            }
          }
        }),
      onPartWritten: (artifact) => logger.partCreated(artifact)
    });

    yield* logger.summary(summary, options.dryRun);
    if (!options.dryRun) {
      yield* logger.complete;
    }

    return summary;
  });

/**
 * Export the application layer for CLI
 */
export { AppLive };

/**
 * partzip CLI
 *
 * Splits a directory tree into size-bounded ZIP parts that fit removable
 * media. Each part is staged in memory or in a temp file, depending on the
 * free memory when the part is built.
 *
 * Example:
 *   $ partzip --input ./photos --output ./out --dvd
 *   $ partzip --input ./photos --output ./out --partsize 650 --threshold 2GB
 */

import { Command } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect, Layer, Option, Logger, LogLevel } from "effect";

import * as Opts from "@cli/options";
import { runPartition, withErrorHandling, AppLive } from "@cli/handler";
import { presetOrder } from "@cli/optionParsing";

const rootCommand = Command.make(
  "partzip",
  {
    input: Opts.input,
    output: Opts.output,
    partSize: Opts.partSize,
    threshold: Opts.threshold,
    cd: Opts.cd,
    dvd: Opts.dvd,
    bluray: Opts.bluray,
    dryRun: Opts.dryRun,
    debug: Opts.debug
  },
  (opts) =>
    withErrorHandling(
      runPartition({
        input: Option.getOrUndefined(opts.input),
        output: Option.getOrUndefined(opts.output),
        partSize: opts.partSize,
        threshold: opts.threshold,
        cd: opts.cd,
        dvd: opts.dvd,
        bluray: opts.bluray,
        presetOrder: presetOrder(process.argv),
        dryRun: opts.dryRun,
        debug: opts.debug
      })
    ).pipe(
      Effect.provide(opts.debug ? Logger.minimumLogLevel(LogLevel.Debug) : Layer.empty),
      Effect.provide(AppLive)
    )
).pipe(Command.withDescription("Split a directory into size-bounded ZIP parts"));

const cli = Command.run(rootCommand, {
  name: "partzip",
  version: "0.1.0"
});

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);

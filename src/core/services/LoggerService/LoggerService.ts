/**
 * LoggerService - formatted console output for the partition command
 */

import { Context, Effect, Layer, Console } from "effect";
import type { OutputArtifact, RunSummary } from "@domain/OutputArtifact";
import type { PartBudget } from "@domain/PartBudget";
import { isOversized, partTotals, type PartPlan } from "@domain/PartPlan";
import { formatSize } from "@lib/parseSize";

// =============================================================================
// Service interface
// =============================================================================

export interface LoggerService {
  readonly header: Effect.Effect<void>;
  readonly usage: Effect.Effect<void>;
  readonly missingDirectories: Effect.Effect<void>;
  readonly budget: (budget: PartBudget) => Effect.Effect<void>;
  readonly creatingOutputDirectory: (path: string) => Effect.Effect<void>;
  readonly scanning: (path: string) => Effect.Effect<void>;
  readonly scanned: (fileCount: number, totalBytes: number) => Effect.Effect<void>;
  readonly noFiles: Effect.Effect<void>;
  readonly planned: (plan: PartPlan, maxPartSizeBytes: number) => Effect.Effect<void>;
  readonly partCreated: (artifact: OutputArtifact) => Effect.Effect<void>;
  readonly dryRunPart: (partIndex: number, fileCount: number, totalBytes: number) => Effect.Effect<void>;
  readonly summary: (summary: RunSummary, dryRun: boolean) => Effect.Effect<void>;
  readonly complete: Effect.Effect<void>;
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

export const USAGE_LINES: ReadonlyArray<string> = [
  "Usage:",
  "  --input <directory>   : Specify the directory to compress.",
  "  --output <directory>  : Specify the output directory for ZIP files.",
  "  --partsize <size>     : Maximum input size of each ZIP part, in MB unless a unit is given (default 100).",
  "  --threshold <size>    : Free memory needed to stage a part in memory, in MB unless a unit is given (default 100).",
  "  --cd                  : Set size constraints for CD capacity (700MB).",
  "  --dvd                 : Set size constraints for DVD capacity (4700MB).",
  "  --bluray              : Set size constraints for Blu-ray capacity (25000MB).",
  "  --dry-run             : Print the part plan without writing archives.",
  "  --debug               : Enable verbose debug logging."
];

// =============================================================================
// Implementation
// =============================================================================

export const LoggerServiceLive = Layer.succeed(LoggerServiceTag, {
  header: Console.log("\n🗜️  partzip\n"),
  usage: Console.log(USAGE_LINES.join("\n")),
  missingDirectories: Console.error("Error: Input and output directories must be specified."),
  budget: (budget) =>
    Console.log(
      `   Part size: ${formatSize(budget.maxPartSizeBytes)}, memory threshold: ${formatSize(budget.memoryThresholdBytes)}`
    ),
  creatingOutputDirectory: (path) => Console.log(`Creating output directory '${path}'.`),
  scanning: (path) => Console.log(`🔍 Scanning ${path}...`),
  scanned: (fileCount, totalBytes) =>
    Console.log(`   Found ${fileCount} files (${formatSize(totalBytes)})`),
  noFiles: Console.log("\n✓ No files to archive\n"),
  planned: (plan, maxPartSizeBytes) =>
    Effect.gen(function* () {
      const totals = partTotals(plan);
      yield* Console.log(`\n📦 ${plan.length} part(s) planned:`);
      for (const [index, group] of plan.entries()) {
        const marker = isOversized(group, maxPartSizeBytes) ? "  ⚠️  oversized single file" : "";
        yield* Console.log(`   #${index}: ${formatSize(totals[index] ?? 0)}${marker}`);
      }
    }),
  partCreated: (artifact) => Console.log(`Created ${artifact.path}`),
  dryRunPart: (partIndex, fileCount, totalBytes) =>
    Console.log(`   would write part ${partIndex}: ${fileCount} files, ${formatSize(totalBytes)}`),
  summary: (summary, dryRun) =>
    Effect.gen(function* () {
      yield* Console.log(dryRun ? `\n🧪 Dry run summary:` : `\n📊 Summary:`);
      yield* Console.log(`   Parts: ${summary.parts.length}`);
      yield* Console.log(`   Files: ${summary.fileCount}`);
      yield* Console.log(`   Input: ${formatSize(summary.inputBytes)}`);
      if (!dryRun) yield* Console.log(`   Written: ${formatSize(summary.outputBytes)}`);
    }),
  complete: Console.log("Zipping complete.")
});

import { Options } from "@effect/cli";
import type { PresetName } from "@domain/PartBudget";

export const input = Options.text("input").pipe(
  Options.withDescription("Directory to compress"),
  Options.optional
);

export const output = Options.text("output").pipe(
  Options.withDescription("Directory for the ZIP parts (created if missing)"),
  Options.optional
);

export const partSize = Options.text("partsize").pipe(
  Options.withDescription("Max input size per part, MB unless a unit is given (e.g., 650, 4.3GB)"),
  Options.withDefault("100")
);

export const threshold = Options.text("threshold").pipe(
  Options.withDescription("Free memory needed to stage a part in memory, MB unless a unit is given"),
  Options.withDefault("100")
);

export const cd = Options.boolean("cd").pipe(
  Options.withDescription("CD preset: 700MB parts and threshold"),
  Options.withDefault(false)
);

export const dvd = Options.boolean("dvd").pipe(
  Options.withDescription("DVD preset: 4700MB parts and threshold"),
  Options.withDefault(false)
);

export const bluray = Options.boolean("bluray").pipe(
  Options.withDescription("Blu-ray preset: 25000MB parts and threshold"),
  Options.withDefault(false)
);

export const dryRun = Options.boolean("dry-run").pipe(
  Options.withDescription("Print the part plan without writing archives"),
  Options.withDefault(false)
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);

export interface PartitionOptions {
  readonly input: string | undefined;
  readonly output: string | undefined;
  readonly partSize: string;
  readonly threshold: string;
  readonly cd: boolean;
  readonly dvd: boolean;
  readonly bluray: boolean;
  /** Preset flags as ordered on the command line. */
  readonly presetOrder?: ReadonlyArray<PresetName>;
  readonly dryRun: boolean;
  readonly debug?: boolean;
}

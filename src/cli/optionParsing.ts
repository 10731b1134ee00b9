import { Data, Effect, pipe } from "effect";
import { parseSize } from "@lib/parseSize";
import { applyPreset, type PartBudget, type PresetName } from "@domain/PartBudget";

export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly option: string;
  readonly reason: string;
}> {}

export interface ParsedPartitionOptions {
  readonly budget: PartBudget;
  readonly presets: ReadonlyArray<PresetName>;
}

/** A bare number is megabytes. */
export const parseMegabytes = (
  option: string,
  value: string
): Effect.Effect<number, ConfigurationError> =>
  pipe(
    parseSize(value, "mb"),
    Effect.mapError((e) => new ConfigurationError({ option, reason: e.message })),
    Effect.filterOrFail(
      (bytes) => bytes > 0,
      () => new ConfigurationError({ option, reason: `"${value}" must be greater than zero` })
    )
  );

const PRESET_NAMES: ReadonlyArray<PresetName> = ["cd", "dvd", "bluray"];

const isPresetName = (name: string): name is PresetName =>
  PRESET_NAMES.some((preset) => preset === name);

/** Preset flags in the order they appear on the command line. */
export const presetOrder = (argv: ReadonlyArray<string>): PresetName[] =>
  argv.flatMap((arg) => {
    const name = arg.startsWith("--") ? arg.slice(2) : "";
    return isPresetName(name) ? [name] : [];
  });

/**
 * The enabled presets, ordered by their last position in `order`. Presets
 * missing from `order` come first, in cd, dvd, bluray order.
 */
export const selectedPresets = (
  flags: { readonly cd: boolean; readonly dvd: boolean; readonly bluray: boolean },
  order: ReadonlyArray<PresetName> = []
): PresetName[] =>
  PRESET_NAMES.filter((name) => flags[name])
    .map((name, index) => ({ name, position: order.lastIndexOf(name), index }))
    .sort((a, b) => a.position - b.position || a.index - b.index)
    .map(({ name }) => name);

/**
 * Explicit and default sizes are read first, then the presets are applied on
 * top of them in command-line order: each caps the part size, and the last
 * one sets the threshold.
 */
export const parsePartitionOptions = (options: {
  readonly partSize: string;
  readonly threshold: string;
  readonly cd: boolean;
  readonly dvd: boolean;
  readonly bluray: boolean;
  readonly presetOrder?: ReadonlyArray<PresetName>;
}): Effect.Effect<ParsedPartitionOptions, ConfigurationError> =>
  Effect.gen(function* () {
    const maxPartSizeBytes = yield* parseMegabytes("--partsize", options.partSize);
    const memoryThresholdBytes = yield* parseMegabytes("--threshold", options.threshold);
    const presets = selectedPresets(options, options.presetOrder);

    const explicit: PartBudget = { maxPartSizeBytes, memoryThresholdBytes };

    return {
      budget: presets.reduce(applyPreset, explicit),
      presets
    };
  });

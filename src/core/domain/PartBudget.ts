export interface PartBudget {
  readonly maxPartSizeBytes: number;
  readonly memoryThresholdBytes: number;
}

export const BYTES_PER_MB = 1024 * 1024;

export const megabytes = (mb: number): number => mb * BYTES_PER_MB;

/** Media capacities in MB. */
export const PRESETS = {
  cd: 700,
  dvd: 4700,
  bluray: 25000
} as const;

export type PresetName = keyof typeof PRESETS;

export const DEFAULT_BUDGET: PartBudget = {
  maxPartSizeBytes: megabytes(100),
  memoryThresholdBytes: megabytes(100)
};

/**
 * Sets the memory threshold to the preset capacity and clamps the part size to it.
 */
export const applyPreset = (budget: PartBudget, preset: PresetName): PartBudget => {
  const capacity = megabytes(PRESETS[preset]);
  return {
    maxPartSizeBytes: Math.min(budget.maxPartSizeBytes, capacity),
    memoryThresholdBytes: capacity
  };
};

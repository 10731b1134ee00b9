import { totalBytes, type SourceFile } from "./SourceFile";

export type PartGroup = ReadonlyArray<SourceFile>;

export type PartPlan = ReadonlyArray<PartGroup>;

/**
 * Greedy single pass over the files in enumeration order.
 *
 * A file that would push the current group past the budget closes that group
 * first. A file larger than the budget therefore lands alone in its own group,
 * which is allowed to exceed the budget. No file is ever skipped or reordered.
 */
export const planParts = (
  files: ReadonlyArray<SourceFile>,
  maxPartSizeBytes: number
): PartPlan => {
  const groups: PartGroup[] = [];
  let current: SourceFile[] = [];
  let runningTotal = 0;

  for (const file of files) {
    if (runningTotal + file.sizeBytes > maxPartSizeBytes && current.length > 0) {
      groups.push(current);
      current = [];
      runningTotal = 0;
    }

    current.push(file);
    runningTotal += file.sizeBytes;
  }

  if (current.length > 0) {
    groups.push(current);
  }

  return groups;
};

export const partTotals = (plan: PartPlan): number[] => plan.map(totalBytes);

export const isOversized = (group: PartGroup, maxPartSizeBytes: number): boolean =>
  group.length === 1 && totalBytes(group) > maxPartSizeBytes;

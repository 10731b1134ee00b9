export interface OutputArtifact {
  readonly partIndex: number;
  readonly path: string;
  readonly sizeBytes: number;
}

export interface RunSummary {
  readonly parts: ReadonlyArray<OutputArtifact>;
  readonly fileCount: number;
  readonly inputBytes: number;
  readonly outputBytes: number;
}

export const partFileName = (partIndex: number): string =>
  `archive_part${String(partIndex).padStart(3, "0")}.zip`;

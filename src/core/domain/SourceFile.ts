export interface SourceFile {
  readonly absolutePath: string;
  /** Entry name inside the archive: the path relative to the file's own directory. */
  readonly relativeName: string;
  readonly sizeBytes: number;
}

export const totalBytes = (files: ReadonlyArray<SourceFile>): number =>
  files.reduce((sum, file) => sum + file.sizeBytes, 0);

export {
  makeMemoryBuffer,
  makeDiskBuffer,
  concatChunks,
  BufferCreateFailed,
  BufferWriteFailed,
  BufferReadFailed,
  BufferDisposed
} from "./BufferSource";
export type {
  BufferSource,
  BufferKind,
  BufferError,
  MemoryBufferSource,
  DiskBufferSource
} from "./BufferSource";

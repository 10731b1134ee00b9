export {
  PartWriterServiceTag,
  PartWriterServiceLive,
  PartWritePermissionDenied,
  PartWriteFailed
} from "./PartWriter";
export type { PartWriterService, PartWriteError } from "./PartWriter";

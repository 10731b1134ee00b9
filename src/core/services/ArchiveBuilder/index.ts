export {
  ArchiveBuilderServiceTag,
  ArchiveBuilderServiceLive,
  ArchiveEntryFailed,
  ArchiveFailed,
  COMPRESSION_LEVEL
} from "./ArchiveBuilder";
export type { ArchiveBuilderService, ArchiveError } from "./ArchiveBuilder";

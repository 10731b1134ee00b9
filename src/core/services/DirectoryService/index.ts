export {
  DirectoryServiceTag,
  DirectoryServiceLive,
  DirectoryNotFound,
  DirectoryPermissionDenied,
  DirectoryUnknownError
} from "./DirectoryService";
export type { DirectoryService, DirectoryError } from "./DirectoryService";

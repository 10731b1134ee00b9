export {
  ScannerServiceTag,
  ScannerServiceLive,
  ScanPathNotFound,
  ScanPermissionDenied,
  ScanFailed,
  FileStatFailed
} from "./ScannerService";
export type { ScannerService, ScannerError } from "./ScannerService";

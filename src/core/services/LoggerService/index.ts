export { LoggerServiceTag, LoggerServiceLive, USAGE_LINES } from "./LoggerService";
export type { LoggerService } from "./LoggerService";

export {
  MemoryStatsServiceTag,
  MemoryStatsServiceLive,
  MemoryStatsServiceFixed,
  MemoryStatsUnavailable
} from "./MemoryStatsService";
export type { MemoryStatsService } from "./MemoryStatsService";

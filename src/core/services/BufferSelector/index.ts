export {
  BufferSelectorServiceTag,
  BufferSelectorServiceLive,
  chooseBufferKind
} from "./BufferSelector";
export type { BufferSelectorService } from "./BufferSelector";

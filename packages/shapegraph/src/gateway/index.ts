export { createMemoryGateway, type MemoryGateway } from "./memory";
export {
  type ApplyDeltaResult,
  failureReason,
  type ReadGraphResult,
  type StoreFailure,
  type StoreGateway,
} from "./types";
export {
  applyDeltaOrThrow,
  applyDeltaSafely,
  readGraphOrThrow,
  readGraphSafely,
} from "./calls";

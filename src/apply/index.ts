export { ApplyExecutor, type ApplyExecutorOptions } from "./apply-executor.js";
export {
  isSuccessful,
  type ApplyResult,
  type FailureReason,
  type PatchFailure,
} from "./types.js";

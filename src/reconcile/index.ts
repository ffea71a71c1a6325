export { Reconciler } from "./reconciler.js";
export { RunStoppedError } from "./types.js";
export type {
  OrgRunResult,
  OrgRunStatus,
  ReconcileMode,
  ReconcileOptions,
} from "./types.js";

export { DiffEngine, type DiffEngineOptions } from "./diff-engine.js";
export {
  reconcile,
  type EntityMatch,
  type ReconcileCallbacks,
  type ReconcileOutcome,
} from "./reconcile.js";
export {
  hasChanges,
  type Addition,
  type Diff,
  type DiffEntry,
  type DiffNode,
  type DiffSummary,
  type FetchFailure,
  type Modification,
  type Unmatched,
} from "./types.js";

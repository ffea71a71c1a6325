export { PatchPlanner, type PlanOptions } from "./patch-planner.js";
export {
  ORG_LANE,
  describePatch,
  repositoryLane,
  type LivePatch,
  type PatchOperation,
  type PatchOrigin,
} from "./types.js";

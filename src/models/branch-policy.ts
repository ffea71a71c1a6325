import { EntityDescriptor, field } from "./entity-descriptor.js";
import type { FieldSpec } from "./types.js";

export const BRANCH_POLICY_TYPES = ["branch", "tag"] as const;

/** Deployment branch policy, only found nested in an environment. */
export class BranchPolicyDescriptor extends EntityDescriptor {
  readonly entityType = "branch_policy";
  readonly identityField = "name";

  readonly fields: readonly FieldSpec[] = [
    field("name", "string", { identity: true }),
    field("type", "string", { enumValues: BRANCH_POLICY_TYPES }),
  ];
}

export const branchPolicyDescriptor = new BranchPolicyDescriptor();

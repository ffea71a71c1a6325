import { EntityDescriptor, field } from "./entity-descriptor.js";
import { branchPolicyDescriptor } from "./branch-policy.js";
import type { FieldSpec } from "./types.js";

export const DEPLOYMENT_BRANCH_POLICIES = [
  "all",
  "protected",
  "selected",
] as const;

export const MAX_WAIT_TIMER_MINUTES = 43200;

/**
 * Deployment environment of a repository. Branch policies are a nested
 * collection diffed item by item.
 */
export class EnvironmentDescriptor extends EntityDescriptor {
  readonly entityType = "environment";
  readonly identityField = "name";

  readonly fields: readonly FieldSpec[] = [
    field("name", "string", { identity: true }),
    field("waitTimer", "number"),
    field("reviewers", "string[]"),
    field("deploymentBranchPolicy", "string", {
      enumValues: DEPLOYMENT_BRANCH_POLICIES,
    }),
    field("branchPolicies", "entity[]", { nested: "branch_policy" }),
  ];

  protected nestedDescriptor(): EntityDescriptor {
    return branchPolicyDescriptor;
  }
}

export const environmentDescriptor = new EnvironmentDescriptor();

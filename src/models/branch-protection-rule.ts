import { EntityDescriptor, field } from "./entity-descriptor.js";
import type { FieldSpec } from "./types.js";

/**
 * Classic branch protection rule of a repository, identified by its branch
 * name pattern. The provider id is the rule's node id, which survives
 * pattern changes.
 */
export class BranchProtectionRuleDescriptor extends EntityDescriptor {
  readonly entityType = "branch_protection_rule";
  readonly identityField = "pattern";

  readonly fields: readonly FieldSpec[] = [
    field("pattern", "string", { identity: true }),
    field("requiresPullRequest", "boolean"),
    field("requiredApprovingReviewCount", "number"),
    field("dismissesStaleReviews", "boolean"),
    field("requiresCodeOwnerReviews", "boolean"),
    field("requireLastPushApproval", "boolean"),
    field("requiresStatusChecks", "boolean"),
    field("requiresStrictStatusChecks", "boolean"),
    field("requiredStatusChecks", "string[]"),
    field("requiresLinearHistory", "boolean"),
    field("requiresCommitSignatures", "boolean"),
    field("requiresConversationResolution", "boolean"),
    field("isAdminEnforced", "boolean"),
    field("allowsForcePushes", "boolean"),
    field("allowsDeletions", "boolean"),
    field("lockBranch", "boolean"),
  ];
}

export const branchProtectionRuleDescriptor =
  new BranchProtectionRuleDescriptor();

import type { EntityDescriptor } from "./entity-descriptor.js";
import { branchPolicyDescriptor } from "./branch-policy.js";
import { branchProtectionRuleDescriptor } from "./branch-protection-rule.js";
import { environmentDescriptor } from "./environment.js";
import { repositoryDescriptor } from "./repository.js";
import { secretDescriptor } from "./secret.js";
import { settingsDescriptor } from "./settings.js";
import type { EntityType } from "./types.js";
import { variableDescriptor } from "./variable.js";
import { webhookDescriptor } from "./webhook.js";

const DESCRIPTORS: Record<EntityType, EntityDescriptor> = {
  settings: settingsDescriptor,
  webhook: webhookDescriptor,
  repository: repositoryDescriptor,
  branch_protection_rule: branchProtectionRuleDescriptor,
  secret: secretDescriptor,
  variable: variableDescriptor,
  environment: environmentDescriptor,
  branch_policy: branchPolicyDescriptor,
};

export function getDescriptor(entityType: EntityType): EntityDescriptor {
  return DESCRIPTORS[entityType];
}

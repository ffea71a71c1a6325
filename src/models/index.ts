export * from "./types.js";
export {
  EntityDescriptor,
  field,
  type DiffFieldsOptions,
  type PayloadOptions,
} from "./entity-descriptor.js";
export { getDescriptor } from "./registry.js";
export { settingsDescriptor, REPOSITORY_PERMISSIONS } from "./settings.js";
export { webhookDescriptor, WEBHOOK_CONTENT_TYPES } from "./webhook.js";
export {
  repositoryDescriptor,
  REPOSITORY_VISIBILITIES,
} from "./repository.js";
export { branchProtectionRuleDescriptor } from "./branch-protection-rule.js";
export { secretDescriptor, SECRET_VISIBILITIES } from "./secret.js";
export { variableDescriptor } from "./variable.js";
export {
  environmentDescriptor,
  DEPLOYMENT_BRANCH_POLICIES,
  MAX_WAIT_TIMER_MINUTES,
} from "./environment.js";
export { branchPolicyDescriptor, BRANCH_POLICY_TYPES } from "./branch-policy.js";
export {
  asObject,
  camelToSnake,
  formatValue,
  haveSameMembers,
  isEntityList,
  isEntityModel,
  isObject,
  isPlaceholderSecret,
  isScalar,
  isScalarList,
  isUnset,
} from "./value-utils.js";

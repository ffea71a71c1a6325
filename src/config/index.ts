export {
  parseConfig,
  loadConfigFile,
  type LoadOptions,
  type OrganizationEntry,
} from "./loader.js";
export {
  validateCollection,
  validateDocument,
  validateOrganization,
} from "./validator.js";
export { applyRepositoryDefaults, normalizeOrganization } from "./normalizer.js";
export {
  interpolateEnvVars,
  interpolateEnvVarsInString,
  type InterpolationOptions,
} from "./env.js";
export {
  OrganizationConfig,
  type OrganizationModels,
} from "./organization-config.js";
export type {
  RawConfig,
  RawDefaults,
  RawEntityConfig,
  RawOrganizationConfig,
  RawRepositoryConfig,
} from "./types.js";
export { ORGANIZATION_KEYS, ROOT_KEYS } from "./types.js";

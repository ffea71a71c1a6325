// =============================================================================
// Raw Config Types (as parsed from YAML, before validation)
// =============================================================================

/** Entity entry as written in the file, keyed by camelCase field names. */
export type RawEntityConfig = Record<string, unknown>;

export interface RawRepositoryConfig extends RawEntityConfig {
  name?: string;
  id?: string | number;
  aliases?: string[];
  branchProtectionRules?: RawEntityConfig[];
  secrets?: RawEntityConfig[];
  variables?: RawEntityConfig[];
  environments?: RawEntityConfig[];
}

export interface RawOrganizationConfig {
  githubId?: string;
  settings?: RawEntityConfig;
  webhooks?: RawEntityConfig[];
  secrets?: RawEntityConfig[];
  variables?: RawEntityConfig[];
  repositories?: RawRepositoryConfig[];
}

export interface RawDefaults {
  /** Merged under every repository entry. */
  repository?: RawRepositoryConfig;
}

export interface RawConfig {
  defaults?: RawDefaults;
  organizations?: RawOrganizationConfig[];
}

// =============================================================================
// Loaded Config
// =============================================================================

/** Keys of an organization entry. */
export const ORGANIZATION_KEYS = [
  "githubId",
  "settings",
  "webhooks",
  "secrets",
  "variables",
  "repositories",
] as const;

/** Keys of the document root. */
export const ROOT_KEYS = ["defaults", "organizations"] as const;

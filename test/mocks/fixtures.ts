import { normalizeOrganization } from "../../src/config/normalizer.js";
import type { OrganizationConfig } from "../../src/config/organization-config.js";
import { getDescriptor } from "../../src/models/registry.js";
import type { EntityModel } from "../../src/models/types.js";
import { InMemoryGateway } from "../../src/provider/in-memory-gateway.js";

/**
 * Expected state of an organization from a configuration-shaped object
 * (camelCase keys, as written in the YAML file).
 */
export function buildOrganization(
  githubId: string,
  config: Record<string, unknown> = {}
): OrganizationConfig {
  return normalizeOrganization({ githubId, ...config });
}

/** Repository model from configuration-shaped fields. */
export function repositoryModel(fields: Record<string, unknown>): EntityModel {
  return getDescriptor("repository").fromConfig(fields);
}

/**
 * In-memory provider holding one organization, given in provider
 * (snake_case) form.
 */
export function seededGateway(
  org: string,
  state: Record<string, unknown> = {}
): InMemoryGateway {
  const gateway = new InMemoryGateway();
  gateway.seedOrganization(org, state);
  return gateway;
}

import { getDescriptor } from "../models/registry.js";
import {
  CHILD_COLLECTION_TYPES,
  REPOSITORY_CHILD_COLLECTIONS,
  type ChildCollection,
  type EntityModel,
  type EntityType,
} from "../models/types.js";
import { asObject, isObject } from "../models/value-utils.js";
import { OrganizationConfig } from "./organization-config.js";

/**
 * Merges repository defaults under every repository entry. Values of the
 * entry win; lists are replaced, not concatenated.
 */
export function applyRepositoryDefaults(
  org: Record<string, unknown>,
  defaults: Record<string, unknown> | undefined
): Record<string, unknown> {
  if (!defaults || !Array.isArray(org.repositories)) {
    return org;
  }
  return {
    ...org,
    repositories: org.repositories.map((repo: unknown) =>
      isObject(repo) ? { ...defaults, ...repo } : repo
    ),
  };
}

function toModels(entityType: EntityType, items: unknown): EntityModel[] {
  if (!Array.isArray(items)) return [];
  const descriptor = getDescriptor(entityType);
  return items
    .filter((item: unknown): item is Record<string, unknown> => isObject(item))
    .map((item) => descriptor.fromConfig(item));
}

function toRepositoryModel(raw: Record<string, unknown>): EntityModel {
  const model = getDescriptor("repository").fromConfig(raw);
  const children: Partial<Record<ChildCollection, readonly EntityModel[]>> = {};
  for (const collection of REPOSITORY_CHILD_COLLECTIONS) {
    if (raw[collection] !== undefined) {
      children[collection] = toModels(
        CHILD_COLLECTION_TYPES[collection],
        raw[collection]
      );
    }
  }
  return { ...model, children };
}

/**
 * Builds the expected entity tree of one validated organization entry.
 */
export function normalizeOrganization(
  raw: Record<string, unknown>
): OrganizationConfig {
  const githubId = String(raw.githubId);
  const repositories = Array.isArray(raw.repositories)
    ? raw.repositories.map((repo: unknown) => toRepositoryModel(asObject(repo)))
    : undefined;

  return new OrganizationConfig(githubId, {
    settings: isObject(raw.settings)
      ? getDescriptor("settings").fromConfig(raw.settings, githubId)
      : undefined,
    webhooks: toModels("webhook", raw.webhooks),
    secrets: toModels("secret", raw.secrets),
    variables: toModels("variable", raw.variables),
    repositories,
  });
}

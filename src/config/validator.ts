import type { EntityDescriptor } from "../models/entity-descriptor.js";
import { MAX_WAIT_TIMER_MINUTES } from "../models/environment.js";
import { getDescriptor } from "../models/registry.js";
import {
  CHILD_COLLECTION_TYPES,
  REPOSITORY_CHILD_COLLECTIONS,
  type EntityType,
  type FieldSpec,
} from "../models/types.js";
import { isObject } from "../models/value-utils.js";
import { ORGANIZATION_KEYS, ROOT_KEYS } from "./types.js";

/** Types whose entries may pin a provider id. */
const ID_TYPES: readonly EntityType[] = [
  "webhook",
  "repository",
  "branch_protection_rule",
  "environment",
];

/** Types whose entries may list previous natural keys. */
const ALIAS_TYPES: readonly EntityType[] = ["webhook", "repository"];

const RESERVED_NAME_PREFIX = "GITHUB_";

type Scope = "organization" | "repository";

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "list";
  return typeof value;
}

/**
 * Checks one value against its field declaration.
 */
function validateField(
  spec: FieldSpec,
  value: unknown,
  path: string,
  issues: string[]
): void {
  // null expresses no preference
  if (value === null) return;

  switch (spec.type) {
    case "boolean":
    case "string":
    case "number":
      if (typeof value !== spec.type) {
        issues.push(`${path}: expected ${spec.type}, got ${describeType(value)}`);
        return;
      }
      break;
    case "string[]":
      if (
        !Array.isArray(value) ||
        !value.every((item: unknown) => typeof item === "string")
      ) {
        issues.push(`${path}: expected a list of strings`);
        return;
      }
      break;
    case "entity[]": {
      if (!Array.isArray(value)) {
        issues.push(`${path}: expected a list, got ${describeType(value)}`);
        return;
      }
      if (spec.nested) {
        validateCollection(
          getDescriptor(spec.nested),
          value,
          path,
          "repository",
          issues
        );
      }
      return;
    }
  }

  if (
    spec.enumValues &&
    typeof value === "string" &&
    !spec.enumValues.includes(value)
  ) {
    issues.push(`${path}: must be one of ${spec.enumValues.join(", ")}`);
  }
}

/**
 * Validates one entity entry. Returns its natural key when it has one.
 */
function validateEntity(
  descriptor: EntityDescriptor,
  raw: unknown,
  path: string,
  scope: Scope,
  issues: string[]
): string | undefined {
  if (!isObject(raw)) {
    issues.push(`${path}: expected an object, got ${describeType(raw)}`);
    return undefined;
  }

  const type = descriptor.entityType;
  for (const [key, value] of Object.entries(raw)) {
    const fieldPath = `${path}.${key}`;
    const spec = descriptor.getField(key);
    if (spec) {
      if (spec.readOnly) {
        issues.push(`${fieldPath}: field is read-only`);
      } else if (spec.orgOnly && scope === "repository") {
        issues.push(`${fieldPath}: only valid at organization scope`);
      } else {
        validateField(spec, value, fieldPath, issues);
      }
      continue;
    }
    if (key === "id" && ID_TYPES.includes(type)) {
      if (typeof value !== "string" && typeof value !== "number") {
        issues.push(`${fieldPath}: expected string or number`);
      }
      continue;
    }
    if (key === "aliases" && ALIAS_TYPES.includes(type)) {
      if (
        !Array.isArray(value) ||
        !value.every((item: unknown) => typeof item === "string")
      ) {
        issues.push(`${fieldPath}: expected a list of strings`);
      }
      continue;
    }
    if (
      type === "repository" &&
      REPOSITORY_CHILD_COLLECTIONS.some((collection) => collection === key)
    ) {
      continue;
    }
    issues.push(`${path}: unknown field "${key}"`);
  }

  const identityField = descriptor.identityField;
  if (!identityField) return undefined;
  const identity = raw[identityField];
  if (typeof identity !== "string" || identity.length === 0) {
    if (identity === undefined || identity === null) {
      issues.push(`${path}: missing required field "${identityField}"`);
    }
    return undefined;
  }

  if (
    (type === "secret" || type === "variable") &&
    identity.toUpperCase().startsWith(RESERVED_NAME_PREFIX)
  ) {
    issues.push(
      `${path}.name: ${type} names must not start with ${RESERVED_NAME_PREFIX}`
    );
  }
  if (type === "secret" && typeof raw.value !== "string") {
    issues.push(`${path}.value: secrets require a value`);
  }
  if (type === "environment" && typeof raw.waitTimer === "number") {
    const timer = raw.waitTimer;
    if (!Number.isInteger(timer) || timer < 0 || timer > MAX_WAIT_TIMER_MINUTES) {
      issues.push(
        `${path}.waitTimer: must be an integer between 0 and ${MAX_WAIT_TIMER_MINUTES}`
      );
    }
  }
  if (type === "branch_protection_rule") {
    const count = raw.requiredApprovingReviewCount;
    if (typeof count === "number" && (!Number.isInteger(count) || count < 0 || count > 6)) {
      issues.push(
        `${path}.requiredApprovingReviewCount: must be an integer between 0 and 6`
      );
    }
  }

  return identity;
}

/**
 * Validates a list of entities of one type within one scope, including the
 * uniqueness of natural keys, aliases and pinned ids.
 */
export function validateCollection(
  descriptor: EntityDescriptor,
  items: unknown,
  path: string,
  scope: Scope,
  issues: string[]
): void {
  if (items === undefined || items === null) return;
  if (!Array.isArray(items)) {
    issues.push(`${path}: expected a list, got ${describeType(items)}`);
    return;
  }

  const keys = new Set<string>();
  const ids = new Set<string>();
  const identityField = descriptor.identityField ?? "name";

  items.forEach((item: unknown, index: number) => {
    const itemPath = `${path}[${index}]`;
    const identity = validateEntity(descriptor, item, itemPath, scope, issues);
    if (identity === undefined || !isObject(item)) return;

    const aliases = Array.isArray(item.aliases)
      ? item.aliases.filter((a: unknown): a is string => typeof a === "string")
      : [];
    for (const key of [identity, ...aliases]) {
      if (keys.has(key)) {
        issues.push(`${itemPath}: duplicate ${identityField} "${key}"`);
      }
      keys.add(key);
    }

    if (typeof item.id === "string" || typeof item.id === "number") {
      const id = String(item.id);
      if (ids.has(id)) {
        issues.push(`${itemPath}: duplicate id "${id}"`);
      }
      ids.add(id);
    }

    if (descriptor.entityType === "repository") {
      for (const collection of REPOSITORY_CHILD_COLLECTIONS) {
        validateCollection(
          getDescriptor(CHILD_COLLECTION_TYPES[collection]),
          item[collection],
          `${itemPath}.${collection}`,
          "repository",
          issues
        );
      }
    }
  });
}

/**
 * Validates one organization entry, with repository defaults already
 * merged in. Returns every issue found.
 */
export function validateOrganization(raw: unknown): string[] {
  const issues: string[] = [];
  if (!isObject(raw)) {
    return [`organization entry must be an object, got ${describeType(raw)}`];
  }

  for (const key of Object.keys(raw)) {
    if (!ORGANIZATION_KEYS.some((known) => known === key)) {
      issues.push(`unknown field "${key}"`);
    }
  }
  if (typeof raw.githubId !== "string" || raw.githubId.length === 0) {
    issues.push(`missing required field "githubId"`);
  }

  if (raw.settings !== undefined) {
    validateEntity(
      getDescriptor("settings"),
      raw.settings,
      "settings",
      "organization",
      issues
    );
  }
  validateCollection(getDescriptor("webhook"), raw.webhooks, "webhooks", "organization", issues);
  validateCollection(getDescriptor("secret"), raw.secrets, "secrets", "organization", issues);
  validateCollection(getDescriptor("variable"), raw.variables, "variables", "organization", issues);
  validateCollection(
    getDescriptor("repository"),
    raw.repositories,
    "repositories",
    "organization",
    issues
  );

  return issues;
}

/**
 * Validates the document structure around the organization entries: root
 * keys, defaults, and unique organization ids.
 */
export function validateDocument(raw: unknown): string[] {
  if (!isObject(raw)) {
    return [`configuration must be a mapping, got ${describeType(raw)}`];
  }

  const issues: string[] = [];
  for (const key of Object.keys(raw)) {
    if (!ROOT_KEYS.some((known) => known === key)) {
      issues.push(`unknown top-level field "${key}"`);
    }
  }

  if (raw.defaults !== undefined) {
    if (!isObject(raw.defaults)) {
      issues.push(`defaults: expected an object, got ${describeType(raw.defaults)}`);
    } else {
      for (const key of Object.keys(raw.defaults)) {
        if (key !== "repository") {
          issues.push(`defaults: unknown field "${key}"`);
        }
      }
      const repository = raw.defaults.repository;
      if (repository !== undefined && !isObject(repository)) {
        issues.push(
          `defaults.repository: expected an object, got ${describeType(repository)}`
        );
      }
      if (isObject(repository)) {
        for (const key of ["name", "id", "aliases"]) {
          if (repository[key] !== undefined) {
            issues.push(`defaults.repository: "${key}" cannot have a default`);
          }
        }
      }
    }
  }

  if (!Array.isArray(raw.organizations)) {
    issues.push(`organizations: expected a list of organizations`);
    return issues;
  }

  const seen = new Set<string>();
  raw.organizations.forEach((org: unknown, index: number) => {
    if (isObject(org) && typeof org.githubId === "string") {
      if (seen.has(org.githubId)) {
        issues.push(
          `organizations[${index}]: duplicate githubId "${org.githubId}"`
        );
      }
      seen.add(org.githubId);
    }
  });

  return issues;
}

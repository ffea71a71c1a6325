// =============================================================================
// Entity Types
// =============================================================================

export type EntityType =
  | "settings"
  | "webhook"
  | "repository"
  | "branch_protection_rule"
  | "secret"
  | "variable"
  | "environment"
  | "branch_policy";

/** Collections owned by a repository, in the order they are reconciled. */
export const REPOSITORY_CHILD_COLLECTIONS = [
  "branchProtectionRules",
  "secrets",
  "variables",
  "environments",
] as const;

export type ChildCollection = (typeof REPOSITORY_CHILD_COLLECTIONS)[number];

export const CHILD_COLLECTION_TYPES: Record<ChildCollection, EntityType> = {
  branchProtectionRules: "branch_protection_rule",
  secrets: "secret",
  variables: "variable",
  environments: "environment",
};

export type Scalar = string | number | boolean | null;

export type FieldValue = Scalar | readonly Scalar[] | readonly EntityModel[];

/**
 * One configuration entity, either parsed from the expected configuration or
 * mapped from data returned by a provider.
 */
export interface EntityModel {
  readonly entityType: EntityType;
  /** Natural key within the parent scope. */
  readonly identity: string;
  /** Field values keyed by model (camelCase) field name. */
  readonly fields: Readonly<Record<string, FieldValue | undefined>>;
  /** Stable identifier assigned by the provider. */
  readonly providerId?: string;
  /** Previous natural keys that still identify this entity. */
  readonly aliases?: readonly string[];
  /** Child collections (repositories only). */
  readonly children?: Readonly<Partial<Record<ChildCollection, readonly EntityModel[]>>>;
}

/**
 * Location of an entity collection: the organization, plus the owning
 * repository for repository-scoped entities.
 */
export interface ParentScope {
  readonly org: string;
  readonly repository?: string;
  readonly repositoryId?: string;
}

// =============================================================================
// Field Schema
// =============================================================================

export type FieldType = "boolean" | "string" | "number" | "string[]" | "entity[]";

export interface FieldSpec {
  /** Model / configuration name (camelCase). */
  readonly name: string;
  /** Provider name (snake_case). */
  readonly apiName: string;
  readonly type: FieldType;
  /** Entity type of the items of an `entity[]` field. */
  readonly nested?: EntityType;
  readonly enumValues?: readonly string[];
  /** Reported by the provider but never written. */
  readonly readOnly?: boolean;
  /** Written but never reported back by the provider. */
  readonly writeOnly?: boolean;
  /** Written through its own sub-resource rather than the entity update. */
  readonly independent?: boolean;
  /** Writing this value makes the entity read-only afterwards. */
  readonly lockingValue?: Scalar;
  /** Only valid for organization-scoped entities. */
  readonly orgOnly?: boolean;
  /** Field holds the natural key. */
  readonly identity?: boolean;
}

export interface FieldChange {
  readonly expected: FieldValue;
  readonly current: FieldValue | undefined;
  /** Item-level outcome for `entity[]` fields. */
  readonly nested?: NestedDiff;
}

export type FieldChanges = Readonly<Record<string, FieldChange>>;

export interface NestedDiff {
  readonly additions: readonly EntityModel[];
  readonly modifications: readonly {
    readonly identity: string;
    readonly changedFields: FieldChanges;
  }[];
  readonly unmatched: readonly EntityModel[];
}

export type RawEntity = Record<string, unknown>;

export function formatScope(scope: ParentScope): string {
  return scope.repository ? `${scope.org}/${scope.repository}` : scope.org;
}

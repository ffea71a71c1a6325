import type { EntityType, ParentScope } from "../models/types.js";
import { formatScope } from "../models/types.js";

export type PatchOperation = "create" | "update" | "delete";

/** Kind of diff entry a patch was planned from. */
export type PatchOrigin = "addition" | "modification" | "unmatched";

/**
 * One atomic write against the provider.
 */
export interface LivePatch {
  /** Stable id, unique within one plan. */
  readonly id: string;
  readonly entityType: EntityType;
  readonly operation: PatchOperation;
  readonly origin: PatchOrigin;
  readonly scope: ParentScope;
  /** Natural key after the patch is applied. */
  readonly identity: string;
  /** Natural key known by the provider when the patch renames the entity. */
  readonly previousIdentity?: string;
  readonly providerId?: string;
  /** Independently written field targeted by this patch. */
  readonly subResource?: string;
  /** Provider (snake_case) keyed field values. Empty for deletes. */
  readonly payload: Readonly<Record<string, unknown>>;
  /** Model names of the fields this patch changes. */
  readonly changedFields: readonly string[];
  /** Id of an earlier create or rename patch of the same lane. */
  readonly dependsOn?: string;
  /**
   * Execution lane. Patches of one lane run in order, separate lanes are
   * independent of each other.
   */
  readonly lane: string;
}

export const ORG_LANE = "org";

export function repositoryLane(repository: string): string {
  return `repo:${repository}`;
}

/**
 * Short description used in logs and reports,
 * e.g. `update repository "acme/site" (topics)`.
 */
export function describePatch(patch: LivePatch): string {
  const label = patch.entityType.replace(/_/g, " ");
  const location =
    patch.entityType === "settings"
      ? patch.scope.org
      : `${formatScope(patch.scope)}/${patch.identity}`;
  const rename =
    patch.previousIdentity !== undefined
      ? ` (renamed from "${patch.previousIdentity}")`
      : "";
  const sub = patch.subResource ? ` (${patch.subResource})` : "";
  return `${patch.operation} ${label} "${location}"${rename}${sub}`;
}

import type {
  EntityModel,
  EntityType,
  FieldChanges,
  ParentScope,
} from "../models/types.js";

// =============================================================================
// Diff Entries
// =============================================================================

/** Present in the expected state, absent live. */
export interface Addition {
  readonly kind: "addition";
  readonly expected: EntityModel;
}

/** Present on both sides with at least one differing field. */
export interface Modification {
  readonly kind: "modification";
  readonly identity: string;
  /** Live natural key when the entity is being renamed. */
  readonly previousIdentity?: string;
  readonly providerId?: string;
  readonly changedFields: FieldChanges;
  readonly expected: EntityModel;
  readonly current: EntityModel;
}

/** Present live, absent from the expected state. Reported, never deleted by default. */
export interface Unmatched {
  readonly kind: "unmatched";
  readonly current: EntityModel;
}

export type DiffEntry = Addition | Modification | Unmatched;

/**
 * Outcome of one scope × entity type pair. Only nodes with at least one
 * entry are materialized.
 */
export interface DiffNode {
  readonly scope: ParentScope;
  readonly entityType: EntityType;
  readonly additions: readonly Addition[];
  readonly modifications: readonly Modification[];
  readonly unmatched: readonly Unmatched[];
}

export interface DiffSummary {
  /** One per Addition. */
  readonly additions: number;
  /** One per changed field of every Modification, plus one per Unmatched. */
  readonly differences: number;
  /** Unmatched entities, also included in `differences`. */
  readonly unmatched: number;
}

/** A collection whose current state could not be read. */
export interface FetchFailure {
  readonly scope: ParentScope;
  readonly entityType: EntityType;
  readonly message: string;
  readonly status?: number;
}

export interface Diff {
  readonly org: string;
  /** Nodes in traversal order. */
  readonly nodes: readonly DiffNode[];
  readonly summary: DiffSummary;
  readonly warnings: readonly string[];
  readonly fetchFailures: readonly FetchFailure[];
}

export function hasChanges(diff: Diff): boolean {
  return diff.summary.additions > 0 || diff.summary.differences > 0;
}

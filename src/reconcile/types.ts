import type { ApplyResult } from "../apply/types.js";
import type { Diff } from "../diff/types.js";
import type { LivePatch } from "../plan/types.js";
import { AuthenticationError } from "../shared/errors.js";
import type { ILogger } from "../shared/logger.js";

export type ReconcileMode = "plan" | "apply";

/**
 * Options of one reconciliation run.
 */
export interface ReconcileOptions {
  mode: ReconcileMode;
  /** Emit delete patches for unmatched entities. */
  prune?: boolean;
  /** Rewrite secret values the provider never reports back. */
  updateSecrets?: boolean;
  /** Treat child collections that cannot be read as empty, with a warning. */
  tolerateFetchErrors?: boolean;
  /** Glob restricting which repositories are reconciled. */
  repoFilter?: string;
  /** Lanes dispatched at the same time. Default 4. */
  concurrency?: number;
  /** Organizations processed at the same time. Default 1. */
  orgConcurrency?: number;
  signal?: AbortSignal;
  logger?: ILogger;
}

export type OrgRunStatus = "succeeded" | "failed" | "skipped";

/**
 * Outcome of one organization.
 */
export interface OrgRunResult {
  readonly org: string;
  readonly status: OrgRunStatus;
  /** Absent when the organization failed before diffing. */
  readonly diff?: Diff;
  readonly patches: readonly LivePatch[];
  /** Present in apply mode once patches were executed. */
  readonly apply?: ApplyResult;
  readonly error?: Error;
}

/**
 * Rejected credentials stopped the run. Carries the results of every
 * organization, including what was applied before the stop.
 */
export class RunStoppedError extends AuthenticationError {
  readonly results: readonly OrgRunResult[];

  constructor(error: AuthenticationError, results: readonly OrgRunResult[]) {
    super(error.message, error.status);
    this.results = results;
  }
}

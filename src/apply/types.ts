import type { AuthenticationError } from "../shared/errors.js";
import type { LivePatch } from "../plan/types.js";

export type FailureReason = "provider-error" | "parent-failed";

export interface PatchFailure {
  readonly patch: LivePatch;
  readonly reason: FailureReason;
  readonly message: string;
  readonly status?: number;
}

export interface ApplyResult {
  /** Successful create patches. */
  readonly additions: number;
  /** Fields changed by successful updates of existing entities. */
  readonly differences: number;
  /** Successful delete patches. */
  readonly deletions: number;
  readonly failures: readonly PatchFailure[];
  /** Ids of patches that were applied, in completion order. */
  readonly applied: readonly string[];
  /** Patches never dispatched because the run was cancelled or aborted. */
  readonly notDispatched: readonly LivePatch[];
  /** Set when credentials were rejected and dispatching stopped. */
  readonly fatalError?: AuthenticationError;
}

export function isSuccessful(result: ApplyResult): boolean {
  return (
    result.failures.length === 0 &&
    result.notDispatched.length === 0 &&
    result.fatalError === undefined
  );
}

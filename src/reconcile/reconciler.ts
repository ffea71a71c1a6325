import { ApplyExecutor } from "../apply/apply-executor.js";
import { isSuccessful } from "../apply/types.js";
import type { OrganizationEntry } from "../config/loader.js";
import type { OrganizationConfig } from "../config/organization-config.js";
import { DiffEngine } from "../diff/diff-engine.js";
import { hasChanges } from "../diff/types.js";
import { PatchPlanner } from "../plan/patch-planner.js";
import type { IProviderGateway } from "../provider/types.js";
import { mapWithConcurrency } from "../shared/concurrency.js";
import {
  formatErrorMessage,
  isAuthenticationError,
  type AuthenticationError,
} from "../shared/errors.js";
import { logger as defaultLogger, type ILogger } from "../shared/logger.js";
import {
  RunStoppedError,
  type OrgRunResult,
  type ReconcileOptions,
} from "./types.js";

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Runs diff, plan and (in apply mode) apply for each organization.
 *
 * Failures are confined to the organization they happen in. Rejected
 * credentials are the exception: no further organization is started and a
 * RunStoppedError carrying every result is thrown once the running ones have
 * finished.
 */
export class Reconciler {
  private readonly logger: ILogger;
  private readonly planner = new PatchPlanner();

  constructor(
    private readonly gateway: IProviderGateway,
    private readonly options: ReconcileOptions
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * @throws RunStoppedError when the credentials were rejected, carrying the
   * results gathered so far
   */
  async run(entries: readonly OrganizationEntry[]): Promise<OrgRunResult[]> {
    this.logger.setTotal(entries.length);
    let fatal: AuthenticationError | undefined;

    const results = await mapWithConcurrency(
      entries,
      this.options.orgConcurrency ?? 1,
      async (entry, index): Promise<OrgRunResult> => {
        const current = index + 1;
        if (fatal || this.options.signal?.aborted) {
          const reason = fatal
            ? "credentials were rejected"
            : "run was cancelled";
          this.logger.skip(current, entry.githubId, reason);
          return { org: entry.githubId, status: "skipped", patches: [] };
        }

        try {
          const config = entry.load();
          const result = await this.reconcileOrganization(config, current);
          if (isAuthenticationError(result.error)) {
            fatal = result.error;
          }
          return result;
        } catch (error) {
          if (isAuthenticationError(error)) {
            fatal = error;
          }
          this.logger.error(current, entry.githubId, formatErrorMessage(error));
          return {
            org: entry.githubId,
            status: "failed",
            patches: [],
            error: toError(error),
          };
        }
      }
    );

    if (fatal) {
      throw new RunStoppedError(fatal, results);
    }
    return results;
  }

  /**
   * Reconciles one organization. Credentials rejected while diffing are
   * thrown; rejected while applying, they are returned as `error` next to
   * the partial apply result.
   *
   * @param current - 1-based position used in progress output
   */
  async reconcileOrganization(
    org: OrganizationConfig,
    current = 1
  ): Promise<OrgRunResult> {
    const name = org.githubId;
    const { mode, concurrency, prune, signal } = this.options;

    this.logger.progress(current, name, "Computing diff...");
    const engine = new DiffEngine(this.gateway, {
      updateSecrets: this.options.updateSecrets,
      tolerateFetchErrors: this.options.tolerateFetchErrors,
      repoFilter: this.options.repoFilter,
      concurrency,
      logger: this.logger,
    });
    const diff = await engine.compute(org);
    const patches = this.planner.plan(diff, { prune });
    const fetchFailed = diff.fetchFailures.length > 0;

    if (mode === "plan" || patches.length === 0) {
      if (fetchFailed) {
        this.logger.error(
          current,
          name,
          `${diff.fetchFailures.length} collection(s) could not be read`
        );
      } else {
        this.logger.success(
          current,
          name,
          hasChanges(diff) ? `${patches.length} patch(es) planned` : "No changes"
        );
      }
      return {
        org: name,
        status: fetchFailed ? "failed" : "succeeded",
        diff,
        patches,
      };
    }

    this.logger.progress(current, name, `Applying ${patches.length} patch(es)...`);
    const executor = new ApplyExecutor(this.gateway, {
      concurrency,
      signal,
      logger: this.logger,
    });
    const apply = await executor.run(patches);
    if (apply.fatalError) {
      this.logger.error(current, name, `Run stopped: ${apply.fatalError.message}`);
      return {
        org: name,
        status: "failed",
        diff,
        patches,
        apply,
        error: apply.fatalError,
      };
    }

    const succeeded = isSuccessful(apply) && !fetchFailed;
    if (succeeded) {
      this.logger.success(current, name, `${apply.applied.length} patch(es) applied`);
    } else {
      this.logger.error(
        current,
        name,
        `${apply.failures.length} patch(es) failed, ${apply.notDispatched.length} not dispatched`
      );
    }
    return {
      org: name,
      status: succeeded ? "succeeded" : "failed",
      diff,
      patches,
      apply,
    };
  }
}

import { getDescriptor } from "../models/registry.js";
import type { ParentScope } from "../models/types.js";
import { describePatch, type LivePatch } from "../plan/types.js";
import type { IProviderGateway, PatchTarget } from "../provider/types.js";
import { mapWithConcurrency } from "../shared/concurrency.js";
import {
  formatErrorMessage,
  getErrorStatus,
  isAuthenticationError,
  type AuthenticationError,
} from "../shared/errors.js";
import { logger as defaultLogger, type ILogger } from "../shared/logger.js";
import type { ApplyResult, PatchFailure } from "./types.js";

export interface ApplyExecutorOptions {
  /** Lanes dispatched at the same time. */
  concurrency?: number;
  signal?: AbortSignal;
  logger?: ILogger;
}

type PatchState =
  | { status: "applied"; createdId?: string }
  | { status: "failed" };

/**
 * Mutable bookkeeping of one run.
 */
class RunState {
  readonly failures: PatchFailure[] = [];
  readonly applied: string[] = [];
  readonly notDispatched: LivePatch[] = [];
  readonly settled = new Map<string, PatchState>();
  additions = 0;
  differences = 0;
  deletions = 0;
  fatalError?: AuthenticationError;

  toResult(order: ReadonlyMap<string, number>): ApplyResult {
    const byPlanOrder = <T>(items: T[], id: (item: T) => string): T[] =>
      [...items].sort((a, b) => (order.get(id(a)) ?? 0) - (order.get(id(b)) ?? 0));
    return {
      additions: this.additions,
      differences: this.differences,
      deletions: this.deletions,
      failures: byPlanOrder(this.failures, (f) => f.patch.id),
      applied: [...this.applied],
      notDispatched: byPlanOrder(this.notDispatched, (p) => p.id),
      ...(this.fatalError ? { fatalError: this.fatalError } : {}),
    };
  }
}

/**
 * Executes live patches against a provider.
 *
 * Patches are grouped into lanes. A lane runs strictly in plan order while
 * separate lanes run concurrently. A failing patch is recorded and the run
 * continues; patches depending on a failed create or rename are skipped.
 * Rejected credentials stop all further dispatching.
 */
export class ApplyExecutor {
  private readonly logger: ILogger;

  constructor(
    private readonly gateway: IProviderGateway,
    private readonly options: ApplyExecutorOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  async run(patches: readonly LivePatch[]): Promise<ApplyResult> {
    const state = new RunState();
    const order = new Map(patches.map((patch, i) => [patch.id, i]));
    const byId = new Map(patches.map((patch) => [patch.id, patch]));

    const lanes = new Map<string, LivePatch[]>();
    for (const patch of patches) {
      const lane = lanes.get(patch.lane);
      if (lane) {
        lane.push(patch);
      } else {
        lanes.set(patch.lane, [patch]);
      }
    }

    await mapWithConcurrency(
      [...lanes.values()],
      this.options.concurrency ?? 4,
      async (lane) => {
        for (const patch of lane) {
          await this.dispatch(patch, byId, state);
        }
      }
    );

    return state.toResult(order);
  }

  private async dispatch(
    patch: LivePatch,
    byId: ReadonlyMap<string, LivePatch>,
    state: RunState
  ): Promise<void> {
    if (state.fatalError || this.options.signal?.aborted) {
      state.notDispatched.push(patch);
      return;
    }

    const dependency = patch.dependsOn ? byId.get(patch.dependsOn) : undefined;
    const dependencyState = dependency
      ? state.settled.get(dependency.id)
      : undefined;

    if (dependency && dependencyState?.status !== "applied") {
      const message =
        dependency.operation === "create"
          ? "parent creation failed"
          : "parent rename failed";
      state.settled.set(patch.id, { status: "failed" });
      state.failures.push({ patch, reason: "parent-failed", message });
      this.logger.patchResult(describePatch(patch), "skipped", message);
      return;
    }

    const createdId =
      dependencyState?.status === "applied" ? dependencyState.createdId : undefined;
    const scope = this.resolveScope(patch, dependency, createdId);

    try {
      const result = await this.execute(patch, scope, {
        identity: patch.identity,
        ...(patch.previousIdentity !== undefined
          ? { previousIdentity: patch.previousIdentity }
          : {}),
        ...this.resolveProviderId(patch, dependency, createdId),
        ...(patch.subResource !== undefined
          ? { subResource: patch.subResource }
          : {}),
      });
      state.settled.set(patch.id, { status: "applied", ...result });
      state.applied.push(patch.id);
      this.count(patch, state);
      this.logger.patchResult(describePatch(patch), "applied");
    } catch (error) {
      state.settled.set(patch.id, { status: "failed" });
      const message = formatErrorMessage(error);
      const status = getErrorStatus(error);
      state.failures.push({
        patch,
        reason: "provider-error",
        message,
        ...(status !== undefined ? { status } : {}),
      });
      this.logger.patchResult(describePatch(patch), "failed", message);
      if (isAuthenticationError(error)) {
        state.fatalError = error;
      }
    }
  }

  private async execute(
    patch: LivePatch,
    scope: ParentScope,
    target: PatchTarget
  ): Promise<{ createdId?: string }> {
    const gateway = this.gateway.forType(patch.entityType);
    switch (patch.operation) {
      case "create": {
        const raw = await gateway.create(scope, { ...patch.payload });
        const id = raw[getDescriptor(patch.entityType).providerIdKey];
        return typeof id === "string" || typeof id === "number"
          ? { createdId: String(id) }
          : {};
      }
      case "update":
        await gateway.update(scope, target, { ...patch.payload });
        return {};
      case "delete":
        await gateway.delete(scope, target);
        return {};
    }
  }

  /**
   * Children of a repository created in this run learn its provider id.
   */
  private resolveScope(
    patch: LivePatch,
    dependency: LivePatch | undefined,
    createdId: string | undefined
  ): ParentScope {
    if (
      createdId !== undefined &&
      dependency?.entityType === "repository" &&
      patch.entityType !== "repository"
    ) {
      return { ...patch.scope, repositoryId: createdId };
    }
    return patch.scope;
  }

  /**
   * Follow-up writes of an entity created in this run learn its provider id.
   */
  private resolveProviderId(
    patch: LivePatch,
    dependency: LivePatch | undefined,
    createdId: string | undefined
  ): { providerId?: string } {
    if (patch.providerId !== undefined) {
      return { providerId: patch.providerId };
    }
    if (
      createdId !== undefined &&
      dependency?.entityType === patch.entityType &&
      dependency.identity === patch.identity
    ) {
      return { providerId: createdId };
    }
    return {};
  }

  private count(patch: LivePatch, state: RunState): void {
    switch (patch.operation) {
      case "create":
        state.additions++;
        break;
      case "update":
        if (patch.origin === "modification") {
          state.differences += patch.changedFields.length;
        }
        break;
      case "delete":
        state.deletions++;
        break;
    }
  }
}

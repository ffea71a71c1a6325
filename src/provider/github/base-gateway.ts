import type { EntityType, ParentScope, RawEntity } from "../../models/types.js";
import {
  ProviderFetchError,
  ProviderOperationError,
  formatErrorMessage,
  getErrorStatus,
  isAuthenticationError,
} from "../../shared/errors.js";
import type { IEntityGateway, PatchTarget } from "../types.js";
import type { GhApiClient } from "./gh-api-client.js";

/**
 * Common shape of the GitHub gateways: subclasses implement the raw calls,
 * this class turns failures into provider errors carrying the target.
 */
export abstract class GitHubEntityGateway implements IEntityGateway {
  abstract readonly entityType: EntityType;

  constructor(protected readonly client: GhApiClient) {}

  protected abstract read(scope: ParentScope): Promise<RawEntity[]>;
  protected abstract write(
    scope: ParentScope,
    target: PatchTarget | undefined,
    payload: Record<string, unknown>
  ): Promise<RawEntity | undefined>;
  protected abstract remove(scope: ParentScope, target: PatchTarget): Promise<void>;

  async fetchCurrent(scope: ParentScope): Promise<RawEntity[]> {
    try {
      return await this.read(scope);
    } catch (error) {
      if (isAuthenticationError(error)) throw error;
      throw new ProviderFetchError(formatErrorMessage(error), {
        entityType: this.entityType,
        scope,
        status: getErrorStatus(error),
      });
    }
  }

  async create(
    scope: ParentScope,
    payload: Record<string, unknown>
  ): Promise<RawEntity> {
    const identity = this.identityOf(payload);
    const created = await this.guard(scope, identity, () =>
      this.write(scope, undefined, payload)
    );
    return created ?? { ...payload };
  }

  async update(
    scope: ParentScope,
    target: PatchTarget,
    payload: Record<string, unknown>
  ): Promise<void> {
    await this.guard(scope, target.identity, () =>
      this.write(scope, target, payload)
    );
  }

  async delete(scope: ParentScope, target: PatchTarget): Promise<void> {
    await this.guard(scope, target.identity, () => this.remove(scope, target));
  }

  /** Natural key carried by a create payload. */
  protected identityOf(payload: Record<string, unknown>): string {
    return typeof payload.name === "string" ? payload.name : "";
  }

  /** `owner/name` path segment of the repository a scope points at. */
  protected repoPath(scope: ParentScope): string {
    if (!scope.repository) {
      throw new Error(`${this.entityType} requires a repository scope`);
    }
    return `${encodeURIComponent(scope.org)}/${encodeURIComponent(scope.repository)}`;
  }

  private async guard<T>(
    scope: ParentScope,
    identity: string,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isAuthenticationError(error)) throw error;
      throw new ProviderOperationError(formatErrorMessage(error), {
        entityType: this.entityType,
        identity,
        scope,
        status: getErrorStatus(error),
      });
    }
  }
}

/** Current name of the targeted entity, before any rename in the payload. */
export function currentName(target: PatchTarget): string {
  return target.previousIdentity ?? target.identity;
}

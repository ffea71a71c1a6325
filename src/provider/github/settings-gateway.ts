import type { ParentScope, RawEntity } from "../../models/types.js";
import { isObject } from "../../models/value-utils.js";
import type { PatchTarget } from "../types.js";
import { GitHubEntityGateway } from "./base-gateway.js";

/**
 * Organization settings through `/orgs/{org}`. Settings always exist and
 * can only be updated.
 */
export class SettingsGateway extends GitHubEntityGateway {
  readonly entityType = "settings";

  protected async read(scope: ParentScope): Promise<RawEntity[]> {
    const data = await this.client.json(
      "GET",
      `/orgs/${encodeURIComponent(scope.org)}`
    );
    if (!isObject(data)) return [];
    const plan = isObject(data.plan) ? data.plan.name : data.plan;
    return [{ ...data, plan }];
  }

  protected async write(
    scope: ParentScope,
    _target: PatchTarget | undefined,
    payload: Record<string, unknown>
  ): Promise<RawEntity | undefined> {
    if (Object.keys(payload).length === 0) return undefined;
    await this.client.api(
      "PATCH",
      `/orgs/${encodeURIComponent(scope.org)}`,
      payload
    );
    return undefined;
  }

  protected async remove(): Promise<void> {
    throw new Error("Organization settings cannot be deleted");
  }

  protected identityOf(): string {
    return "settings";
  }
}

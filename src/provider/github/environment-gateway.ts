import type { ParentScope, RawEntity } from "../../models/types.js";
import { asObject, isObject } from "../../models/value-utils.js";
import type { PatchTarget } from "../types.js";
import { GitHubEntityGateway, currentName } from "./base-gateway.js";

/**
 * Maps the protection rules of an environment onto flat fields.
 * Reviewers are reported as `@login` for users and `@org/slug` for teams.
 */
export function fromEnvironmentResponse(
  env: Record<string, unknown>,
  org: string
): RawEntity {
  const record: RawEntity = { id: env.id, name: env.name };
  const rules = Array.isArray(env.protection_rules) ? env.protection_rules : [];
  const reviewers: string[] = [];
  record.wait_timer = 0;

  for (const rule of rules) {
    if (!isObject(rule)) continue;
    if (rule.type === "wait_timer") {
      record.wait_timer = rule.wait_timer;
    }
    if (rule.type === "required_reviewers" && Array.isArray(rule.reviewers)) {
      for (const entry of rule.reviewers) {
        const reviewer = asObject(asObject(entry).reviewer);
        if (typeof reviewer.login === "string") {
          reviewers.push(`@${reviewer.login}`);
        } else if (typeof reviewer.slug === "string") {
          reviewers.push(`@${org}/${reviewer.slug}`);
        }
      }
    }
  }
  record.reviewers = reviewers;

  const policy = env.deployment_branch_policy;
  if (!isObject(policy)) {
    record.deployment_branch_policy = "all";
  } else if (policy.protected_branches === true) {
    record.deployment_branch_policy = "protected";
  } else {
    record.deployment_branch_policy = "selected";
  }
  return record;
}

/**
 * Maps the `deployment_branch_policy` model value onto the API object.
 */
export function toDeploymentBranchPolicy(value: unknown): unknown {
  switch (value) {
    case "protected":
      return { protected_branches: true, custom_branch_policies: false };
    case "selected":
      return { protected_branches: false, custom_branch_policies: true };
    default:
      return null;
  }
}

/**
 * Deployment environments of a repository. Environments are written with an
 * idempotent PUT; their branch policies are a nested collection synced item
 * by item afterwards.
 */
export class EnvironmentGateway extends GitHubEntityGateway {
  readonly entityType = "environment";

  protected async read(scope: ParentScope): Promise<RawEntity[]> {
    const path = this.environmentsPath(scope);
    const environments = await this.client.list(path, ".environments[]");
    const result: RawEntity[] = [];
    for (const env of environments) {
      const record = fromEnvironmentResponse(env, scope.org);
      if (record.deployment_branch_policy === "selected") {
        record.branch_policies = (
          await this.readBranchPolicies(path, String(env.name))
        ).map((policy) => ({ name: policy.name, type: policy.type }));
      }
      result.push(record);
    }
    return result;
  }

  protected async write(
    scope: ParentScope,
    target: PatchTarget | undefined,
    payload: Record<string, unknown>
  ): Promise<RawEntity | undefined> {
    const name = target ? currentName(target) : this.identityOf(payload);
    if (target && target.identity !== name) {
      throw new Error(`Environment "${name}" cannot be renamed to "${target.identity}"`);
    }

    const path = this.environmentsPath(scope);
    const body: Record<string, unknown> = {};
    if (payload.wait_timer !== undefined) body.wait_timer = payload.wait_timer;
    if (payload.reviewers !== undefined) {
      body.reviewers = await this.resolveReviewers(scope.org, payload.reviewers);
    }
    if (payload.deployment_branch_policy !== undefined) {
      body.deployment_branch_policy = toDeploymentBranchPolicy(
        payload.deployment_branch_policy
      );
    }

    const response = asObject(
      await this.client.json("PUT", `${path}/${encodeURIComponent(name)}`, body)
    );

    if (Array.isArray(payload.branch_policies)) {
      await this.syncBranchPolicies(path, name, payload.branch_policies);
    }
    return target ? undefined : { ...payload, id: response.id };
  }

  protected async remove(scope: ParentScope, target: PatchTarget): Promise<void> {
    await this.client.api(
      "DELETE",
      `${this.environmentsPath(scope)}/${encodeURIComponent(target.identity)}`
    );
  }

  private environmentsPath(scope: ParentScope): string {
    return `/repos/${this.repoPath(scope)}/environments`;
  }

  private async readBranchPolicies(
    path: string,
    environment: string
  ): Promise<Record<string, unknown>[]> {
    return this.client.list(
      `${path}/${encodeURIComponent(environment)}/deployment-branch-policies`,
      ".branch_policies[]"
    );
  }

  /**
   * Creates missing branch policies and deletes the ones no longer listed.
   */
  private async syncBranchPolicies(
    path: string,
    environment: string,
    expected: unknown[]
  ): Promise<void> {
    const policiesPath = `${path}/${encodeURIComponent(environment)}/deployment-branch-policies`;
    const current = await this.readBranchPolicies(path, environment);
    const wanted = expected.filter(isObject);
    const key = (p: Record<string, unknown>): string =>
      `${String(p.type ?? "branch")}:${String(p.name)}`;
    const currentKeys = new Set(current.map(key));
    const wantedKeys = new Set(wanted.map(key));

    for (const policy of current) {
      if (!wantedKeys.has(key(policy))) {
        await this.client.api("DELETE", `${policiesPath}/${String(policy.id)}`);
      }
    }
    for (const policy of wanted) {
      if (!currentKeys.has(key(policy))) {
        await this.client.api("POST", policiesPath, {
          name: policy.name,
          type: policy.type ?? "branch",
        });
      }
    }
  }

  private async resolveReviewers(
    org: string,
    reviewers: unknown
  ): Promise<{ type: "User" | "Team"; id: unknown }[]> {
    if (!Array.isArray(reviewers)) return [];
    const resolved: { type: "User" | "Team"; id: unknown }[] = [];
    for (const reviewer of reviewers) {
      const handle = String(reviewer).replace(/^@/, "");
      const slash = handle.indexOf("/");
      if (slash >= 0) {
        const team = asObject(
          await this.client.json(
            "GET",
            `/orgs/${encodeURIComponent(handle.slice(0, slash) || org)}/teams/${encodeURIComponent(handle.slice(slash + 1))}`
          )
        );
        resolved.push({ type: "Team", id: team.id });
      } else {
        const user = asObject(
          await this.client.json("GET", `/users/${encodeURIComponent(handle)}`)
        );
        resolved.push({ type: "User", id: user.id });
      }
    }
    return resolved;
  }
}

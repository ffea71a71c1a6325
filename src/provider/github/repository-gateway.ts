import type { ParentScope, RawEntity } from "../../models/types.js";
import { isObject } from "../../models/value-utils.js";
import { mapWithConcurrency } from "../../shared/concurrency.js";
import { getErrorStatus } from "../../shared/errors.js";
import type { PatchTarget } from "../types.js";
import { GitHubEntityGateway, currentName } from "./base-gateway.js";
import type { GhApiClient } from "./gh-api-client.js";

/** Security toggles read and written through their own endpoints. */
const TOGGLE_ENDPOINTS = {
  vulnerability_alerts: "vulnerability-alerts",
  automated_security_fixes: "automated-security-fixes",
} as const;

type ToggleKey = keyof typeof TOGGLE_ENDPOINTS;

function isToggleKey(key: string): key is ToggleKey {
  return key in TOGGLE_ENDPOINTS;
}

/**
 * Repositories of an organization. Topics, archiving and the security
 * toggles are written through dedicated calls, everything else through
 * `PATCH /repos/{owner}/{repo}`.
 */
export class RepositoryGateway extends GitHubEntityGateway {
  readonly entityType = "repository";

  constructor(
    client: GhApiClient,
    private readonly concurrency = 4
  ) {
    super(client);
  }

  protected async read(scope: ParentScope): Promise<RawEntity[]> {
    const repos = await this.client.list(
      `/orgs/${encodeURIComponent(scope.org)}/repos?per_page=100&type=all`
    );
    return mapWithConcurrency(repos, this.concurrency, async (repo) => {
      const path = `${encodeURIComponent(scope.org)}/${encodeURIComponent(String(repo.name))}`;
      // Archived repositories do not report their security toggles
      if (repo.archived === true) return repo;
      return {
        ...repo,
        vulnerability_alerts: await this.readVulnerabilityAlerts(path),
        automated_security_fixes: await this.readAutomatedSecurityFixes(path),
      };
    });
  }

  protected async write(
    scope: ParentScope,
    target: PatchTarget | undefined,
    payload: Record<string, unknown>
  ): Promise<RawEntity | undefined> {
    if (!target) {
      const created = await this.client.json(
        "POST",
        `/orgs/${encodeURIComponent(scope.org)}/repos`,
        payload
      );
      return isObject(created) ? created : undefined;
    }

    const path = `${encodeURIComponent(scope.org)}/${encodeURIComponent(currentName(target))}`;
    const { topics, ...rest } = payload;
    const fields: Record<string, unknown> = {};

    if (topics !== undefined) {
      await this.client.api("PUT", `/repos/${path}/topics`, { names: topics });
    }
    for (const [key, value] of Object.entries(rest)) {
      if (isToggleKey(key)) {
        await this.client.api(
          value === true ? "PUT" : "DELETE",
          `/repos/${path}/${TOGGLE_ENDPOINTS[key]}`
        );
      } else {
        fields[key] = value;
      }
    }
    if (Object.keys(fields).length > 0) {
      await this.client.api("PATCH", `/repos/${path}`, fields);
    }
    return undefined;
  }

  protected async remove(scope: ParentScope, target: PatchTarget): Promise<void> {
    await this.client.api(
      "DELETE",
      `/repos/${encodeURIComponent(scope.org)}/${encodeURIComponent(target.identity)}`
    );
  }

  /** 204 means enabled, 404 disabled. */
  private async readVulnerabilityAlerts(path: string): Promise<boolean> {
    try {
      await this.client.api("GET", `/repos/${path}/vulnerability-alerts`);
      return true;
    } catch (error) {
      if (getErrorStatus(error) === 404) {
        return false;
      }
      throw error;
    }
  }

  private async readAutomatedSecurityFixes(path: string): Promise<boolean> {
    try {
      const data = await this.client.json(
        "GET",
        `/repos/${path}/automated-security-fixes`
      );
      return isObject(data) ? data.enabled === true : true;
    } catch (error) {
      if (getErrorStatus(error) === 404) {
        return false;
      }
      throw error;
    }
  }
}

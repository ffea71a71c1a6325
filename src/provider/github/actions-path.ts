import type { ParentScope } from "../../models/types.js";
import { asObject } from "../../models/value-utils.js";
import type { GhApiClient } from "./gh-api-client.js";

/**
 * Base path of an Actions collection (`secrets` or `variables`) at
 * organization or repository scope.
 */
export function actionsPath(scope: ParentScope, kind: "secrets" | "variables"): string {
  const org = encodeURIComponent(scope.org);
  return scope.repository
    ? `/repos/${org}/${encodeURIComponent(scope.repository)}/actions/${kind}`
    : `/orgs/${org}/actions/${kind}`;
}

/**
 * Names of the repositories an organization secret or variable is shared
 * with.
 */
export async function readSelectedRepositories(
  client: GhApiClient,
  path: string
): Promise<string[]> {
  const repositories = await client.list(`${path}/repositories`, ".repositories[]");
  return repositories
    .map((repo) => repo.name)
    .filter((name): name is string => typeof name === "string");
}

/**
 * Resolves repository names of an organization to their numeric ids.
 */
export async function resolveRepositoryIds(
  client: GhApiClient,
  org: string,
  names: unknown
): Promise<number[]> {
  if (!Array.isArray(names)) return [];
  const ids: number[] = [];
  for (const name of names) {
    const repo = asObject(
      await client.json(
        "GET",
        `/repos/${encodeURIComponent(org)}/${encodeURIComponent(String(name))}`
      )
    );
    if (typeof repo.id !== "number") {
      throw new Error(`Repository ${org}/${String(name)} not found (HTTP 404)`);
    }
    ids.push(repo.id);
  }
  return ids;
}

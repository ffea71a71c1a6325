import type { ParentScope, RawEntity } from "../../models/types.js";
import type { PatchTarget } from "../types.js";
import { GitHubEntityGateway, currentName } from "./base-gateway.js";
import {
  actionsPath,
  readSelectedRepositories,
  resolveRepositoryIds,
} from "./actions-path.js";

/**
 * Actions variables at organization or repository scope.
 */
export class VariableGateway extends GitHubEntityGateway {
  readonly entityType = "variable";

  protected async read(scope: ParentScope): Promise<RawEntity[]> {
    const path = actionsPath(scope, "variables");
    const variables = await this.client.list(path, ".variables[]");
    const result: RawEntity[] = [];
    for (const variable of variables) {
      const record: RawEntity = { name: variable.name, value: variable.value };
      if (!scope.repository) {
        record.visibility = variable.visibility;
        if (variable.visibility === "selected") {
          record.selected_repositories = await readSelectedRepositories(
            this.client,
            `${path}/${encodeURIComponent(String(variable.name))}`
          );
        }
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
    const { selected_repositories: selected, ...rest } = payload;
    const body: Record<string, unknown> = { ...rest };
    if (selected !== undefined && !scope.repository) {
      body.selected_repository_ids = await resolveRepositoryIds(
        this.client,
        scope.org,
        selected
      );
    }

    const path = actionsPath(scope, "variables");
    if (!target) {
      await this.client.api("POST", path, body);
      return { ...payload };
    }
    if (Object.keys(body).length > 0) {
      await this.client.api(
        "PATCH",
        `${path}/${encodeURIComponent(currentName(target))}`,
        body
      );
    }
    return undefined;
  }

  protected async remove(scope: ParentScope, target: PatchTarget): Promise<void> {
    await this.client.api(
      "DELETE",
      `${actionsPath(scope, "variables")}/${encodeURIComponent(target.identity)}`
    );
  }
}


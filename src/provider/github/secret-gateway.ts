import type { ParentScope, RawEntity } from "../../models/types.js";
import { escapeShellArg } from "../../shared/shell-utils.js";
import type { PatchTarget } from "../types.js";
import { GitHubEntityGateway, currentName } from "./base-gateway.js";
import {
  actionsPath,
  readSelectedRepositories,
  resolveRepositoryIds,
} from "./actions-path.js";

/**
 * Actions secrets. Values are written with `gh secret set`, which takes
 * care of encrypting them with the repository or organization public key.
 * Visibility changes without a new value go through the REST API.
 */
export class SecretGateway extends GitHubEntityGateway {
  readonly entityType = "secret";

  protected async read(scope: ParentScope): Promise<RawEntity[]> {
    const path = actionsPath(scope, "secrets");
    const secrets = await this.client.list(path, ".secrets[]");
    const result: RawEntity[] = [];
    for (const secret of secrets) {
      const record: RawEntity = { name: secret.name };
      if (!scope.repository) {
        record.visibility = secret.visibility;
        if (secret.visibility === "selected") {
          record.selected_repositories = await readSelectedRepositories(
            this.client,
            `${path}/${encodeURIComponent(String(secret.name))}`
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
    const name = target ? currentName(target) : this.identityOf(payload);
    if (target && target.identity !== name) {
      throw new Error(`Secret "${name}" cannot be renamed to "${target.identity}"`);
    }

    if (typeof payload.value === "string") {
      await this.setWithValue(scope, name, payload);
      return undefined;
    }
    if (!target) {
      throw new Error(`Secret "${name}" has no value to create it with`);
    }
    if (scope.repository) {
      return undefined;
    }

    const path = `${actionsPath(scope, "secrets")}/${encodeURIComponent(name)}`;
    if (payload.visibility !== undefined) {
      await this.client.api("PUT", path, {
        visibility: payload.visibility,
        ...(payload.selected_repositories !== undefined
          ? {
              selected_repository_ids: await resolveRepositoryIds(
                this.client,
                scope.org,
                payload.selected_repositories
              ),
            }
          : {}),
      });
    } else if (payload.selected_repositories !== undefined) {
      await this.client.api("PUT", `${path}/repositories`, {
        selected_repository_ids: await resolveRepositoryIds(
          this.client,
          scope.org,
          payload.selected_repositories
        ),
      });
    }
    return undefined;
  }

  protected async remove(scope: ParentScope, target: PatchTarget): Promise<void> {
    await this.client.api(
      "DELETE",
      `${actionsPath(scope, "secrets")}/${encodeURIComponent(target.identity)}`
    );
  }

  private async setWithValue(
    scope: ParentScope,
    name: string,
    payload: Record<string, unknown>
  ): Promise<void> {
    const args = ["secret", "set", escapeShellArg(name)];
    if (scope.repository) {
      args.push("--repo", escapeShellArg(`${scope.org}/${scope.repository}`));
    } else {
      args.push("--org", escapeShellArg(scope.org));
      if (typeof payload.visibility === "string") {
        args.push("--visibility", escapeShellArg(payload.visibility));
      }
      if (Array.isArray(payload.selected_repositories)) {
        args.push(
          "--repos",
          escapeShellArg(payload.selected_repositories.map(String).join(","))
        );
      }
    }
    await this.client.command(args, String(payload.value));
  }
}

import type { ParentScope, RawEntity } from "../../models/types.js";
import { asObject, isObject } from "../../models/value-utils.js";
import type { PatchTarget } from "../types.js";
import { GitHubEntityGateway } from "./base-gateway.js";

/** Keys that live in the `config` object of a hook. */
const CONFIG_KEYS = ["url", "content_type", "insecure_ssl", "secret"];

/**
 * Organization webhooks through `/orgs/{org}/hooks`. The API nests the
 * delivery settings in `config`, records are flattened on read and nested
 * again on write.
 */
export class WebhookGateway extends GitHubEntityGateway {
  readonly entityType = "webhook";

  protected async read(scope: ParentScope): Promise<RawEntity[]> {
    const hooks = await this.client.list(this.hooksPath(scope));
    return hooks.map((hook) => {
      const config = asObject(hook.config);
      return {
        id: hook.id,
        active: hook.active,
        events: hook.events,
        url: config.url,
        content_type: config.content_type,
        insecure_ssl:
          typeof config.insecure_ssl === "number"
            ? String(config.insecure_ssl)
            : config.insecure_ssl,
        secret: config.secret,
      };
    });
  }

  protected async write(
    scope: ParentScope,
    target: PatchTarget | undefined,
    payload: Record<string, unknown>
  ): Promise<RawEntity | undefined> {
    const body = toHookBody(payload);
    if (!target) {
      const created = await this.client.json("POST", this.hooksPath(scope), {
        name: "web",
        ...body,
      });
      return isObject(created) ? { ...payload, id: created.id } : undefined;
    }
    const id = await this.resolveId(scope, target);
    await this.client.api("PATCH", `${this.hooksPath(scope)}/${id}`, body);
    return undefined;
  }

  protected async remove(scope: ParentScope, target: PatchTarget): Promise<void> {
    const id = await this.resolveId(scope, target);
    await this.client.api("DELETE", `${this.hooksPath(scope)}/${id}`);
  }

  protected identityOf(payload: Record<string, unknown>): string {
    return typeof payload.url === "string" ? payload.url : "";
  }

  private hooksPath(scope: ParentScope): string {
    return `/orgs/${encodeURIComponent(scope.org)}/hooks`;
  }

  private async resolveId(scope: ParentScope, target: PatchTarget): Promise<string> {
    if (target.providerId !== undefined) return target.providerId;
    const url = target.previousIdentity ?? target.identity;
    const hook = (await this.read(scope)).find((h) => h.url === url);
    if (!hook || hook.id === undefined) {
      throw new Error(`Webhook ${url} not found (HTTP 404)`);
    }
    return String(hook.id);
  }
}

function toHookBody(payload: Record<string, unknown>): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  const config: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (CONFIG_KEYS.includes(key)) {
      config[key] = value;
    } else {
      body[key] = value;
    }
  }
  if (Object.keys(config).length > 0) {
    body.config = config;
  }
  return body;
}

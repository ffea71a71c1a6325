import type { EntityType } from "../../models/types.js";
import type { IEntityGateway, IProviderGateway } from "../types.js";
import { BranchProtectionRuleGateway } from "./branch-protection-rule-gateway.js";
import { EnvironmentGateway } from "./environment-gateway.js";
import { GhApiClient, type GhApiClientOptions } from "./gh-api-client.js";
import { RepositoryGateway } from "./repository-gateway.js";
import { SecretGateway } from "./secret-gateway.js";
import { SettingsGateway } from "./settings-gateway.js";
import { VariableGateway } from "./variable-gateway.js";
import { WebhookGateway } from "./webhook-gateway.js";

export interface GitHubGatewayOptions extends GhApiClientOptions {
  /** Repositories whose extra settings are read at the same time. */
  concurrency?: number;
}

/**
 * Live state of GitHub organizations, read and written with the `gh` CLI.
 * One instance is built per run and shared by every organization.
 */
export class GitHubGateway implements IProviderGateway {
  private readonly gateways: Record<
    Exclude<EntityType, "branch_policy">,
    IEntityGateway
  >;

  constructor(options: GitHubGatewayOptions = {}) {
    const client = new GhApiClient(options);
    this.gateways = {
      settings: new SettingsGateway(client),
      webhook: new WebhookGateway(client),
      repository: new RepositoryGateway(client, options.concurrency),
      branch_protection_rule: new BranchProtectionRuleGateway(client),
      secret: new SecretGateway(client),
      variable: new VariableGateway(client),
      environment: new EnvironmentGateway(client),
    };
  }

  forType(entityType: EntityType): IEntityGateway {
    if (entityType === "branch_policy") {
      throw new Error(
        "Branch policies are written as part of their environment"
      );
    }
    return this.gateways[entityType];
  }
}

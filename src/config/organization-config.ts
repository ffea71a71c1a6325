import type { EntityModel } from "../models/types.js";

export interface OrganizationModels {
  settings?: EntityModel;
  webhooks?: readonly EntityModel[];
  secrets?: readonly EntityModel[];
  variables?: readonly EntityModel[];
  repositories?: readonly EntityModel[];
}

/**
 * Expected state of one organization, as produced by the configuration
 * loader. Repository models carry their child collections.
 */
export class OrganizationConfig {
  constructor(
    readonly githubId: string,
    private readonly models: OrganizationModels
  ) {}

  getSettings(): EntityModel | undefined {
    return this.models.settings;
  }

  getWebhooks(): readonly EntityModel[] {
    return this.models.webhooks ?? [];
  }

  getSecrets(): readonly EntityModel[] {
    return this.models.secrets ?? [];
  }

  getVariables(): readonly EntityModel[] {
    return this.models.variables ?? [];
  }

  getRepositories(): readonly EntityModel[] {
    return this.models.repositories ?? [];
  }
}

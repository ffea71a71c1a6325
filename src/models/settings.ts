import { EntityDescriptor, field } from "./entity-descriptor.js";
import type { FieldSpec, RawEntity } from "./types.js";

export const REPOSITORY_PERMISSIONS = [
  "none",
  "read",
  "write",
  "admin",
] as const;

/**
 * Organization-wide settings. One instance per organization, identified by
 * the organization login; it can only be updated.
 */
export class SettingsDescriptor extends EntityDescriptor {
  readonly entityType = "settings";
  readonly identityField = undefined;
  readonly providerIdKey = "id";

  readonly fields: readonly FieldSpec[] = [
    field("name", "string"),
    field("plan", "string", { readOnly: true }),
    field("description", "string"),
    field("email", "string"),
    field("location", "string"),
    field("company", "string"),
    field("billingEmail", "string"),
    field("blog", "string"),
    field("twitterUsername", "string"),
    field("hasOrganizationProjects", "boolean"),
    field("hasRepositoryProjects", "boolean"),
    field("defaultRepositoryPermission", "string", {
      enumValues: REPOSITORY_PERMISSIONS,
    }),
    field("membersCanCreatePrivateRepositories", "boolean"),
    field("membersCanCreatePublicRepositories", "boolean"),
    field("membersCanForkPrivateRepositories", "boolean"),
    field("webCommitSignoffRequired", "boolean"),
    field("defaultBranchName", "string"),
  ];

  protected identityFromProvider(raw: RawEntity): string {
    return typeof raw.login === "string" ? raw.login : "";
  }
}

export const settingsDescriptor = new SettingsDescriptor();

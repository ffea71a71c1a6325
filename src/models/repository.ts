import { EntityDescriptor, field } from "./entity-descriptor.js";
import type { FieldSpec } from "./types.js";

export const REPOSITORY_VISIBILITIES = ["public", "private", "internal"] as const;

/**
 * Repository, identified by its name. Renames are correlated through the
 * numeric provider id or through the configured aliases.
 *
 * Topics and the security toggles live on their own endpoints and are
 * written independently. Archiving makes the repository read-only, so it is
 * written after everything else targeting the repository.
 */
export class RepositoryDescriptor extends EntityDescriptor {
  readonly entityType = "repository";
  readonly identityField = "name";

  readonly fields: readonly FieldSpec[] = [
    field("name", "string", { identity: true }),
    field("description", "string"),
    field("homepage", "string"),
    field("private", "boolean"),
    field("visibility", "string", { enumValues: REPOSITORY_VISIBILITIES }),
    field("hasIssues", "boolean"),
    field("hasProjects", "boolean"),
    field("hasWiki", "boolean"),
    field("hasDiscussions", "boolean"),
    field("isTemplate", "boolean"),
    field("topics", "string[]", { independent: true }),
    field("defaultBranch", "string"),
    field("allowSquashMerge", "boolean"),
    field("allowMergeCommit", "boolean"),
    field("allowRebaseMerge", "boolean"),
    field("allowAutoMerge", "boolean"),
    field("deleteBranchOnMerge", "boolean"),
    field("allowUpdateBranch", "boolean"),
    field("webCommitSignoffRequired", "boolean"),
    field("allowForking", "boolean"),
    field("archived", "boolean", { independent: true, lockingValue: true }),
    field("vulnerabilityAlerts", "boolean", { independent: true }),
    field("automatedSecurityFixes", "boolean", { independent: true }),
  ];
}

export const repositoryDescriptor = new RepositoryDescriptor();

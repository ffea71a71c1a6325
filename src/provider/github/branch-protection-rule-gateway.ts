import type { ParentScope, RawEntity } from "../../models/types.js";
import { asObject, isObject } from "../../models/value-utils.js";
import type { PatchTarget } from "../types.js";
import { GitHubEntityGateway } from "./base-gateway.js";

/**
 * Provider field names that differ from their GraphQL counterpart.
 * Everything else is the camelCase form of the provider name.
 */
const GRAPHQL_NAMES: Record<string, string> = {
  requires_pull_request: "requiresApprovingReviews",
  required_status_checks: "requiredStatusCheckContexts",
};

const RULE_FIELDS = `
  id
  pattern
  requiresApprovingReviews
  requiredApprovingReviewCount
  dismissesStaleReviews
  requiresCodeOwnerReviews
  requireLastPushApproval
  requiresStatusChecks
  requiresStrictStatusChecks
  requiredStatusCheckContexts
  requiresLinearHistory
  requiresCommitSignatures
  requiresConversationResolution
  isAdminEnforced
  allowsForcePushes
  allowsDeletions
  lockBranch
`;

const LIST_QUERY = `
query($owner: String!, $name: String!, $cursor: String) {
  repository(owner: $owner, name: $name) {
    id
    branchProtectionRules(first: 100, after: $cursor) {
      nodes { ${RULE_FIELDS} }
      pageInfo { hasNextPage endCursor }
    }
  }
}`;

const REPOSITORY_ID_QUERY = `
query($owner: String!, $name: String!) {
  repository(owner: $owner, name: $name) { id }
}`;

const CREATE_MUTATION = `
mutation($input: CreateBranchProtectionRuleInput!) {
  createBranchProtectionRule(input: $input) {
    branchProtectionRule { id }
  }
}`;

const UPDATE_MUTATION = `
mutation($input: UpdateBranchProtectionRuleInput!) {
  updateBranchProtectionRule(input: $input) {
    branchProtectionRule { id }
  }
}`;

const DELETE_MUTATION = `
mutation($input: DeleteBranchProtectionRuleInput!) {
  deleteBranchProtectionRule(input: $input) { clientMutationId }
}`;

function snakeToCamel(str: string): string {
  return str.replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

function camelToSnakeName(str: string): string {
  return str.replace(/([A-Z])/g, "_$1").toLowerCase();
}

const PROVIDER_NAMES: Record<string, string> = Object.fromEntries(
  Object.entries(GRAPHQL_NAMES).map(([provider, graphql]) => [graphql, provider])
);

/**
 * Maps a GraphQL rule node onto a provider record.
 */
export function fromGraphQLRule(node: Record<string, unknown>): RawEntity {
  const record: RawEntity = {};
  for (const [key, value] of Object.entries(node)) {
    record[PROVIDER_NAMES[key] ?? camelToSnakeName(key)] = value;
  }
  return record;
}

/**
 * Maps a provider payload onto GraphQL mutation input fields.
 */
export function toGraphQLInput(payload: Record<string, unknown>): Record<string, unknown> {
  const input: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    input[GRAPHQL_NAMES[key] ?? snakeToCamel(key)] = value;
  }
  return input;
}

/**
 * Classic branch protection rules through the GraphQL API, which exposes
 * pattern based rules with stable node ids.
 */
export class BranchProtectionRuleGateway extends GitHubEntityGateway {
  readonly entityType = "branch_protection_rule";

  protected async read(scope: ParentScope): Promise<RawEntity[]> {
    const rules: RawEntity[] = [];
    let cursor: string | null = null;
    do {
      const data: Record<string, unknown> = await this.client.graphql(LIST_QUERY, {
        owner: scope.org,
        name: this.repositoryName(scope),
        cursor,
      });
      const connection = asObject(asObject(data.repository).branchProtectionRules);
      const nodes = Array.isArray(connection.nodes) ? connection.nodes : [];
      for (const node of nodes) {
        if (isObject(node)) rules.push(fromGraphQLRule(node));
      }
      const pageInfo = asObject(connection.pageInfo);
      cursor =
        pageInfo.hasNextPage === true && typeof pageInfo.endCursor === "string"
          ? pageInfo.endCursor
          : null;
    } while (cursor);
    return rules;
  }

  protected async write(
    scope: ParentScope,
    target: PatchTarget | undefined,
    payload: Record<string, unknown>
  ): Promise<RawEntity | undefined> {
    if (!target) {
      const data = await this.client.graphql(CREATE_MUTATION, {
        input: {
          repositoryId: await this.repositoryNodeId(scope),
          ...toGraphQLInput(payload),
        },
      });
      const rule = asObject(
        asObject(data.createBranchProtectionRule).branchProtectionRule
      );
      return { ...payload, id: rule.id };
    }

    await this.client.graphql(UPDATE_MUTATION, {
      input: {
        branchProtectionRuleId: await this.resolveId(scope, target),
        ...toGraphQLInput(payload),
      },
    });
    return undefined;
  }

  protected async remove(scope: ParentScope, target: PatchTarget): Promise<void> {
    await this.client.graphql(DELETE_MUTATION, {
      input: { branchProtectionRuleId: await this.resolveId(scope, target) },
    });
  }

  protected identityOf(payload: Record<string, unknown>): string {
    return typeof payload.pattern === "string" ? payload.pattern : "";
  }

  private repositoryName(scope: ParentScope): string {
    if (!scope.repository) {
      throw new Error("Branch protection rules require a repository scope");
    }
    return scope.repository;
  }

  private async repositoryNodeId(scope: ParentScope): Promise<string> {
    const data = await this.client.graphql(REPOSITORY_ID_QUERY, {
      owner: scope.org,
      name: this.repositoryName(scope),
    });
    const repository = asObject(data.repository);
    if (typeof repository.id !== "string") {
      throw new Error(`Repository ${scope.org}/${scope.repository} not found (HTTP 404)`);
    }
    return repository.id;
  }

  private async resolveId(scope: ParentScope, target: PatchTarget): Promise<string> {
    if (target.providerId !== undefined) return target.providerId;
    const pattern = target.previousIdentity ?? target.identity;
    const rule = (await this.read(scope)).find((r) => r.pattern === pattern);
    if (!rule || typeof rule.id !== "string") {
      throw new Error(`Branch protection rule "${pattern}" not found (HTTP 404)`);
    }
    return rule.id;
  }
}

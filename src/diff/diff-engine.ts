import { minimatch } from "minimatch";
import type { OrganizationConfig } from "../config/organization-config.js";
import { getDescriptor } from "../models/registry.js";
import {
  CHILD_COLLECTION_TYPES,
  REPOSITORY_CHILD_COLLECTIONS,
  formatScope,
  type EntityModel,
  type EntityType,
  type ParentScope,
} from "../models/types.js";
import type { IProviderGateway } from "../provider/types.js";
import { mapWithConcurrency } from "../shared/concurrency.js";
import {
  formatErrorMessage,
  getErrorStatus,
  isAuthenticationError,
} from "../shared/errors.js";
import { logger as defaultLogger, type ILogger } from "../shared/logger.js";
import { reconcile, type ReconcileOutcome } from "./reconcile.js";
import type {
  Addition,
  Diff,
  DiffNode,
  FetchFailure,
  Modification,
  Unmatched,
} from "./types.js";

export interface DiffEngineOptions {
  /** Report write-only values (secrets) as changed so that they get rewritten. */
  updateSecrets?: boolean;
  /** Treat collections that cannot be read as empty, with a warning. */
  tolerateFetchErrors?: boolean;
  /** Glob restricting which repositories are reconciled. */
  repoFilter?: string;
  /** Repositories whose children are read at the same time. */
  concurrency?: number;
  logger?: ILogger;
}

/**
 * Accumulates nodes, counts and problems of one diff computation.
 */
class DiffCollector {
  readonly nodes: DiffNode[] = [];
  readonly warnings: string[] = [];
  readonly fetchFailures: FetchFailure[] = [];
  additions = 0;
  differences = 0;
  unmatched = 0;

  constructor(private readonly org: string) {}

  addNode(node: DiffNode): void {
    if (
      node.additions.length === 0 &&
      node.modifications.length === 0 &&
      node.unmatched.length === 0
    ) {
      return;
    }
    this.nodes.push(node);
    this.additions += node.additions.length;
    this.unmatched += node.unmatched.length;
    this.differences += node.unmatched.length;
    for (const modification of node.modifications) {
      this.differences += Object.keys(modification.changedFields).length;
    }
  }

  build(): Diff {
    return Object.freeze({
      org: this.org,
      nodes: Object.freeze([...this.nodes]),
      summary: Object.freeze({
        additions: this.additions,
        differences: this.differences,
        unmatched: this.unmatched,
      }),
      warnings: Object.freeze([...this.warnings]),
      fetchFailures: Object.freeze([...this.fetchFailures]),
    });
  }
}

/**
 * Computes the difference between the expected state of an organization
 * and its live state.
 *
 * Every scope is reconciled with the same algorithm. Traversal order is
 * settings, webhooks, organization secrets, organization variables,
 * repositories, then per repository its branch protection rules, secrets,
 * variables and environments. Child collections are only read for
 * repositories that exist on both sides.
 */
export class DiffEngine {
  private readonly logger: ILogger;

  constructor(
    private readonly gateway: IProviderGateway,
    private readonly options: DiffEngineOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  async compute(org: OrganizationConfig): Promise<Diff> {
    const collector = new DiffCollector(org.githubId);
    const scope: ParentScope = { org: org.githubId };

    const settings = org.getSettings();
    if (settings) {
      const current = await this.fetch("settings", scope, collector);
      if (current) {
        // One record per organization; the login may differ in case from githubId.
        const live = current.map((record) => ({
          ...record,
          identity: settings.identity,
        }));
        this.reconcileNode(scope, "settings", [settings], live, collector);
      }
    }

    const orgCollections: [EntityType, readonly EntityModel[]][] = [
      ["webhook", org.getWebhooks()],
      ["secret", org.getSecrets()],
      ["variable", org.getVariables()],
    ];
    for (const [entityType, expected] of orgCollections) {
      const current = await this.fetch(entityType, scope, collector);
      if (current) {
        this.reconcileNode(scope, entityType, expected, current, collector);
      }
    }

    await this.diffRepositories(org, scope, collector);

    return collector.build();
  }

  private async diffRepositories(
    org: OrganizationConfig,
    scope: ParentScope,
    collector: DiffCollector
  ): Promise<void> {
    const current = await this.fetch("repository", scope, collector);
    if (!current) return;

    const expected = org
      .getRepositories()
      .filter((repo) => this.isSelected(repo));
    const outcome = this.reconcileNode(
      scope,
      "repository",
      expected,
      this.selectLive(current, expected),
      collector
    );

    // Children are emitted in expected order regardless of read order.
    const position = new Map(expected.map((repo, i) => [repo, i]));
    const matches = [...outcome.matches].sort(
      (a, b) =>
        (position.get(a.expected) ?? 0) - (position.get(b.expected) ?? 0)
    );

    const childResults = await mapWithConcurrency(
      matches,
      this.options.concurrency ?? 4,
      async ({ expected: repo, current: live }) => {
        const fetchScope: ParentScope = {
          org: scope.org,
          repository: live.identity,
          repositoryId: live.providerId,
        };
        const results: {
          entityType: EntityType;
          expected: readonly EntityModel[];
          current: EntityModel[] | null;
        }[] = [];

        for (const collection of REPOSITORY_CHILD_COLLECTIONS) {
          // Archived repositories are read-only, their rules are left alone.
          if (
            collection === "branchProtectionRules" &&
            repo.fields.archived === true
          ) {
            continue;
          }
          const entityType = CHILD_COLLECTION_TYPES[collection];
          results.push({
            entityType,
            expected: repo.children?.[collection] ?? [],
            current: await this.fetch(entityType, fetchScope, collector),
          });
        }
        return { repo, live, results };
      }
    );

    for (const { repo, live, results } of childResults) {
      const childScope: ParentScope = {
        org: scope.org,
        repository: repo.identity,
        repositoryId: live.providerId,
      };
      for (const result of results) {
        if (result.current) {
          this.reconcileNode(
            childScope,
            result.entityType,
            result.expected,
            result.current,
            collector
          );
        }
      }
    }
  }

  private reconcileNode(
    scope: ParentScope,
    entityType: EntityType,
    expected: readonly EntityModel[],
    current: readonly EntityModel[],
    collector: DiffCollector
  ): ReconcileOutcome {
    const descriptor = getDescriptor(entityType);
    const outcome = reconcile(expected, current, {
      diffFields: (e, c) =>
        descriptor.diffFields(e, c, {
          forceWriteOnly: this.options.updateSecrets,
        }),
      includeExpected: (e) => descriptor.includeForLivePatch(e),
    });

    const modifications: Modification[] = outcome.matches
      .filter((match) => Object.keys(match.changes).length > 0)
      .map((match) => ({
        kind: "modification",
        identity: match.expected.identity,
        ...(match.renamed ? { previousIdentity: match.current.identity } : {}),
        ...(match.current.providerId !== undefined
          ? { providerId: match.current.providerId }
          : {}),
        changedFields: match.changes,
        expected: match.expected,
        current: match.current,
      }));
    const additions: Addition[] = outcome.additions.map((entity) => ({
      kind: "addition",
      expected: entity,
    }));
    const unmatched: Unmatched[] = outcome.unmatched.map((entity) => ({
      kind: "unmatched",
      current: entity,
    }));

    collector.addNode({
      scope,
      entityType,
      additions,
      modifications,
      unmatched,
    });
    return outcome;
  }

  /**
   * Reads one collection. Returns null when the read failed and the
   * subtree has to be skipped.
   */
  private async fetch(
    entityType: EntityType,
    scope: ParentScope,
    collector: DiffCollector
  ): Promise<EntityModel[] | null> {
    const descriptor = getDescriptor(entityType);
    try {
      const raw = await this.gateway.forType(entityType).fetchCurrent(scope);
      return raw.map((record) => descriptor.fromProviderData(record));
    } catch (error) {
      if (isAuthenticationError(error)) {
        throw error;
      }
      const message = formatErrorMessage(error);
      const where = `${descriptor.label} collection of ${formatScope(scope)}`;
      if (this.options.tolerateFetchErrors) {
        const warning = `Failed to read ${where}, assuming it is empty: ${message}`;
        collector.warnings.push(warning);
        this.logger.warn(warning);
        return [];
      }
      const status = getErrorStatus(error);
      collector.fetchFailures.push({
        scope,
        entityType,
        message,
        ...(status !== undefined ? { status } : {}),
      });
      this.logger.warn(`Failed to read ${where}: ${message}`);
      return null;
    }
  }

  /**
   * Live repositories matching the filter, plus those correlated with a
   * selected repository through id or alias so that renames are kept.
   */
  private selectLive(
    current: readonly EntityModel[],
    expected: readonly EntityModel[]
  ): EntityModel[] {
    if (!this.options.repoFilter) return [...current];
    const ids = new Set(expected.map((repo) => repo.providerId));
    const aliases = new Set(expected.flatMap((repo) => repo.aliases ?? []));
    return current.filter(
      (repo) =>
        this.isSelected(repo) ||
        (repo.providerId !== undefined && ids.has(repo.providerId)) ||
        aliases.has(repo.identity)
    );
  }

  private isSelected(repo: EntityModel): boolean {
    const filter = this.options.repoFilter;
    return !filter || minimatch(repo.identity, filter);
  }
}

import { getDescriptor } from "../models/registry.js";
import {
  CHILD_COLLECTION_TYPES,
  REPOSITORY_CHILD_COLLECTIONS,
  formatScope,
  type EntityType,
  type ParentScope,
  type RawEntity,
} from "../models/types.js";
import { asObject, camelToSnake, isObject } from "../models/value-utils.js";
import { ProviderFetchError, ProviderOperationError } from "../shared/errors.js";
import type { IEntityGateway, IProviderGateway, PatchTarget } from "./types.js";

export type GatewayOperation = "fetch" | "create" | "update" | "delete";

export interface InjectedFailure {
  operation: GatewayOperation;
  entityType: EntityType;
  /**
   * Natural key of the targeted entity, or the repository name for fetches.
   * Matches every call of the operation when absent.
   */
  identity?: string;
  error: Error;
  /** Number of calls that fail. Unlimited when absent. */
  times?: number;
}

export interface RecordedCall {
  operation: GatewayOperation;
  entityType: EntityType;
  scope: ParentScope;
  identity?: string;
  subResource?: string;
}

/** Types whose records receive a provider id on creation. */
const ID_PREFIXES: Partial<Record<EntityType, string>> = {
  webhook: "",
  repository: "",
  environment: "",
  branch_protection_rule: "BPR_",
};

/** Write-only values and how the provider reports them back. */
const MASKED_FIELDS: Partial<Record<EntityType, Record<string, string | undefined>>> = {
  webhook: { secret: "********" },
  secret: { value: undefined },
};

function storeKey(entityType: EntityType, scope: ParentScope): string {
  return `${entityType}|${scope.org}|${scope.repository ?? ""}`;
}

function clone(record: RawEntity): RawEntity {
  return structuredClone(record);
}

/**
 * Provider keeping live state in memory. Behaves like the real provider
 * where the reconciliation core can observe it: ids are assigned on
 * creation, write-only values are never reported back, renamed
 * repositories keep their children, and archived repositories reject
 * writes.
 */
export class InMemoryGateway implements IProviderGateway {
  private readonly store = new Map<string, RawEntity[]>();
  private readonly failures: InjectedFailure[] = [];
  private readonly gateways = new Map<EntityType, IEntityGateway>();
  readonly calls: RecordedCall[] = [];
  private nextId = 1;

  /**
   * Builds a gateway from a snapshot: an object keyed by organization login
   * whose values hold `settings`, `webhooks`, `secrets`, `variables` and
   * `repositories` in provider (snake_case) form. Repository records may
   * nest their `branch_protection_rules`, `secrets`, `variables` and
   * `environments`.
   */
  static fromSnapshot(snapshot: unknown): InMemoryGateway {
    const gateway = new InMemoryGateway();
    if (!isObject(snapshot)) {
      throw new Error("Live state snapshot must be an object keyed by organization");
    }
    for (const [org, state] of Object.entries(snapshot)) {
      if (!isObject(state)) {
        throw new Error(`Live state of organization "${org}" must be an object`);
      }
      gateway.seedOrganization(org, state);
    }
    return gateway;
  }

  seedOrganization(org: string, state: Record<string, unknown>): void {
    const scope: ParentScope = { org };
    const settings = asObject(state.settings);
    this.seed("settings", scope, [{ ...settings, login: org }]);
    this.seed("webhook", scope, records(state.webhooks));
    this.seed("secret", scope, records(state.secrets));
    this.seed("variable", scope, records(state.variables));

    const repositories = records(state.repositories);
    const plain: RawEntity[] = [];
    for (const repository of repositories) {
      const fields: RawEntity = {};
      for (const [key, value] of Object.entries(repository)) {
        if (!REPOSITORY_CHILD_COLLECTIONS.some((c) => camelToSnake(c) === key)) {
          fields[key] = value;
        }
      }
      plain.push(fields);
      const name = String(fields.name ?? "");
      for (const collection of REPOSITORY_CHILD_COLLECTIONS) {
        this.seed(
          CHILD_COLLECTION_TYPES[collection],
          { org, repository: name },
          records(repository[camelToSnake(collection)])
        );
      }
    }
    this.seed("repository", scope, plain);
  }

  /** Replaces a collection, assigning ids to records that have none. */
  seed(entityType: EntityType, scope: ParentScope, items: readonly RawEntity[]): void {
    this.store.set(
      storeKey(entityType, scope),
      items.map((item) => this.withId(entityType, clone(item)))
    );
  }

  /** Current records of a collection, including write-only values. */
  get(entityType: EntityType, scope: ParentScope): RawEntity[] {
    return (this.store.get(storeKey(entityType, scope)) ?? []).map(clone);
  }

  injectFailure(failure: InjectedFailure): void {
    this.failures.push({ ...failure });
  }

  forType(entityType: EntityType): IEntityGateway {
    let gateway = this.gateways.get(entityType);
    if (!gateway) {
      gateway = {
        fetchCurrent: async (scope) => this.fetchCurrent(entityType, scope),
        create: async (scope, payload) => this.create(entityType, scope, payload),
        update: async (scope, target, payload) =>
          this.update(entityType, scope, target, payload),
        delete: async (scope, target) => this.delete(entityType, scope, target),
      };
      this.gateways.set(entityType, gateway);
    }
    return gateway;
  }

  private fetchCurrent(entityType: EntityType, scope: ParentScope): RawEntity[] {
    this.record({ operation: "fetch", entityType, scope });
    this.throwInjected("fetch", entityType, scope.repository);

    if (scope.repository && !this.findRepository(scope)) {
      throw new ProviderFetchError(
        `Repository ${formatScope(scope)} not found (HTTP 404)`,
        { entityType, scope, status: 404 }
      );
    }
    const masked = MASKED_FIELDS[entityType] ?? {};
    return this.get(entityType, scope).map((record) => {
      for (const [key, replacement] of Object.entries(masked)) {
        if (replacement === undefined) {
          delete record[key];
        } else if (record[key] !== undefined) {
          record[key] = replacement;
        }
      }
      return record;
    });
  }

  private create(
    entityType: EntityType,
    scope: ParentScope,
    payload: Record<string, unknown>
  ): RawEntity {
    const identity = this.identityOf(entityType, payload);
    this.record({ operation: "create", entityType, scope, identity });
    this.throwInjected("create", entityType, identity);
    this.assertWritableParent(entityType, scope, identity);

    const items = this.collection(entityType, scope);
    if (entityType === "settings" || items.some((r) => this.identityOf(entityType, r) === identity)) {
      throw new ProviderOperationError(
        `${getDescriptor(entityType).label} "${identity}" already exists (HTTP 422)`,
        { entityType, identity, scope, status: 422 }
      );
    }
    const record = this.withId(entityType, clone(payload));
    items.push(record);
    return clone(record);
  }

  private update(
    entityType: EntityType,
    scope: ParentScope,
    target: PatchTarget,
    payload: Record<string, unknown>
  ): void {
    this.record({
      operation: "update",
      entityType,
      scope,
      identity: target.identity,
      ...(target.subResource ? { subResource: target.subResource } : {}),
    });
    this.throwInjected("update", entityType, target.identity);
    this.assertWritableParent(entityType, scope, target.identity);

    const record = this.find(entityType, scope, target);
    if (
      entityType === "repository" &&
      record.archived === true &&
      payload.archived !== false
    ) {
      throw readOnlyError(entityType, target.identity, scope);
    }

    const previous = this.identityOf(entityType, record);
    Object.assign(record, clone(payload));
    const renamed = this.identityOf(entityType, record);
    if (entityType === "repository" && previous !== renamed) {
      this.moveChildren(scope.org, previous, renamed);
    }
  }

  private delete(entityType: EntityType, scope: ParentScope, target: PatchTarget): void {
    this.record({ operation: "delete", entityType, scope, identity: target.identity });
    this.throwInjected("delete", entityType, target.identity);
    this.assertWritableParent(entityType, scope, target.identity);

    const record = this.find(entityType, scope, target);
    const items = this.collection(entityType, scope);
    items.splice(items.indexOf(record), 1);
    if (entityType === "repository") {
      for (const collection of REPOSITORY_CHILD_COLLECTIONS) {
        this.store.delete(
          storeKey(CHILD_COLLECTION_TYPES[collection], {
            org: scope.org,
            repository: target.identity,
          })
        );
      }
    }
  }

  private find(entityType: EntityType, scope: ParentScope, target: PatchTarget): RawEntity {
    const items = this.collection(entityType, scope);
    if (entityType === "settings") {
      const settings = items[0];
      if (settings) return settings;
    }
    const key = getDescriptor(entityType).providerIdKey;
    const name = target.previousIdentity ?? target.identity;
    const record =
      (target.providerId !== undefined
        ? items.find((r) => String(r[key]) === target.providerId)
        : undefined) ?? items.find((r) => this.identityOf(entityType, r) === name);
    if (!record) {
      throw new ProviderOperationError(
        `${getDescriptor(entityType).label} "${name}" not found in ${formatScope(scope)} (HTTP 404)`,
        { entityType, identity: name, scope, status: 404 }
      );
    }
    return record;
  }

  private findRepository(scope: ParentScope): RawEntity | undefined {
    return this.collection("repository", { org: scope.org }).find(
      (r) =>
        r.name === scope.repository ||
        (scope.repositoryId !== undefined && String(r.id) === scope.repositoryId)
    );
  }

  /** Children of archived or missing repositories cannot be written. */
  private assertWritableParent(entityType: EntityType, scope: ParentScope, identity: string): void {
    if (!scope.repository) return;
    const repository = this.findRepository(scope);
    if (!repository) {
      throw new ProviderOperationError(
        `Repository ${formatScope(scope)} not found (HTTP 404)`,
        { entityType, identity, scope, status: 404 }
      );
    }
    if (repository.archived === true) {
      throw readOnlyError(entityType, identity, scope);
    }
  }

  private moveChildren(org: string, from: string, to: string): void {
    for (const collection of REPOSITORY_CHILD_COLLECTIONS) {
      const entityType = CHILD_COLLECTION_TYPES[collection];
      const source = storeKey(entityType, { org, repository: from });
      const items = this.store.get(source);
      if (items) {
        this.store.delete(source);
        this.store.set(storeKey(entityType, { org, repository: to }), items);
      }
    }
  }

  private collection(entityType: EntityType, scope: ParentScope): RawEntity[] {
    const key = storeKey(entityType, scope);
    let items = this.store.get(key);
    if (!items) {
      items = [];
      this.store.set(key, items);
    }
    return items;
  }

  private identityOf(entityType: EntityType, record: Record<string, unknown>): string {
    const descriptor = getDescriptor(entityType);
    const spec = descriptor.identityField
      ? descriptor.getField(descriptor.identityField)
      : undefined;
    const value = spec ? record[spec.apiName] : record.login;
    return typeof value === "string" ? value : "";
  }

  private withId(entityType: EntityType, record: RawEntity): RawEntity {
    const prefix = ID_PREFIXES[entityType];
    if (prefix !== undefined && record.id === undefined) {
      const id = this.nextId++;
      record.id = prefix ? `${prefix}${id}` : id;
    }
    return record;
  }

  private throwInjected(
    operation: GatewayOperation,
    entityType: EntityType,
    identity: string | undefined
  ): void {
    const index = this.failures.findIndex(
      (f) =>
        f.operation === operation &&
        f.entityType === entityType &&
        (f.identity === undefined || f.identity === identity)
    );
    if (index === -1) return;
    const failure = this.failures[index];
    if (failure.times !== undefined) {
      failure.times--;
      if (failure.times <= 0) {
        this.failures.splice(index, 1);
      }
    }
    throw failure.error;
  }

  private record(call: RecordedCall): void {
    this.calls.push(call);
  }
}

function records(value: unknown): RawEntity[] {
  return Array.isArray(value) ? value.filter(isObject) : [];
}

function readOnlyError(
  entityType: EntityType,
  identity: string,
  scope: ParentScope
): ProviderOperationError {
  return new ProviderOperationError(
    `Repository ${scope.repository ?? identity} was archived so is read-only (HTTP 403)`,
    { entityType, identity, scope, status: 403 }
  );
}

import type { Diff, DiffNode, Modification } from "../diff/types.js";
import type { EntityDescriptor } from "../models/entity-descriptor.js";
import { getDescriptor } from "../models/registry.js";
import {
  CHILD_COLLECTION_TYPES,
  REPOSITORY_CHILD_COLLECTIONS,
  formatScope,
  type EntityModel,
  type EntityType,
  type FieldSpec,
  type ParentScope,
} from "../models/types.js";
import {
  ORG_LANE,
  repositoryLane,
  type LivePatch,
  type PatchOperation,
  type PatchOrigin,
} from "./types.js";

export interface PlanOptions {
  /** Emit delete patches for unmatched entities. */
  prune?: boolean;
}

interface PatchInit {
  entityType: EntityType;
  operation: PatchOperation;
  origin: PatchOrigin;
  scope: ParentScope;
  identity: string;
  previousIdentity?: string;
  providerId?: string;
  subResource?: string;
  payload: Record<string, unknown>;
  changedFields: readonly string[];
  dependsOn?: string;
}

function patchId(init: PatchInit): string {
  const base = `${init.operation}:${init.entityType}:${formatScope(init.scope)}:${init.identity}`;
  return init.subResource ? `${base}#${init.subResource}` : base;
}

function laneOf(init: PatchInit): string {
  if (init.scope.repository) return repositoryLane(init.scope.repository);
  if (init.entityType === "repository") return repositoryLane(init.identity);
  return ORG_LANE;
}

function isIndependent(spec: FieldSpec): boolean {
  return spec.independent === true;
}

function isShared(spec: FieldSpec): boolean {
  return spec.independent !== true;
}

/**
 * Collects patches and keeps track of the patches later ones depend on.
 */
class PatchList {
  private readonly patches: LivePatch[] = [];
  /** Patches that make their entity read-only, applied last. */
  private readonly locking: LivePatch[] = [];
  private readonly ids = new Set<string>();

  add(init: PatchInit, options: { locking?: boolean } = {}): LivePatch {
    const patch: LivePatch = Object.freeze({
      ...init,
      id: patchId(init),
      lane: laneOf(init),
    });
    if (this.ids.has(patch.id)) {
      return patch;
    }
    this.ids.add(patch.id);
    (options.locking ? this.locking : this.patches).push(patch);
    return patch;
  }

  toArray(): LivePatch[] {
    return [...this.patches, ...this.locking];
  }
}

/**
 * Turns a diff into an ordered list of live patches.
 *
 * Ordering guarantees:
 * - a repository create or rename precedes every patch of its children,
 *   which declare it as `dependsOn`
 * - changed fields of one entity collapse into a single update, except for
 *   independently written fields which get a patch each
 * - writes that make an entity read-only come after everything else
 * - unmatched entities are only deleted when pruning was requested
 */
export class PatchPlanner {
  plan(diff: Diff, options: PlanOptions = {}): LivePatch[] {
    const list = new PatchList();
    /** Create or rename patch of each repository, keyed by its new name. */
    const repositoryParents = new Map<string, string>();

    for (const node of diff.nodes) {
      const descriptor = getDescriptor(node.entityType);
      const parent = node.scope.repository
        ? repositoryParents.get(node.scope.repository)
        : undefined;

      for (const modification of node.modifications) {
        const anchor = this.planModification(
          list,
          descriptor,
          node,
          modification,
          parent
        );
        if (node.entityType === "repository" && anchor) {
          repositoryParents.set(modification.identity, anchor);
        }
      }

      for (const addition of node.additions) {
        this.planAddition(list, descriptor, node.scope, addition.expected, parent);
      }

      if (options.prune && node.entityType !== "settings") {
        for (const { current } of node.unmatched) {
          list.add({
            entityType: node.entityType,
            operation: "delete",
            origin: "unmatched",
            scope: node.scope,
            identity: current.identity,
            ...(current.providerId !== undefined
              ? { providerId: current.providerId }
              : {}),
            payload: {},
            changedFields: [],
            ...(parent ? { dependsOn: parent } : {}),
          });
        }
      }
    }

    return list.toArray();
  }

  /**
   * Plans the patches of one modification. Returns the id of the patch
   * that renames the entity, if any.
   */
  private planModification(
    list: PatchList,
    descriptor: EntityDescriptor,
    node: DiffNode,
    modification: Modification,
    parent: string | undefined
  ): string | undefined {
    const changed = Object.keys(modification.changedFields);
    const specs = changed
      .map((name) => descriptor.getField(name))
      .filter((spec): spec is FieldSpec => spec !== undefined);
    const common = {
      entityType: node.entityType,
      origin: "modification" as const,
      scope: node.scope,
      ...(modification.providerId !== undefined
        ? { providerId: modification.providerId }
        : {}),
    };

    const independent = specs.filter(isIndependent);
    const unlocking = independent.filter(
      (spec) =>
        spec.lockingValue !== undefined &&
        modification.expected.fields[spec.name] !== spec.lockingValue
    );
    const locking = independent.filter(
      (spec) =>
        spec.lockingValue !== undefined &&
        modification.expected.fields[spec.name] === spec.lockingValue
    );
    const plain = independent.filter((spec) => spec.lockingValue === undefined);

    // The entity has to be writable before anything else targets it.
    for (const spec of unlocking) {
      list.add({
        ...common,
        operation: "update",
        identity: modification.identity,
        ...(modification.previousIdentity !== undefined
          ? { previousIdentity: modification.previousIdentity }
          : {}),
        subResource: spec.name,
        payload: this.subResourcePayload(descriptor, modification, spec),
        changedFields: [spec.name],
        ...(parent ? { dependsOn: parent } : {}),
      });
    }

    let anchor: string | undefined;
    const shared = specs.filter(isShared);
    if (shared.length > 0) {
      const main = list.add({
        ...common,
        operation: "update",
        identity: modification.identity,
        ...(modification.previousIdentity !== undefined
          ? { previousIdentity: modification.previousIdentity }
          : {}),
        payload: descriptor.toUpdatePayload(modification.changedFields, {
          include: isShared,
        }),
        changedFields: shared.map((spec) => spec.name),
        ...(parent ? { dependsOn: parent } : {}),
      });
      if (modification.previousIdentity !== undefined) {
        anchor = main.id;
      }
    }

    const dependsOn = anchor ?? parent;
    for (const spec of plain) {
      list.add({
        ...common,
        operation: "update",
        identity: modification.identity,
        subResource: spec.name,
        payload: this.subResourcePayload(descriptor, modification, spec),
        changedFields: [spec.name],
        ...(dependsOn ? { dependsOn } : {}),
      });
    }
    for (const spec of locking) {
      list.add(
        {
          ...common,
          operation: "update",
          identity: modification.identity,
          subResource: spec.name,
          payload: this.subResourcePayload(descriptor, modification, spec),
          changedFields: [spec.name],
          ...(dependsOn ? { dependsOn } : {}),
        },
        { locking: true }
      );
    }

    return anchor;
  }

  private planAddition(
    list: PatchList,
    descriptor: EntityDescriptor,
    scope: ParentScope,
    expected: EntityModel,
    parent: string | undefined
  ): void {
    // Settings always exist, a missing record is written as an update.
    const operation: PatchOperation =
      expected.entityType === "settings" ? "update" : "create";
    const created = list.add({
      entityType: expected.entityType,
      operation,
      origin: "addition",
      scope,
      identity: expected.identity,
      payload: descriptor.toCreatePayload(expected, { include: isShared }),
      changedFields: [],
      ...(parent ? { dependsOn: parent } : {}),
    });

    for (const spec of descriptor.fields.filter(isIndependent)) {
      const value = expected.fields[spec.name];
      if (value === undefined || value === null) continue;
      // Freshly created entities are not locked yet.
      if (spec.lockingValue !== undefined && value !== spec.lockingValue) {
        continue;
      }
      list.add(
        {
          entityType: expected.entityType,
          operation: "update",
          origin: "addition",
          scope,
          identity: expected.identity,
          subResource: spec.name,
          payload: descriptor.toCreatePayload(expected, {
            include: (s) => s.name === spec.name,
          }),
          changedFields: [spec.name],
          dependsOn: created.id,
        },
        { locking: spec.lockingValue !== undefined }
      );
    }

    if (expected.entityType !== "repository" || !expected.children) return;

    // Children of a new repository are created right after it.
    const childScope: ParentScope = {
      org: scope.org,
      repository: expected.identity,
    };
    for (const collection of REPOSITORY_CHILD_COLLECTIONS) {
      const childType = CHILD_COLLECTION_TYPES[collection];
      const childDescriptor = getDescriptor(childType);
      if (childType === "branch_protection_rule" && expected.fields.archived === true) {
        continue;
      }
      for (const child of expected.children[collection] ?? []) {
        if (!childDescriptor.includeForLivePatch(child)) continue;
        this.planAddition(list, childDescriptor, childScope, child, created.id);
      }
    }
  }

  private subResourcePayload(
    descriptor: EntityDescriptor,
    modification: Modification,
    spec: FieldSpec
  ): Record<string, unknown> {
    return descriptor.toUpdatePayload(modification.changedFields, {
      include: (s) => s.name === spec.name,
    });
  }
}

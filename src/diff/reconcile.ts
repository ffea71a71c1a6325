import type { EntityModel, FieldChanges } from "../models/types.js";
import { ConfigurationError } from "../shared/errors.js";

export interface ReconcileCallbacks {
  /** Field-level comparison of a correlated pair. */
  diffFields(expected: EntityModel, current: EntityModel): FieldChanges;
  /** Expected entities for which this returns false are left alone. */
  includeExpected?(expected: EntityModel): boolean;
}

export interface EntityMatch {
  readonly expected: EntityModel;
  readonly current: EntityModel;
  readonly changes: FieldChanges;
  /** Correlated through provider id or alias rather than the natural key. */
  readonly renamed: boolean;
}

export interface ReconcileOutcome {
  /** Every correlated pair, changed or not, in current-state order. */
  readonly matches: readonly EntityMatch[];
  /** Expected entities absent from the current state, in expected order. */
  readonly additions: readonly EntityModel[];
  /** Current entities absent from the expected state, in current order. */
  readonly unmatched: readonly EntityModel[];
}

/**
 * Indexes expected entities by natural key, provider id and alias.
 * Natural keys and aliases share one namespace and must be unique.
 */
function indexExpected(expected: readonly EntityModel[]): {
  byKey: Map<string, EntityModel>;
  byProviderId: Map<string, EntityModel>;
  byAlias: Map<string, EntityModel>;
} {
  const byKey = new Map<string, EntityModel>();
  const byProviderId = new Map<string, EntityModel>();
  const byAlias = new Map<string, EntityModel>();
  const issues: string[] = [];

  for (const entity of expected) {
    if (byKey.has(entity.identity) || byAlias.has(entity.identity)) {
      issues.push(
        `duplicate ${entity.entityType} key "${entity.identity}"`
      );
      continue;
    }
    byKey.set(entity.identity, entity);
  }

  for (const entity of expected) {
    for (const alias of entity.aliases ?? []) {
      if (byKey.has(alias) || byAlias.has(alias)) {
        issues.push(
          `alias "${alias}" of ${entity.entityType} "${entity.identity}" is already used`
        );
        continue;
      }
      byAlias.set(alias, entity);
    }
    if (entity.providerId !== undefined) {
      if (byProviderId.has(entity.providerId)) {
        issues.push(
          `duplicate ${entity.entityType} id "${entity.providerId}"`
        );
        continue;
      }
      byProviderId.set(entity.providerId, entity);
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return { byKey, byProviderId, byAlias };
}

/**
 * Correlates an expected collection with the current collection of the same
 * scope and entity type.
 *
 * Correlation runs in three passes, each only considering entities left
 * over from the previous one: by provider id, by natural key, and by alias.
 * A pair correlated through provider id or alias whose natural keys differ is
 * a rename and surfaces as a change of the identity field.
 */
export function reconcile(
  expected: readonly EntityModel[],
  current: readonly EntityModel[],
  callbacks: ReconcileCallbacks
): ReconcileOutcome {
  const { byKey, byProviderId, byAlias } = indexExpected(expected);
  const consumed = new Set<EntityModel>();
  const pairs = new Map<EntityModel, EntityModel>();

  const tryPair = (
    cur: EntityModel,
    candidate: EntityModel | undefined
  ): void => {
    if (candidate && !consumed.has(candidate) && !pairs.has(cur)) {
      consumed.add(candidate);
      pairs.set(cur, candidate);
    }
  };

  for (const cur of current) {
    if (cur.providerId !== undefined) {
      tryPair(cur, byProviderId.get(cur.providerId));
    }
  }
  for (const cur of current) {
    tryPair(cur, byKey.get(cur.identity));
  }
  for (const cur of current) {
    tryPair(cur, byAlias.get(cur.identity));
  }

  const include = callbacks.includeExpected ?? (() => true);
  const matches: EntityMatch[] = [];
  const unmatched: EntityModel[] = [];

  for (const cur of current) {
    const exp = pairs.get(cur);
    if (!exp) {
      unmatched.push(cur);
      continue;
    }
    if (!include(exp)) {
      continue;
    }
    matches.push({
      expected: exp,
      current: cur,
      changes: callbacks.diffFields(exp, cur),
      renamed: exp.identity !== cur.identity,
    });
  }

  const additions = expected.filter(
    (entity) => !consumed.has(entity) && include(entity)
  );

  return { matches, additions, unmatched };
}

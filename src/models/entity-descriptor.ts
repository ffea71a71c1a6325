import { reconcile } from "../diff/reconcile.js";
import type {
  EntityModel,
  EntityType,
  FieldChange,
  FieldChanges,
  FieldSpec,
  FieldType,
  FieldValue,
  RawEntity,
} from "./types.js";
import {
  camelToSnake,
  haveSameMembers,
  isEntityList,
  isObject,
  isScalar,
  isScalarList,
  isUnset,
} from "./value-utils.js";

export interface DiffFieldsOptions {
  /** Compare write-only fields as if the provider reported them as unset. */
  forceWriteOnly?: boolean;
}

export interface PayloadOptions {
  /** Restricts the payload to fields for which this returns true. */
  include?: (spec: FieldSpec) => boolean;
}

/**
 * Declares a field. The provider name defaults to the snake_case form of
 * the model name.
 */
export function field(
  name: string,
  type: FieldType,
  extra: Partial<Omit<FieldSpec, "name" | "type">> = {}
): FieldSpec {
  return { name, type, apiName: extra.apiName ?? camelToSnake(name), ...extra };
}

/**
 * Describes one entity type: its fixed field list, how pairs of instances
 * are compared, and how instances map to and from provider data.
 */
export abstract class EntityDescriptor {
  abstract readonly entityType: EntityType;
  abstract readonly fields: readonly FieldSpec[];
  /** Model name of the field holding the natural key. */
  abstract readonly identityField: string | undefined;
  /** Provider key holding the provider-assigned id. */
  readonly providerIdKey: string = "id";

  getField(name: string): FieldSpec | undefined {
    return this.fields.find((spec) => spec.name === name);
  }

  get label(): string {
    return this.entityType.replace(/_/g, " ");
  }

  /**
   * Returns the fields that differ between an expected and a current
   * instance. Expected values that are unset express no preference, and
   * fields the provider did not report are not compared.
   */
  diffFields(
    expected: EntityModel,
    current: EntityModel,
    options: DiffFieldsOptions = {}
  ): FieldChanges {
    const changes: Record<string, FieldChange> = {};

    for (const spec of this.fields) {
      if (spec.readOnly) continue;

      const want = expected.fields[spec.name];
      if (isUnset(want)) continue;
      if (!this.isWritable(spec, want)) continue;

      const have = current.fields[spec.name];

      if (spec.writeOnly) {
        if (options.forceWriteOnly) {
          changes[spec.name] = { expected: want, current: have };
        }
        continue;
      }

      if (have === undefined) continue;

      const change = this.compareField(spec, want, have, options);
      if (change) {
        changes[spec.name] = change;
      }
    }

    return changes;
  }

  /**
   * Provider payload for creating `expected`: every set, writable field.
   */
  toCreatePayload(
    expected: EntityModel,
    options: PayloadOptions = {}
  ): Record<string, unknown> {
    const payload: Record<string, unknown> = {};
    for (const spec of this.fields) {
      if (spec.readOnly) continue;
      if (options.include && !options.include(spec)) continue;
      const value = expected.fields[spec.name];
      if (isUnset(value) || !this.isWritable(spec, value)) continue;
      payload[spec.apiName] = this.toProviderValue(spec, value);
    }
    return payload;
  }

  /**
   * Provider payload carrying only the changed fields.
   */
  toUpdatePayload(
    changes: FieldChanges,
    options: PayloadOptions = {}
  ): Record<string, unknown> {
    const payload: Record<string, unknown> = {};
    for (const [name, change] of Object.entries(changes)) {
      const spec = this.getField(name);
      if (!spec || spec.readOnly) continue;
      if (options.include && !options.include(spec)) continue;
      payload[spec.apiName] = this.toProviderValue(spec, change.expected);
    }
    return payload;
  }

  /**
   * Maps a flat provider record onto a model instance.
   */
  fromProviderData(raw: RawEntity): EntityModel {
    const fields: Record<string, FieldValue | undefined> = {};
    for (const spec of this.fields) {
      const value = this.readValue(spec, raw[spec.apiName], "provider");
      if (value !== undefined) {
        fields[spec.name] = value;
      }
    }
    const providerId = raw[this.providerIdKey];
    return {
      entityType: this.entityType,
      identity: this.identityFromProvider(raw),
      fields,
      ...(typeof providerId === "string" || typeof providerId === "number"
        ? { providerId: String(providerId) }
        : {}),
    };
  }

  /**
   * Maps a validated configuration entry onto a model instance.
   */
  fromConfig(raw: Record<string, unknown>, identity?: string): EntityModel {
    const fields: Record<string, FieldValue | undefined> = {};
    for (const spec of this.fields) {
      const value = this.readValue(spec, raw[spec.name], "config");
      if (value !== undefined) {
        fields[spec.name] = value;
      }
    }
    const aliases = Array.isArray(raw.aliases)
      ? raw.aliases.filter((a): a is string => typeof a === "string")
      : [];
    const id = raw.id;
    return {
      entityType: this.entityType,
      identity: identity ?? this.identityFromFields(fields),
      fields,
      ...(typeof id === "string" || typeof id === "number"
        ? { providerId: String(id) }
        : {}),
      ...(aliases.length > 0 ? { aliases } : {}),
    };
  }

  /**
   * Whether an expected entity takes part in reconciliation at all.
   */
  includeForLivePatch(_expected: EntityModel): boolean {
    return true;
  }

  /**
   * Whether an expected value is an actual value to be written, as opposed
   * to a stand-in such as a masked secret.
   */
  protected isWritable(_spec: FieldSpec, _value: FieldValue): boolean {
    return true;
  }

  protected identityFromProvider(raw: RawEntity): string {
    const spec = this.identityField
      ? this.getField(this.identityField)
      : undefined;
    const value = spec ? raw[spec.apiName] : undefined;
    return typeof value === "string" ? value : String(value ?? "");
  }

  protected identityFromFields(
    fields: Record<string, FieldValue | undefined>
  ): string {
    const value = this.identityField ? fields[this.identityField] : undefined;
    return typeof value === "string" ? value : "";
  }

  protected nestedDescriptor(spec: FieldSpec): EntityDescriptor {
    throw new Error(
      `${this.entityType} has no nested descriptor for ${spec.name}`
    );
  }

  private compareField(
    spec: FieldSpec,
    want: FieldValue,
    have: FieldValue,
    options: DiffFieldsOptions
  ): FieldChange | undefined {
    switch (spec.type) {
      case "string[]":
        if (isScalarList(want) && isScalarList(have)) {
          return haveSameMembers(want, have)
            ? undefined
            : { expected: want, current: have };
        }
        return { expected: want, current: have };

      case "entity[]": {
        if (!isEntityList(want) || !isEntityList(have)) {
          return { expected: want, current: have };
        }
        const nested = this.nestedDescriptor(spec);
        const outcome = reconcile(want, have, {
          diffFields: (e, c) => nested.diffFields(e, c, options),
          includeExpected: (e) => nested.includeForLivePatch(e),
        });
        const modifications = outcome.matches
          .filter((m) => Object.keys(m.changes).length > 0)
          .map((m) => ({
            identity: m.expected.identity,
            changedFields: m.changes,
          }));
        if (
          outcome.additions.length === 0 &&
          outcome.unmatched.length === 0 &&
          modifications.length === 0
        ) {
          return undefined;
        }
        return {
          expected: want,
          current: have,
          nested: {
            additions: outcome.additions,
            modifications,
            unmatched: outcome.unmatched,
          },
        };
      }

      default:
        return want === have ? undefined : { expected: want, current: have };
    }
  }

  private toProviderValue(spec: FieldSpec, value: FieldValue): unknown {
    if (spec.type === "entity[]" && isEntityList(value)) {
      const nested = this.nestedDescriptor(spec);
      return value.map((item) => nested.toCreatePayload(item));
    }
    if (isScalarList(value)) {
      return [...value];
    }
    return value;
  }

  private readValue(
    spec: FieldSpec,
    value: unknown,
    source: "provider" | "config"
  ): FieldValue | undefined {
    if (value === undefined) return undefined;
    if (value === null) return null;

    switch (spec.type) {
      case "boolean":
        return typeof value === "boolean" ? value : undefined;
      case "number":
        return typeof value === "number" ? value : undefined;
      case "string":
        return typeof value === "string" ? value : undefined;
      case "string[]":
        return Array.isArray(value)
          ? value.filter((item: unknown) => isScalar(item) && item !== null)
          : undefined;
      case "entity[]": {
        if (!Array.isArray(value)) return undefined;
        const nested = this.nestedDescriptor(spec);
        return value
          .filter((item: unknown): item is Record<string, unknown> =>
            isObject(item)
          )
          .map((item) =>
            source === "provider"
              ? nested.fromProviderData(item)
              : nested.fromConfig(item)
          );
      }
    }
  }
}

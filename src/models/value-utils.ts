import type { EntityModel, FieldValue, Scalar } from "./types.js";

/**
 * Converts camelCase to snake_case.
 */
export function camelToSnake(str: string): string {
  return str.replace(/([A-Z])/g, "_$1").toLowerCase();
}

export function isObject(val: unknown): val is Record<string, unknown> {
  return val !== null && typeof val === "object" && !Array.isArray(val);
}

export function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

export function isEntityModel(value: unknown): value is EntityModel {
  return (
    isObject(value) &&
    typeof value.entityType === "string" &&
    typeof value.identity === "string" &&
    isObject(value.fields)
  );
}

export function isScalarList(
  value: FieldValue | undefined
): value is readonly Scalar[] {
  return Array.isArray(value) && value.every((item: unknown) => isScalar(item));
}

export function isEntityList(
  value: FieldValue | undefined
): value is readonly EntityModel[] {
  return (
    Array.isArray(value) && value.every((item: unknown) => isEntityModel(item))
  );
}

/**
 * A value that expresses no preference: the field is skipped when diffing
 * and never written.
 */
export function isUnset(value: unknown): value is null | undefined {
  return value === undefined || value === null;
}

/**
 * Order-insensitive comparison of two scalar lists.
 */
export function haveSameMembers(
  a: readonly Scalar[],
  b: readonly Scalar[]
): boolean {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size !== right.size) return false;
  for (const item of left) {
    if (!right.has(item)) return false;
  }
  return true;
}

/**
 * A secret value made only of `*` characters stands for a value that is
 * managed elsewhere.
 */
export function isPlaceholderSecret(value: unknown): boolean {
  return typeof value === "string" && value.length > 0 && /^\*+$/.test(value);
}

export function formatValue(value: FieldValue | undefined): string {
  if (value === undefined) return "<unknown>";
  if (value === null) return "null";
  if (isEntityList(value)) {
    return `[${value.map((item) => item.identity).join(", ")}]`;
  }
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => String(item)).join(", ")}]`;
  }
  if (typeof value === "string") return `"${value}"`;
  return String(value);
}

/** The value itself when it is a plain object, an empty object otherwise. */
export function asObject(value: unknown): Record<string, unknown> {
  return isObject(value) ? value : {};
}

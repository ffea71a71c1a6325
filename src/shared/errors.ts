import type { EntityType, ParentScope } from "../models/types.js";
import { formatScope } from "../models/types.js";

export type ErrorKind =
  | "configuration"
  | "authentication"
  | "provider-operation"
  | "provider-fetch";

/**
 * Base class of all errors raised by the reconciliation core.
 */
export abstract class OrgSyncError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed or inconsistent expected configuration.
 * Fatal for the organization it belongs to.
 */
export class ConfigurationError extends OrgSyncError {
  readonly kind = "configuration";
  readonly issues: readonly string[];

  constructor(issues: string | readonly string[], context?: string) {
    const list = typeof issues === "string" ? [issues] : issues;
    const header = context
      ? `Invalid configuration for ${context}`
      : "Invalid configuration";
    super(
      list.length === 1
        ? `${header}: ${list[0]}`
        : `${header}:\n${list.map((i) => `  - ${i}`).join("\n")}`
    );
    this.issues = list;
  }
}

/**
 * Provider rejected the credentials. Fatal for the entire run.
 */
export class AuthenticationError extends OrgSyncError {
  readonly kind = "authentication";
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.status = status;
  }
}

export interface ProviderErrorContext {
  entityType?: EntityType;
  identity?: string;
  scope?: ParentScope;
  status?: number;
}

export abstract class ProviderError extends OrgSyncError {
  readonly status?: number;
  readonly entityType?: EntityType;
  readonly identity?: string;
  readonly scope?: ParentScope;

  constructor(message: string, context: ProviderErrorContext = {}) {
    super(message);
    this.status = context.status;
    this.entityType = context.entityType;
    this.identity = context.identity;
    this.scope = context.scope;
  }

  /** Human readable location of the failing entity. */
  describeTarget(): string {
    const parts: string[] = [];
    if (this.entityType) parts.push(this.entityType);
    if (this.identity) parts.push(`"${this.identity}"`);
    if (this.scope) parts.push(`in ${formatScope(this.scope)}`);
    return parts.join(" ");
  }
}

/** A single create/update/delete call failed. */
export class ProviderOperationError extends ProviderError {
  readonly kind = "provider-operation";
}

/** Fetching the current state of one collection failed. */
export class ProviderFetchError extends ProviderError {
  readonly kind = "provider-fetch";
}

export function isAuthenticationError(
  error: unknown
): error is AuthenticationError {
  return error instanceof AuthenticationError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Extracts an HTTP-like status code from an error, if it carries one.
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (error instanceof ProviderError || error instanceof AuthenticationError) {
    return error.status;
  }
  if (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number"
  ) {
    return error.status;
  }
  return undefined;
}

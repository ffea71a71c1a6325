import type { EntityType, ParentScope, RawEntity } from "../models/types.js";

/**
 * Addresses one existing entity for update and delete calls.
 */
export interface PatchTarget {
  /** Natural key after the write. */
  identity: string;
  /** Natural key as currently known by the provider, when it differs. */
  previousIdentity?: string;
  providerId?: string;
  /** Independently written field, when the write targets a sub-resource. */
  subResource?: string;
}

/**
 * Read/write capability set for one entity type. Payloads and returned
 * records are flat objects keyed by provider (snake_case) field names.
 */
export interface IEntityGateway {
  fetchCurrent(scope: ParentScope): Promise<RawEntity[]>;
  create(scope: ParentScope, payload: Record<string, unknown>): Promise<RawEntity>;
  update(
    scope: ParentScope,
    target: PatchTarget,
    payload: Record<string, unknown>
  ): Promise<void>;
  delete(scope: ParentScope, target: PatchTarget): Promise<void>;
}

/**
 * Access to live state. Implementations must tolerate concurrent use.
 * Calls raise AuthenticationError when credentials are rejected and
 * ProviderFetchError / ProviderOperationError for any other failure.
 */
export interface IProviderGateway {
  forType(entityType: EntityType): IEntityGateway;
}

import { EntityDescriptor, field } from "./entity-descriptor.js";
import type { EntityModel, FieldSpec, FieldValue } from "./types.js";
import { isPlaceholderSecret } from "./value-utils.js";

export const SECRET_VISIBILITIES = ["all", "private", "selected"] as const;

/**
 * Actions secret at organization or repository scope.
 *
 * The provider never returns secret values, so the value only takes part in
 * a diff when secret updates are forced. A secret whose configured value is
 * a placeholder is not managed at all.
 */
export class SecretDescriptor extends EntityDescriptor {
  readonly entityType = "secret";
  readonly identityField = "name";

  readonly fields: readonly FieldSpec[] = [
    field("name", "string", { identity: true }),
    field("value", "string", { writeOnly: true }),
    field("visibility", "string", {
      orgOnly: true,
      enumValues: SECRET_VISIBILITIES,
    }),
    field("selectedRepositories", "string[]", { orgOnly: true }),
  ];

  includeForLivePatch(expected: EntityModel): boolean {
    return !isPlaceholderSecret(expected.fields.value);
  }

  protected isWritable(spec: FieldSpec, value: FieldValue): boolean {
    return !(spec.name === "value" && isPlaceholderSecret(value));
  }
}

export const secretDescriptor = new SecretDescriptor();

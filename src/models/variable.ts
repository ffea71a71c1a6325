import { EntityDescriptor, field } from "./entity-descriptor.js";
import { SECRET_VISIBILITIES } from "./secret.js";
import type { FieldSpec } from "./types.js";

/**
 * Actions variable at organization or repository scope.
 */
export class VariableDescriptor extends EntityDescriptor {
  readonly entityType = "variable";
  readonly identityField = "name";

  readonly fields: readonly FieldSpec[] = [
    field("name", "string", { identity: true }),
    field("value", "string"),
    field("visibility", "string", {
      orgOnly: true,
      enumValues: SECRET_VISIBILITIES,
    }),
    field("selectedRepositories", "string[]", { orgOnly: true }),
  ];
}

export const variableDescriptor = new VariableDescriptor();

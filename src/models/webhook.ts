import { EntityDescriptor, field } from "./entity-descriptor.js";
import type { FieldSpec, FieldValue } from "./types.js";
import { isPlaceholderSecret } from "./value-utils.js";

export const WEBHOOK_CONTENT_TYPES = ["json", "form"] as const;

/**
 * Organization webhook, identified by its payload url.
 * The secret is write-only: the provider only ever reports it masked.
 */
export class WebhookDescriptor extends EntityDescriptor {
  readonly entityType = "webhook";
  readonly identityField = "url";

  readonly fields: readonly FieldSpec[] = [
    field("url", "string", { identity: true }),
    field("events", "string[]"),
    field("active", "boolean"),
    field("contentType", "string", { enumValues: WEBHOOK_CONTENT_TYPES }),
    field("insecureSsl", "string", { enumValues: ["0", "1"] }),
    field("secret", "string", { writeOnly: true }),
  ];

  protected isWritable(spec: FieldSpec, value: FieldValue): boolean {
    return !(spec.name === "secret" && isPlaceholderSecret(value));
  }
}

export const webhookDescriptor = new WebhookDescriptor();

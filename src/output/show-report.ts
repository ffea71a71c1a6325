import chalk from "chalk";
import type { OrganizationConfig } from "../config/organization-config.js";
import { getDescriptor } from "../models/registry.js";
import {
  CHILD_COLLECTION_TYPES,
  REPOSITORY_CHILD_COLLECTIONS,
  type EntityModel,
} from "../models/types.js";
import { formatValue, isEntityList, isUnset } from "../models/value-utils.js";

const MASK = "********";

function formatEntityTree(model: EntityModel, indent: string, header: string): string[] {
  const descriptor = getDescriptor(model.entityType);
  const lines = [chalk.bold(`${indent}${header}`)];
  const inner = `${indent}  `;

  for (const spec of descriptor.fields) {
    if (spec.identity) continue;
    const value = model.fields[spec.name];
    if (isUnset(value)) continue;
    if (spec.writeOnly) {
      lines.push(`${inner}${spec.name}: ${MASK}`);
    } else if (isEntityList(value) && value.length > 0) {
      lines.push(`${inner}${spec.name}:`);
      for (const item of value) {
        lines.push(
          ...formatEntityTree(item, `${inner}  `, `${item.entityType.replace(/_/g, " ")} ${item.identity}`)
        );
      }
    } else {
      lines.push(`${inner}${spec.name}: ${formatValue(value)}`);
    }
  }

  for (const collection of REPOSITORY_CHILD_COLLECTIONS) {
    for (const child of model.children?.[collection] ?? []) {
      const label = CHILD_COLLECTION_TYPES[collection].replace(/_/g, " ");
      lines.push(...formatEntityTree(child, inner, `${label} ${child.identity}`));
    }
  }
  return lines;
}

/**
 * Renders the expected state of an organization as a tree. Write-only
 * values are masked.
 */
export function formatShow(org: OrganizationConfig): string[] {
  const lines = [chalk.bold(`organization ${org.githubId}`)];
  const indent = "  ";

  const settings = org.getSettings();
  if (settings) {
    lines.push(...formatEntityTree(settings, indent, "settings"));
  }
  for (const webhook of org.getWebhooks()) {
    lines.push(...formatEntityTree(webhook, indent, `webhook ${webhook.identity}`));
  }
  for (const secret of org.getSecrets()) {
    lines.push(...formatEntityTree(secret, indent, `secret ${secret.identity}`));
  }
  for (const variable of org.getVariables()) {
    lines.push(...formatEntityTree(variable, indent, `variable ${variable.identity}`));
  }
  for (const repository of org.getRepositories()) {
    lines.push(
      ...formatEntityTree(repository, indent, `repository ${repository.identity}`)
    );
  }
  return lines;
}

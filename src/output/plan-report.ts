import chalk from "chalk";
import type { Diff, DiffNode, Modification } from "../diff/types.js";
import {
  formatScope,
  type EntityType,
  type FieldChanges,
  type ParentScope,
} from "../models/types.js";
import { formatValue } from "../models/value-utils.js";

export interface FormatDiffOptions {
  /** Unmatched entities are going to be deleted. */
  prune?: boolean;
}

/**
 * `repository "acme/site"`, or `settings "acme"` for the singleton.
 */
export function formatEntity(
  entityType: EntityType,
  scope: ParentScope,
  identity: string
): string {
  const label = entityType.replace(/_/g, " ");
  const location =
    entityType === "settings" ? scope.org : `${formatScope(scope)}/${identity}`;
  return `${label} "${location}"`;
}

function formatFieldChanges(changes: FieldChanges, indent: string): string[] {
  const lines: string[] = [];
  for (const [name, change] of Object.entries(changes)) {
    if (!change.nested) {
      lines.push(
        chalk.yellow(
          `${indent}~ ${name}: ${formatValue(change.current)} -> ${formatValue(change.expected)}`
        )
      );
      continue;
    }
    lines.push(chalk.yellow(`${indent}~ ${name}:`));
    const inner = `${indent}    `;
    for (const addition of change.nested.additions) {
      lines.push(chalk.green(`${inner}+ ${addition.identity}`));
    }
    for (const modification of change.nested.modifications) {
      lines.push(chalk.yellow(`${inner}~ ${modification.identity}`));
      lines.push(...formatFieldChanges(modification.changedFields, `${inner}    `));
    }
    for (const unmatched of change.nested.unmatched) {
      lines.push(chalk.red(`${inner}- ${unmatched.identity}`));
    }
  }
  return lines;
}

function formatModification(node: DiffNode, modification: Modification): string[] {
  const rename =
    modification.previousIdentity !== undefined
      ? ` (renamed from "${modification.previousIdentity}")`
      : "";
  return [
    chalk.yellow(
      `~ ${formatEntity(node.entityType, node.scope, modification.identity)}${rename}`
    ),
    ...formatFieldChanges(modification.changedFields, "    "),
  ];
}

function formatNode(node: DiffNode, options: FormatDiffOptions): string[] {
  const lines: string[] = [];
  for (const addition of node.additions) {
    lines.push(
      chalk.green(
        `+ ${formatEntity(node.entityType, node.scope, addition.expected.identity)}`
      )
    );
  }
  for (const modification of node.modifications) {
    lines.push(...formatModification(node, modification));
  }
  for (const unmatched of node.unmatched) {
    const entity = formatEntity(node.entityType, node.scope, unmatched.current.identity);
    lines.push(
      options.prune
        ? chalk.red(`- ${entity}`)
        : chalk.red(`! ${entity} (not in configuration)`)
    );
  }
  return lines;
}

/**
 * One-line summary of a diff.
 */
export function formatDiffSummary(
  diff: Diff,
  options: FormatDiffOptions = {}
): string {
  const { additions, differences, unmatched } = diff.summary;
  if (additions === 0 && differences === 0) {
    return "No changes. Organization matches the configuration.";
  }
  const unmatchedText = options.prune
    ? `${unmatched} to delete`
    : `${unmatched} unmatched (not deleted)`;
  return `Plan: ${additions} to add, ${differences - unmatched} to change, ${unmatchedText}.`;
}

/**
 * Renders a diff the way a plan is shown: one block per entity, then the
 * warnings, the collections that could not be read and the summary line.
 */
export function formatDiff(diff: Diff, options: FormatDiffOptions = {}): string[] {
  const lines: string[] = [];

  for (const node of diff.nodes) {
    lines.push(...formatNode(node, options));
  }

  for (const warning of diff.warnings) {
    lines.push(chalk.yellow(`⚠ ${warning}`));
  }
  for (const failure of diff.fetchFailures) {
    const label = failure.entityType.replace(/_/g, " ");
    lines.push(
      chalk.red(
        `✗ Could not read ${label} collection of ${formatScope(failure.scope)}: ${failure.message}`
      )
    );
  }

  if (lines.length > 0) {
    lines.push("");
  }
  lines.push(formatDiffSummary(diff, options));
  return lines;
}

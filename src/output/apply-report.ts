import chalk from "chalk";
import type { ApplyResult } from "../apply/types.js";
import { formatScope } from "../models/types.js";
import { describePatch } from "../plan/types.js";

/**
 * One-line summary of an apply run.
 */
export function formatApplySummary(result: ApplyResult): string {
  const deleted = result.deletions > 0 ? `, ${result.deletions} deleted` : "";
  return `Executed plan: ${result.additions} added, ${result.differences} changed${deleted}, ${result.failures.length} failed.`;
}

/**
 * Renders the outcome of an apply run: failures with enough context to
 * retry them, patches that never ran, and the summary line.
 */
export function formatApplyResult(result: ApplyResult): string[] {
  const lines: string[] = [];

  for (const failure of result.failures) {
    const { patch } = failure;
    const label = patch.entityType.replace(/_/g, " ");
    const status = failure.status !== undefined ? ` (HTTP ${failure.status})` : "";
    if (failure.reason === "parent-failed") {
      lines.push(
        chalk.yellow(`⊘ ${describePatch(patch)}: skipped, ${failure.message}`)
      );
    } else {
      lines.push(
        chalk.red(
          `✗ ${label} "${patch.identity}" in ${formatScope(patch.scope)}: ${failure.message}${status}`
        )
      );
    }
  }

  if (result.notDispatched.length > 0) {
    lines.push(
      chalk.yellow(`${result.notDispatched.length} patch(es) were not dispatched:`)
    );
    for (const patch of result.notDispatched) {
      lines.push(chalk.yellow(`    ${describePatch(patch)}`));
    }
  }

  if (result.fatalError) {
    lines.push(chalk.red(`Run stopped: ${result.fatalError.message}`));
  }

  if (lines.length > 0) {
    lines.push("");
  }
  lines.push(formatApplySummary(result));
  return lines;
}

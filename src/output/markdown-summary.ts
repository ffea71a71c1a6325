import { appendFileSync } from "node:fs";
import type { OrgRunResult, ReconcileMode } from "../reconcile/types.js";
import { formatApplySummary } from "./apply-report.js";
import { formatDiffSummary } from "./plan-report.js";

function escapeMarkdown(text: string): string {
  // Escape backslashes first, then pipes (order matters to prevent double-escaping)
  return text.replace(/\\/g, "\\\\").replace(/\|/g, "\\|");
}

function formatStatus(result: OrgRunResult): string {
  switch (result.status) {
    case "succeeded":
      return "✅ Succeeded";
    case "skipped":
      return "⏭️ Skipped";
    case "failed":
      return "❌ Failed";
  }
}

function formatChanges(result: OrgRunResult): string {
  if (!result.diff) return "-";
  const { additions, differences, unmatched } = result.diff.summary;
  return `+${additions} ~${differences - unmatched} !${unmatched}`;
}

function formatResult(result: OrgRunResult, mode: ReconcileMode): string {
  if (result.error) return escapeMarkdown(result.error.message);
  if (mode === "apply" && result.apply) {
    return escapeMarkdown(formatApplySummary(result.apply));
  }
  if (result.diff) return escapeMarkdown(formatDiffSummary(result.diff));
  return "-";
}

/**
 * Markdown summary of a run: status counts and one row per organization.
 */
export function formatMarkdownSummary(
  results: readonly OrgRunResult[],
  mode: ReconcileMode
): string {
  const lines: string[] = [];
  const count = (status: OrgRunResult["status"]): number =>
    results.filter((r) => r.status === status).length;

  lines.push(mode === "plan" ? "## Organization Plan" : "## Organization Apply");
  lines.push("");

  if (mode === "plan") {
    lines.push("> [!NOTE]");
    lines.push("> Plan only, no changes were applied");
    lines.push("");
  }

  lines.push("| Status | Count |");
  lines.push("|--------|-------|");
  lines.push(`| ✅ Succeeded | ${count("succeeded")} |`);
  lines.push(`| ⏭️ Skipped | ${count("skipped")} |`);
  lines.push(`| ❌ Failed | ${count("failed")} |`);
  lines.push(`| **Total** | **${results.length}** |`);

  if (results.length > 0) {
    lines.push("");
    lines.push("| Organization | Status | Changes | Result |");
    lines.push("|--------------|--------|---------|--------|");
    for (const result of results) {
      lines.push(
        `| ${escapeMarkdown(result.org)} | ${formatStatus(result)} | ${formatChanges(result)} | ${formatResult(result, mode)} |`
      );
    }
  }

  return lines.join("\n");
}

/**
 * Appends the summary to the file named by GITHUB_STEP_SUMMARY, if set.
 */
export function writeMarkdownSummary(
  results: readonly OrgRunResult[],
  mode: ReconcileMode
): void {
  const summaryPath = process.env.GITHUB_STEP_SUMMARY;
  if (!summaryPath) return;

  const markdown = formatMarkdownSummary(results, mode);
  appendFileSync(summaryPath, "\n" + markdown + "\n");
}

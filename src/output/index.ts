// Plan (diff) rendering
export {
  formatDiff,
  formatDiffSummary,
  formatEntity,
  type FormatDiffOptions,
} from "./plan-report.js";

// Apply result rendering
export { formatApplyResult, formatApplySummary } from "./apply-report.js";

// Expected state rendering
export { formatShow } from "./show-report.js";

// GitHub Actions summary
export {
  formatMarkdownSummary,
  writeMarkdownSummary,
} from "./markdown-summary.js";

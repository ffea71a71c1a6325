import { resolve } from "node:path";
import chalk from "chalk";
import {
  loadConfigFile,
  type OrganizationEntry,
} from "../config/loader.js";
import { formatApplyResult } from "../output/apply-report.js";
import { writeMarkdownSummary } from "../output/markdown-summary.js";
import { formatDiff } from "../output/plan-report.js";
import { Reconciler } from "../reconcile/reconciler.js";
import {
  RunStoppedError,
  type OrgRunResult,
  type ReconcileMode,
} from "../reconcile/types.js";
import {
  ConfigurationError,
  formatErrorMessage,
  isAuthenticationError,
} from "../shared/errors.js";
import { logger as defaultLogger } from "../shared/logger.js";
import {
  defaultGatewayFactory,
  type CommandContext,
  type ReconcileCommandOptions,
  type SharedOptions,
} from "./types.js";

/**
 * Keeps the organizations requested with `--org`, in configuration order.
 */
export function selectOrganizations(
  entries: readonly OrganizationEntry[],
  orgs: readonly string[] | undefined
): OrganizationEntry[] {
  if (!orgs || orgs.length === 0) {
    return [...entries];
  }
  const known = new Set(entries.map((entry) => entry.githubId));
  const unknown = orgs.filter((org) => !known.has(org));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      unknown.map((org) => `organization "${org}" is not in the configuration`)
    );
  }
  return entries.filter((entry) => orgs.includes(entry.githubId));
}

/**
 * Loads the configuration file and selects organizations. Prints the error
 * and returns undefined when that fails.
 */
export function loadEntries(
  options: SharedOptions,
  print: (line: string) => void
): OrganizationEntry[] | undefined {
  const configPath = resolve(options.config);
  try {
    return selectOrganizations(loadConfigFile(configPath), options.org);
  } catch (error) {
    print(chalk.red(formatErrorMessage(error)));
    return undefined;
  }
}

function printResult(
  result: OrgRunResult,
  options: ReconcileCommandOptions,
  print: (line: string) => void
): void {
  print("");
  print(chalk.bold(`Organization ${result.org}`));
  if (result.diff) {
    for (const line of formatDiff(result.diff, { prune: options.prune })) {
      print(`  ${line}`);
    }
  }
  if (result.apply) {
    print("");
    for (const line of formatApplyResult(result.apply)) {
      print(`  ${line}`);
    }
  }
  // A stop during apply is already reported with the apply result.
  if (result.error && result.error !== result.apply?.fatalError) {
    print(chalk.red(`  ${result.error.message}`));
  }
}

/**
 * Runs the plan or apply command. Returns the process exit code.
 */
export async function runReconcile(
  mode: ReconcileMode,
  options: ReconcileCommandOptions,
  context: CommandContext = {}
): Promise<number> {
  const print = context.print ?? console.log;
  const logger = context.logger ?? defaultLogger;

  const entries = loadEntries(options, print);
  if (!entries) {
    return 1;
  }

  logger.info(`Loaded configuration for ${entries.length} organization(s)`);
  if (mode === "plan") {
    logger.info("Running in PLAN mode - no changes will be made");
  }

  let results: OrgRunResult[];
  try {
    const gateway = (context.gatewayFactory ?? defaultGatewayFactory)(
      options,
      logger
    );
    const reconciler = new Reconciler(gateway, {
      mode,
      prune: mode === "apply" && options.prune === true,
      updateSecrets: options.updateSecrets,
      tolerateFetchErrors: options.tolerateFetchErrors,
      repoFilter: options.repoFilter,
      concurrency: options.concurrency,
      signal: context.signal,
      logger,
    });
    results = await reconciler.run(entries);
  } catch (error) {
    if (error instanceof RunStoppedError) {
      for (const result of error.results) {
        printResult(result, options, print);
      }
      writeMarkdownSummary(error.results, mode);
      print(chalk.red(`Run stopped: ${error.message}`));
      return 1;
    }
    if (isAuthenticationError(error)) {
      print(chalk.red(error.message));
      return 1;
    }
    throw error;
  }

  for (const result of results) {
    printResult(result, options, print);
  }
  writeMarkdownSummary(results, mode);

  return results.every((result) => result.status === "succeeded") ? 0 : 1;
}

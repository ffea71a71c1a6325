import { program, Command, InvalidArgumentError } from "commander";
import { dirname, join } from "node:path";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { runReconcile } from "./reconcile-command.js";
import { runShow } from "./show-command.js";
import type { ReconcileCommandOptions, SharedOptions } from "./types.js";

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: unknown = JSON.parse(
  readFileSync(join(__dirname, "../..", "package.json"), "utf-8")
);
const version =
  packageJson !== null &&
  typeof packageJson === "object" &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function parseRetries(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Must be zero or a positive integer.");
  }
  return parsed;
}

/**
 * Cancels the run on Ctrl-C: patches not yet dispatched are reported
 * instead of being sent.
 */
function cancellationSignal(): AbortSignal {
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  return controller.signal;
}

// =============================================================================
// Shared CLI Options
// =============================================================================

/**
 * Adds options common to every command.
 */
function addSharedOptions(cmd: Command): Command {
  return cmd
    .requiredOption("-c, --config <path>", "Path to YAML config file")
    .option(
      "-o, --org <githubId...>",
      "Only process these organizations (default: all)"
    );
}

/**
 * Adds options of the commands that read live state.
 */
function addReconcileOptions(cmd: Command): Command {
  return addSharedOptions(cmd)
    .option(
      "--repo-filter <glob>",
      "Only reconcile repositories whose name matches this glob"
    )
    .option(
      "--concurrency <number>",
      "Independent lanes processed at the same time",
      parsePositiveInt,
      4
    )
    .option(
      "--update-secrets",
      "Rewrite secret values even though GitHub never reports them back"
    )
    .option(
      "--tolerate-fetch-errors",
      "Treat collections that cannot be read as empty, with a warning"
    )
    .option(
      "--token <token>",
      "GitHub token (default: GH_TOKEN environment variable)",
      process.env.GH_TOKEN
    )
    .option("--host <hostname>", "GitHub Enterprise hostname")
    .option(
      "-r, --retries <number>",
      "Number of retries for network operations (0 to disable)",
      parseRetries,
      3
    )
    .option(
      "--live-state <path>",
      "Read live state from a YAML/JSON snapshot instead of GitHub"
    );
}

// =============================================================================
// CLI Program
// =============================================================================

program
  .name("orgsync")
  .description(
    "Reconcile GitHub organization settings, repositories, webhooks, branch protection, secrets and variables with a declarative configuration"
  )
  .version(version);

const planCommand = new Command("plan")
  .description("Show the changes needed to match the configuration")
  .action(async (opts: ReconcileCommandOptions) => {
    process.exitCode = await runReconcile("plan", opts);
  });

addReconcileOptions(planCommand);
program.addCommand(planCommand);

const applyCommand = new Command("apply")
  .description("Apply the changes needed to match the configuration")
  .option("--prune", "Delete live entities that are not in the configuration")
  .action(async (opts: ReconcileCommandOptions) => {
    process.exitCode = await runReconcile("apply", opts, {
      signal: cancellationSignal(),
    });
  });

addReconcileOptions(applyCommand);
program.addCommand(applyCommand);

const showCommand = new Command("show")
  .description("Print the expected state described by the configuration")
  .action((opts: SharedOptions) => {
    process.exitCode = runShow(opts);
  });

addSharedOptions(showCommand);
program.addCommand(showCommand);

export { program };

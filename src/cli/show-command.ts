import chalk from "chalk";
import { formatShow } from "../output/show-report.js";
import { formatErrorMessage } from "../shared/errors.js";
import { loadEntries } from "./reconcile-command.js";
import type { CommandContext, SharedOptions } from "./types.js";

/**
 * Prints the expected state of every selected organization. Returns the
 * process exit code.
 */
export function runShow(
  options: SharedOptions,
  context: CommandContext = {}
): number {
  const print = context.print ?? console.log;
  const entries = loadEntries(options, print);
  if (!entries) {
    return 1;
  }

  let failed = false;
  for (const entry of entries) {
    try {
      for (const line of formatShow(entry.load())) {
        print(line);
      }
    } catch (error) {
      failed = true;
      print(chalk.red(formatErrorMessage(error)));
    }
    print("");
  }
  return failed ? 1 : 0;
}

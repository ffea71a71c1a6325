import chalk from "chalk";
import { sanitizeCredentials } from "./sanitize-utils.js";

export interface LoggerStats {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

export type PatchOutcome = "applied" | "failed" | "skipped";

/**
 * Logging surface used by the reconciliation pipeline.
 * Progress-style methods take the 1-based position of the organization being
 * processed and its name.
 */
export interface ILogger {
  info(message: string): void;
  warn(message: string): void;
  setTotal(total: number): void;
  progress(current: number, org: string, message: string): void;
  success(current: number, org: string, message: string): void;
  skip(current: number, org: string, reason: string): void;
  error(current: number, org: string, error: string): void;
  patchResult(description: string, outcome: PatchOutcome, detail?: string): void;
}

export class Logger implements ILogger {
  private stats: LoggerStats = {
    total: 0,
    succeeded: 0,
    failed: 0,
    skipped: 0,
  };

  setTotal(total: number): void {
    this.stats.total = total;
  }

  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.log(chalk.yellow(`⚠ ${sanitizeCredentials(message)}`));
  }

  progress(current: number, org: string, message: string): void {
    console.log(
      chalk.blue(`[${current}/${this.stats.total}]`) + ` ${org}: ${message}`
    );
  }

  success(current: number, org: string, message: string): void {
    this.stats.succeeded++;
    console.log(
      chalk.green(`[${current}/${this.stats.total}] ✓`) + ` ${org}: ${message}`
    );
  }

  skip(current: number, org: string, reason: string): void {
    this.stats.skipped++;
    console.log(
      chalk.yellow(`[${current}/${this.stats.total}] ⊘`) +
        ` ${org}: Skipped - ${reason}`
    );
  }

  error(current: number, org: string, error: string): void {
    this.stats.failed++;
    console.log(
      chalk.red(`[${current}/${this.stats.total}] ✗`) +
        ` ${org}: ${sanitizeCredentials(error)}`
    );
  }

  patchResult(
    description: string,
    outcome: PatchOutcome,
    detail?: string
  ): void {
    switch (outcome) {
      case "applied":
        console.log(chalk.green(`  ✓ ${description}`));
        break;
      case "failed":
        console.log(chalk.red(`  ✗ ${description}`));
        if (detail) {
          console.log(chalk.red(`      ${sanitizeCredentials(detail)}`));
        }
        break;
      case "skipped":
        console.log(
          chalk.gray(`  ⊘ ${description}${detail ? ` (${detail})` : ""}`)
        );
        break;
    }
  }

  getStats(): LoggerStats {
    return { ...this.stats };
  }
}

export const logger = new Logger();

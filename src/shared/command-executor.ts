import { exec } from "node:child_process";
import { promisify } from "node:util";
import { sanitizeCredentials } from "./sanitize-utils.js";

const execAsync = promisify(exec);

/**
 * Options for command execution.
 */
export interface ExecOptions {
  /** Additional environment variables to set for the command */
  env?: Record<string, string>;
  /** Working directory, defaults to the process working directory */
  cwd?: string;
}

/**
 * Interface for executing shell commands.
 * Enables dependency injection for testing and alternative implementations.
 */
export interface ICommandExecutor {
  /**
   * Execute a shell command and return the trimmed stdout output.
   * @throws Error if the command exits with a non-zero status
   */
  exec(command: string, options?: ExecOptions): Promise<string>;
}

/**
 * Default implementation on top of Node.js child_process.exec.
 * Runs asynchronously so that independent provider calls can overlap.
 * Note: Arguments are escaped using escapeShellArg before being passed here.
 */
export class ShellCommandExecutor implements ICommandExecutor {
  async exec(command: string, options?: ExecOptions): Promise<string> {
    try {
      const { stdout } = await execAsync(command, {
        cwd: options?.cwd ?? process.cwd(),
        encoding: "utf-8",
        maxBuffer: 64 * 1024 * 1024,
        env: options?.env ? { ...process.env, ...options.env } : undefined,
      });
      return stdout.trim();
    } catch (error) {
      const execError = error as {
        stderr?: Buffer | string;
        message?: string;
      };
      if (execError.stderr && typeof execError.stderr !== "string") {
        execError.stderr = execError.stderr.toString();
      }
      // Sanitize credentials from stderr before including in error
      if (execError.stderr) {
        execError.stderr = sanitizeCredentials(execError.stderr);
      }
      if (execError.stderr && execError.message) {
        execError.message =
          sanitizeCredentials(execError.message) + "\n" + execError.stderr;
      } else if (execError.message) {
        execError.message = sanitizeCredentials(execError.message);
      }
      throw error;
    }
  }
}

/**
 * Default executor instance for production use.
 */
export const defaultExecutor: ICommandExecutor = new ShellCommandExecutor();

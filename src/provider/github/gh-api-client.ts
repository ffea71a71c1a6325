import {
  defaultExecutor,
  type ExecOptions,
  type ICommandExecutor,
} from "../../shared/command-executor.js";
import { AuthenticationError, formatErrorMessage } from "../../shared/errors.js";
import type { ILogger } from "../../shared/logger.js";
import { withRetry } from "../../shared/retry-utils.js";
import { sanitizeCredentials } from "../../shared/sanitize-utils.js";
import { escapeShellArg } from "../../shared/shell-utils.js";
import { isObject } from "../../models/value-utils.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface GhApiClientOptions {
  executor?: ICommandExecutor;
  /** Token passed to `gh` as GH_TOKEN. Falls back to gh's own login. */
  token?: string;
  /** GitHub Enterprise hostname. */
  host?: string;
  /** Retries of transient failures. */
  retries?: number;
  /** Base delay between retries in milliseconds. */
  retryDelay?: number;
  logger?: ILogger;
}

/**
 * Failed `gh` invocation. Carries the HTTP status reported by gh, if any.
 */
export class GhApiError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "GhApiError";
  }
}

const HTTP_STATUS_PATTERN = /HTTP (\d{3})/;
const AUTH_PATTERNS = [/Bad credentials/i, /gh auth login/i, /authentication required/i];

/**
 * Converts an executor failure into a GhApiError, or an AuthenticationError
 * when gh reports rejected credentials.
 */
export function toGhApiError(error: unknown): Error {
  const message = sanitizeCredentials(formatErrorMessage(error));
  const match = HTTP_STATUS_PATTERN.exec(message);
  const status = match ? Number(match[1]) : undefined;
  if (status === 401 || AUTH_PATTERNS.some((p) => p.test(message))) {
    return new AuthenticationError(
      `GitHub rejected the credentials: ${message}`,
      status
    );
  }
  return new GhApiError(message, status);
}

/**
 * Thin wrapper around the `gh` CLI: builds escaped commands, pipes JSON
 * payloads through stdin, retries transient failures and maps errors.
 */
export class GhApiClient {
  private readonly executor: ICommandExecutor;

  constructor(private readonly options: GhApiClientOptions = {}) {
    this.executor = options.executor ?? defaultExecutor;
  }

  /**
   * Calls a REST endpoint and returns the raw response body.
   */
  async api(
    method: HttpMethod,
    endpoint: string,
    payload?: unknown
  ): Promise<string> {
    const args: string[] = ["gh", "api"];

    if (method !== "GET") {
      args.push("-X", method);
    }

    if (this.options.host && this.options.host !== "github.com") {
      args.push("--hostname", escapeShellArg(this.options.host));
    }

    args.push(escapeShellArg(endpoint));

    const baseCommand = args.join(" ");

    // Payloads go through stdin. printf keeps backslashes in the JSON intact
    if (payload !== undefined && method !== "GET" && method !== "DELETE") {
      const payloadJson = JSON.stringify(payload);
      return this.run(
        `printf '%s' ${escapeShellArg(payloadJson)} | ${baseCommand} --input -`
      );
    }

    return this.run(baseCommand);
  }

  async json(
    method: HttpMethod,
    endpoint: string,
    payload?: unknown
  ): Promise<unknown> {
    const body = await this.api(method, endpoint, payload);
    return body ? JSON.parse(body) : undefined;
  }

  /**
   * Reads every page of a list endpoint. `select` is the jq path of the
   * items within one page.
   */
  async list(
    endpoint: string,
    select = ".[]"
  ): Promise<Record<string, unknown>[]> {
    const args: string[] = ["gh", "api", "--paginate"];
    if (this.options.host && this.options.host !== "github.com") {
      args.push("--hostname", escapeShellArg(this.options.host));
    }
    args.push(escapeShellArg(endpoint));
    args.push("--jq", escapeShellArg(`${select} | @json`));

    const output = await this.run(args.join(" "));
    return output
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line): unknown => JSON.parse(line))
      .filter(isObject);
  }

  /**
   * Runs a GraphQL document and returns its `data` member.
   */
  async graphql(
    query: string,
    variables: Record<string, unknown> = {}
  ): Promise<Record<string, unknown>> {
    const response = await this.json("POST", "graphql", { query, variables });
    if (!isObject(response)) {
      throw new GhApiError("Empty GraphQL response");
    }
    const errors = response.errors;
    if (Array.isArray(errors) && errors.length > 0) {
      const messages = errors
        .map((e: unknown) =>
          isObject(e) && typeof e.message === "string" ? e.message : String(e)
        )
        .join("; ");
      const notFound = errors.some(
        (e: unknown) => isObject(e) && e.type === "NOT_FOUND"
      );
      throw new GhApiError(
        `GraphQL error: ${messages}`,
        notFound ? 404 : undefined
      );
    }
    return isObject(response.data) ? response.data : {};
  }

  /**
   * Runs a gh subcommand other than `api`, e.g. `secret set`.
   */
  async command(args: readonly string[], stdin?: string): Promise<string> {
    const command = ["gh", ...args].join(" ");
    return this.run(
      stdin !== undefined
        ? `printf '%s' ${escapeShellArg(stdin)} | ${command}`
        : command
    );
  }

  private async run(command: string): Promise<string> {
    const env: Record<string, string> = {};
    if (this.options.token) env.GH_TOKEN = this.options.token;
    if (this.options.host) env.GH_HOST = this.options.host;
    const execOptions: ExecOptions = Object.keys(env).length > 0 ? { env } : {};

    return withRetry(
      async () => {
        try {
          return await this.executor.exec(command, execOptions);
        } catch (error) {
          throw toGhApiError(error);
        }
      },
      {
        retries: this.options.retries ?? 3,
        minTimeout: this.options.retryDelay ?? 1000,
        onRetry: (error, attempt) => {
          this.options.logger?.warn(
            `gh call failed (attempt ${attempt}), retrying: ${formatErrorMessage(error)}`
          );
        },
      }
    );
  }
}

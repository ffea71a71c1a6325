import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { InMemoryGateway } from "../provider/in-memory-gateway.js";
import { GitHubGateway } from "../provider/github/github-gateway.js";
import type { IProviderGateway } from "../provider/types.js";
import type { ILogger } from "../shared/logger.js";

/**
 * Options shared by every command.
 */
export interface SharedOptions {
  config: string;
  /** Restricts the run to these organizations. */
  org?: string[];
}

/**
 * Options of the plan and apply commands.
 */
export interface ReconcileCommandOptions extends SharedOptions {
  repoFilter?: string;
  concurrency?: number;
  updateSecrets?: boolean;
  tolerateFetchErrors?: boolean;
  token?: string;
  host?: string;
  retries?: number;
  /** Snapshot file standing in for GitHub. */
  liveState?: string;
  /** Apply only. */
  prune?: boolean;
}

/**
 * Factory for the provider gateway, replaceable in tests.
 */
export type GatewayFactory = (
  options: ReconcileCommandOptions,
  logger: ILogger
) => IProviderGateway;

/**
 * Uses an in-memory provider seeded from `--live-state`, GitHub otherwise.
 */
export const defaultGatewayFactory: GatewayFactory = (options, logger) => {
  if (options.liveState) {
    const content = readFileSync(options.liveState, "utf-8");
    return InMemoryGateway.fromSnapshot(parse(content));
  }
  return new GitHubGateway({
    token: options.token,
    host: options.host,
    retries: options.retries,
    concurrency: options.concurrency,
    logger,
  });
};

/**
 * Collaborators of a command. Every member defaults to the real one.
 */
export interface CommandContext {
  gatewayFactory?: GatewayFactory;
  logger?: ILogger;
  /** Receives report lines. Defaults to console.log. */
  print?: (line: string) => void;
  /** Cancels dispatching of further patches. */
  signal?: AbortSignal;
}

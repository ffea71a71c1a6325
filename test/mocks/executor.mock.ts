import type {
  ExecOptions,
  ICommandExecutor,
} from "../../src/shared/command-executor.js";

export interface ExecutorMockConfig {
  defaultResponse?: string;
  /**
   * Responses keyed by a substring of the command. The first matching
   * pattern wins; an array is consumed one entry per call, its last entry
   * repeating.
   */
  responses?: Map<string, string | Error | (string | Error)[]>;
}

export interface ExecutorMockResult {
  mock: ICommandExecutor;
  calls: Array<{ command: string; options?: ExecOptions }>;
  reset: () => void;
}

export function createMockExecutor(
  config: ExecutorMockConfig = {}
): ExecutorMockResult {
  const calls: Array<{ command: string; options?: ExecOptions }> = [];
  const responses = config.responses ?? new Map();
  const defaultResponse = config.defaultResponse ?? "";

  const mock: ICommandExecutor = {
    async exec(command: string, options?: ExecOptions): Promise<string> {
      calls.push({ command, options });

      // Check for matching response
      for (const [pattern, entry] of responses) {
        if (!command.includes(pattern)) continue;
        const response = Array.isArray(entry)
          ? entry.length > 1
            ? entry.shift()
            : entry[0]
          : entry;
        if (response instanceof Error) {
          throw response;
        }
        return response ?? defaultResponse;
      }

      return defaultResponse;
    },
  };

  return {
    mock,
    calls,
    reset: () => {
      calls.length = 0;
    },
  };
}

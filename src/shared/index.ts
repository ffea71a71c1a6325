// Logging
export {
  Logger,
  logger,
  type ILogger,
  type LoggerStats,
  type PatchOutcome,
} from "./logger.js";

// Errors
export {
  OrgSyncError,
  ConfigurationError,
  AuthenticationError,
  ProviderError,
  ProviderOperationError,
  ProviderFetchError,
  isAuthenticationError,
  isProviderError,
  formatErrorMessage,
  getErrorStatus,
  type ErrorKind,
  type ProviderErrorContext,
} from "./errors.js";

// Retry utilities
export {
  withRetry,
  isPermanentError,
  isTransientError,
  AbortError,
  DEFAULT_PERMANENT_ERROR_PATTERNS,
  DEFAULT_TRANSIENT_ERROR_PATTERNS,
  type RetryOptions,
} from "./retry-utils.js";

// Command execution
export {
  ShellCommandExecutor,
  defaultExecutor,
  type ICommandExecutor,
  type ExecOptions,
} from "./command-executor.js";

// Shell utilities
export { escapeShellArg } from "./shell-utils.js";

// Sanitization
export { sanitizeCredentials } from "./sanitize-utils.js";

// Concurrency
export { mapWithConcurrency } from "./concurrency.js";

// Entity models and schemas
export * from "./models/index.js";

// Configuration loading
export * from "./config/index.js";

// Diff, plan and apply
export * from "./diff/index.js";
export * from "./plan/index.js";
export * from "./apply/index.js";
export * from "./reconcile/index.js";

// Providers
export * from "./provider/index.js";

// Reporting
export * from "./output/index.js";

// Shared utilities
export * from "./shared/index.js";

// CLI commands
export {
  runReconcile,
  runShow,
  selectOrganizations,
  defaultGatewayFactory,
  type GatewayFactory,
  type CommandContext,
  type ReconcileCommandOptions,
  type SharedOptions,
} from "./cli/index.js";

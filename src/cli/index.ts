// CLI command implementations
export {
  runReconcile,
  selectOrganizations,
  loadEntries,
} from "./reconcile-command.js";
export { runShow } from "./show-command.js";

export {
  defaultGatewayFactory,
  type GatewayFactory,
  type CommandContext,
  type ReconcileCommandOptions,
  type SharedOptions,
} from "./types.js";

export { program } from "./program.js";

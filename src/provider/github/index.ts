export { GitHubGateway, type GitHubGatewayOptions } from "./github-gateway.js";
export {
  GhApiClient,
  GhApiError,
  toGhApiError,
  type GhApiClientOptions,
  type HttpMethod,
} from "./gh-api-client.js";
export { GitHubEntityGateway } from "./base-gateway.js";
export { SettingsGateway } from "./settings-gateway.js";
export { WebhookGateway } from "./webhook-gateway.js";
export { RepositoryGateway } from "./repository-gateway.js";
export {
  BranchProtectionRuleGateway,
  fromGraphQLRule,
  toGraphQLInput,
} from "./branch-protection-rule-gateway.js";
export { SecretGateway } from "./secret-gateway.js";
export { VariableGateway } from "./variable-gateway.js";
export {
  EnvironmentGateway,
  fromEnvironmentResponse,
  toDeploymentBranchPolicy,
} from "./environment-gateway.js";

export {
  type IEntityGateway,
  type IProviderGateway,
  type PatchTarget,
} from "./types.js";
export {
  InMemoryGateway,
  type GatewayOperation,
  type InjectedFailure,
  type RecordedCall,
} from "./in-memory-gateway.js";
export * from "./github/index.js";

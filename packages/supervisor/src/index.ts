// Core domain
export * from "./core/model.js";
export * from "./core/ports/index.js";
export { sanitizeLine } from "./core/sanitizeLine.js";
export { withTimeout } from "./core/timing.js";
export {
  OutputRelay,
  DEFAULT_DRAIN_GRACE_MS,
  type OutputRelayOptions,
  type RelayOutcome,
  type RelayHaltReason,
} from "./core/services/OutputRelay.js";
export {
  ProcessSupervisor,
  DEFAULT_STOP_TIMEOUT_MS,
  type ProcessSupervisorOptions,
} from "./core/services/ProcessSupervisor.js";
export { Broadcaster, DEFAULT_MAX_PENDING_EVENTS, type BroadcasterOptions } from "./core/services/Broadcaster.js";

// Infrastructure
export { NodeWorkerLauncher, findExecutable } from "./infrastructure/runner/NodeWorkerLauncher.js";
export {
  WebSocketFeed,
  FEED_PATH,
  DROPPED_CLOSE_CODE,
  type FeedSocket,
  type WebSocketFeedOptions,
} from "./infrastructure/feed/WebSocketFeed.js";

// Configuration
export { loadConfig, parseList, type RelayConfig } from "./config.js";

// Tools (MCP tool registration)
export { registerAllTools } from "./tools/index.js";
export type { RelayServices, ToolRegistrar } from "./tools/types.js";
export * from "./tools/schemas.js";

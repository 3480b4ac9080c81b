import type { McpServer } from "@console-relay/core";
import type { RelayServices, ToolRegistrar } from "./types.js";

import { registerWorkerStart } from "./workerStart.js";
import { registerWorkerStop } from "./workerStop.js";
import { registerWorkerStatus } from "./workerStatus.js";
import { registerFeedObservers } from "./feedObservers.js";

const allTools: ToolRegistrar[] = [
  registerWorkerStart,
  registerWorkerStop,
  registerWorkerStatus,
  registerFeedObservers,
];

export function registerAllTools(server: McpServer, services: RelayServices): void {
  for (const register of allTools) {
    register(server, services);
  }
}

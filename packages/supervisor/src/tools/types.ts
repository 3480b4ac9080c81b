import type { McpServer } from "@console-relay/core";
import type { Broadcaster } from "../core/services/Broadcaster.js";
import type { ProcessSupervisor } from "../core/services/ProcessSupervisor.js";

/** What the tools operate on. */
export interface RelayServices {
  supervisor: ProcessSupervisor;
  broadcaster: Broadcaster;
}

export interface ToolRegistrar {
  (server: McpServer, services: RelayServices): void;
}

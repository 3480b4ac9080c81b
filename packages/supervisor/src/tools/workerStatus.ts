import { successResponse, type ToolResponse } from "@console-relay/core";
import type { SupervisorStatus } from "../core/model.js";
import type { ToolRegistrar } from "./types.js";
import { StatusOutputShape } from "./schemas.js";

export function formatStatus(status: SupervisorStatus): string {
  const lines: string[] = [];
  if (status.isRunning) {
    lines.push(`Worker ${status.state} (PID ${status.pid}, run ${status.runId}, since ${status.startedAt})`);
  } else {
    lines.push(`Worker ${status.state}`);
  }
  if (status.lastFailure) {
    lines.push(`Last start failed: ${status.lastFailure}`);
  }
  return lines.join("\n");
}

export const registerWorkerStatus: ToolRegistrar = (server, { supervisor }) => {
  server.registerTool(
    "worker_status",
    {
      title: "Worker status",
      description: `Report whether the worker is running, its PID and its lifecycle state
(idle, starting, running, stopping).`,
      inputSchema: {},
      outputSchema: StatusOutputShape,
    },
    async (): Promise<ToolResponse> => {
      const status = supervisor.status();
      return successResponse(formatStatus(status), { ...status });
    }
  );
};

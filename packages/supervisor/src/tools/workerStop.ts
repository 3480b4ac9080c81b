import { resultToStructuredResponse, type ToolResponse } from "@console-relay/core";
import type { WorkerExit } from "../core/model.js";
import type { ToolRegistrar } from "./types.js";
import { StopOutputShape } from "./schemas.js";

function describeExit(exit: WorkerExit | null): string {
  if (!exit) return "exit status unknown";
  if (exit.signal) return `killed by ${exit.signal}`;
  return `exit code ${exit.code}`;
}

export const registerWorkerStop: ToolRegistrar = (server, { supervisor }) => {
  server.registerTool(
    "worker_stop",
    {
      title: "Stop worker",
      description: `Stop the running worker with SIGTERM and wait for it to exit.

Errors:
- NotRunning: no worker is running (or it is already stopping)
- StopTimeout: the worker did not exit in time; it is left to exit on its own`,
      inputSchema: {},
      outputSchema: StopOutputShape,
    },
    async (): Promise<ToolResponse> => {
      const result = await supervisor.stop();
      return resultToStructuredResponse(result, (stopped) => ({
        text: `Worker stopped (PID ${stopped.pid}, ${describeExit(stopped.exit)}${stopped.forced ? ", after SIGKILL" : ""})`,
        data: {
          pid: stopped.pid,
          exitCode: stopped.exit?.code ?? null,
          signal: stopped.exit?.signal ?? null,
          forced: stopped.forced,
        },
      }));
    }
  );
};

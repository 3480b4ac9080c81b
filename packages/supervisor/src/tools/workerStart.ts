import { resultToStructuredResponse, type ToolResponse } from "@console-relay/core";
import type { ToolRegistrar } from "./types.js";
import { StartOutputShape } from "./schemas.js";

export const registerWorkerStart: ToolRegistrar = (server, { supervisor }) => {
  server.registerTool(
    "worker_start",
    {
      title: "Start worker",
      description: `Start the supervised worker process.

Only one worker runs at a time. Its output is relayed line by line to every
connected observer, and observers see a status event when it starts and ends.

Errors:
- Conflict: a worker is already starting, running or stopping
- NotFound: the worker entry script or executable does not exist
- EnvironmentMissing: the runtime or working directory does not exist
- SpawnFailed: the operating system refused to start the process`,
      inputSchema: {},
      outputSchema: StartOutputShape,
    },
    async (): Promise<ToolResponse> => {
      const result = await supervisor.start();
      return resultToStructuredResponse(result, (started) => ({
        text: `Worker started (PID ${started.pid}, run ${started.runId})`,
        data: { pid: started.pid, startedAt: started.startedAt, runId: started.runId },
      }));
    }
  );
};

import { successResponse, type ToolResponse } from "@console-relay/core";
import type { ToolRegistrar } from "./types.js";
import { ObserversOutputShape } from "./schemas.js";

export const registerFeedObservers: ToolRegistrar = (server, { broadcaster }) => {
  server.registerTool(
    "feed_observers",
    {
      title: "List feed observers",
      description: "List the observers connected to the output feed and how many events each has yet to receive.",
      inputSchema: {},
      outputSchema: ObserversOutputShape,
    },
    async (): Promise<ToolResponse> => {
      const backlog = broadcaster.backlog();
      const observers = Object.entries(backlog).map(([id, pending]) => ({ id, pending }));

      const lines = [`${observers.length} observer(s) connected`];
      for (const observer of observers) {
        lines.push(`  - ${observer.id} (${observer.pending} pending)`);
      }

      return successResponse(lines.join("\n"), { count: observers.length, observers });
    }
  );
};

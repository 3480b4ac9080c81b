import { createLogger, runServer } from "@console-relay/core";

import { loadConfig } from "./config.js";
import { Broadcaster } from "./core/services/Broadcaster.js";
import { ProcessSupervisor } from "./core/services/ProcessSupervisor.js";
import { NodeWorkerLauncher } from "./infrastructure/runner/NodeWorkerLauncher.js";
import { WebSocketFeed } from "./infrastructure/feed/WebSocketFeed.js";
import { registerAllTools } from "./tools/index.js";
import type { RelayServices } from "./tools/types.js";

interface ServerServices extends RelayServices {
  feed: WebSocketFeed;
}

const config = loadConfig(process.env);
if (!config.ok) {
  console.error(`[console-relay] error: Invalid configuration: ${config.error}`);
  process.exit(1);
}
const settings = config.value;
const logger = createLogger("console-relay", { level: settings.logLevel });

function createServices(): ServerServices {
  const broadcaster = new Broadcaster({
    maxPendingEvents: settings.feed.maxPendingEvents,
    logger: logger.child("broadcaster"),
  });
  const supervisor = new ProcessSupervisor(
    new NodeWorkerLauncher(logger.child("launcher")),
    settings.worker,
    broadcaster,
    { ...settings.supervisor, logger: logger.child("supervisor") }
  );
  const feed = new WebSocketFeed(broadcaster, {
    host: settings.feed.host,
    port: settings.feed.port,
    logger: logger.child("feed"),
  });
  return { supervisor, broadcaster, feed };
}

runServer<ServerServices>({
  config: { name: "console-relay", version: "0.1.0" },
  logger,
  createServices,
  registerTools: registerAllTools,
  onStartup: async ({ feed }) => {
    await feed.listen();
  },
  onShutdown: async ({ supervisor, broadcaster, feed }) => {
    await supervisor.dispose();
    await broadcaster.settled();
    await feed.close();
  },
});

/**
 * MCP Server bootstrap utilities.
 * Provides a standardized way to create and run MCP servers across all packages.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createLogger, type Logger } from "./logger.js";

/**
 * Configuration for an MCP server.
 */
export interface ServerConfig {
  name: string;
  version: string;
}

/**
 * Options for bootstrapping an MCP server.
 */
export interface ServerBootstrapOptions<S> {
  /** Server name and version configuration */
  config: ServerConfig;

  /** Logger for lifecycle messages. Default: scoped to the server name */
  logger?: Logger;

  /** Factory function to create services */
  createServices: () => S | Promise<S>;

  /** Function to register all tools with the server */
  registerTools: (server: McpServer, services: S) => void;

  /** Optional callback when server is starting (before connect) */
  onStartup?: (services: S) => Promise<void> | void;

  /** Optional callback when server is shutting down */
  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Bootstrap an MCP server with standardized lifecycle management.
 *
 * Creates the services, registers tools, installs SIGTERM/SIGINT handlers
 * that run `onShutdown` once, runs `onStartup` and connects the stdio transport.
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "console-relay:supervisor", version: "0.1.0" },
 *   createServices: () => ({ supervisor }),
 *   registerTools: registerAllTools,
 *   onShutdown: (services) => services.supervisor.dispose(),
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;
  const logger = options.logger ?? createLogger(config.name);

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = new StdioServerTransport();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);
    try {
      await onShutdown?.(services);
      await server.close();
      process.exit(0);
    } catch (error) {
      logger.error("Shutdown failed", error);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  await onStartup?.(services);

  await server.connect(transport);
  logger.info(`${config.name} ${config.version} ready on stdio`);
}

/**
 * Run bootstrapServer with standard error handling.
 * This is the preferred entry point for MCP servers.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  const logger = options.logger ?? createLogger(options.config.name);
  bootstrapServer({ ...options, logger }).catch((error: unknown) => {
    logger.error("Fatal error", error);
    process.exit(1);
  });
}

// Re-export McpServer type for tool registration
export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

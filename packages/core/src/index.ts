export {
  type Result,
  Ok,
  Err,
} from "./result.js";

export {
  // MCP response types
  type TextContent,
  type ToolResponse,
  type ToolFailure,
  type ErrorContent,
  // MCP response helpers
  errorResponse,
  successResponse,
  resultToStructuredResponse,
} from "./mcp.js";

export {
  type LogLevel,
  type Logger,
  type LoggerOptions,
  createLogger,
  silentLogger,
} from "./logger.js";

export {
  // Server types
  type ServerConfig,
  type ServerBootstrapOptions,
  // Server utilities
  bootstrapServer,
  runServer,
  // Re-exported MCP types
  McpServer,
} from "./server.js";

export {
  type Result,
  Ok,
  Err,
  map,
  andThen,
  unwrapOr,
  toError,
  tryCatch,
  tryCatchAsync,
} from "./result.js";

export { type Logger, createLogger, silentLogger } from "./log.js";

export {
  type TextContent,
  type ToolResponse,
  type ToolFailure,
  textResponse,
  errorResponse,
  resultToStructuredResponse,
} from "./mcp.js";

export {
  type ServerConfig,
  type ServerBootstrapOptions,
  bootstrapServer,
  runServer,
  McpServer,
} from "./server.js";

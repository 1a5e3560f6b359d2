export type { Result } from "./result.js";
export {
  Ok,
  Err,
  ok,
  err,
  map,
  mapErr,
  unwrapOrElse,
  errorMessage,
  tryCatchAsync,
} from "./result.js";

export type { TextContent, ToolPayload } from "./mcp.js";
export { textPayload, errorPayload, resultToPayload } from "./mcp.js";

export type { ServerConfig, RunningTransport, ServerBootstrapOptions } from "./server.js";
export { bootstrapServer, runServer, serveStdio } from "./server.js";

/**
 * Native transport: the MCP protocol, served over stdio by the entry point.
 * Each protocol message maps onto exactly one Dispatcher call.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { ServerConfig } from "@ledgerview/core";
import { type Dispatcher, toToolPayload } from "../core/Dispatcher.js";

export function createNativeServer(dispatcher: Dispatcher, info: ServerConfig): Server {
  const registry = dispatcher.operations;
  const server = new Server(
    { name: info.name, version: info.version },
    { capabilities: { tools: {}, resources: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.listTools().map((tool) => ({
      name: tool.name,
      title: tool.title,
      description: tool.description,
      inputSchema: tool.inputSchema,
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const result = await dispatcher.invoke("tool", name, args ?? {});

    if (!result.ok && result.error.kind === "not_found") {
      throw new McpError(ErrorCode.InvalidParams, result.error.message);
    }
    return toToolPayload(result);
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: registry.listResources().map((resource) => ({
      uri: resource.uri,
      name: resource.name,
      description: resource.description,
      mimeType: resource.mimeType,
    })),
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    const result = await dispatcher.invoke("resource", uri);

    if (!result.ok) {
      const code = result.error.kind === "not_found" ? ErrorCode.InvalidParams : ErrorCode.InternalError;
      throw new McpError(code, result.error.message);
    }

    const mimeType = registry.lookup("resource", uri)?.mimeType;
    return { contents: [{ uri, mimeType, text: result.value }] };
  });

  return server;
}

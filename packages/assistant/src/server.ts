#!/usr/bin/env node
/**
 * Canton Ledgerview assistant server.
 *
 * Serves the tool and resource catalog over stdio (default) or HTTP (--http).
 */

import { runServer, serveStdio } from "@ledgerview/core";
import { loadConfig } from "./config.js";
import { type AssistantServices, SERVER_INFO, createAssistant } from "./services.js";
import { createHttpApp, serveHttp } from "./transports/http.js";
import { createNativeServer } from "./transports/native.js";

const loaded = loadConfig();
if (!loaded.ok) {
  console.error(`[assistant] ${loaded.error}`);
  process.exit(1);
}
const config = loaded.value;

runServer<AssistantServices>({
  config: SERVER_INFO,
  logPrefix: "assistant",
  createServices: () =>
    createAssistant({ docsDir: config.docsDir, workspaceRoot: config.workspaceRoot }),
  onStartup: (services) => {
    console.error(`[assistant] Docs directory: ${services.docs.directory}`);
    console.error(`[assistant] Workspace root: ${config.workspaceRoot}`);
  },
  startTransport: (services, info) =>
    config.transport === "http"
      ? serveHttp(createHttpApp(services.dispatcher, info), config.host, config.port)
      : serveStdio(createNativeServer(services.dispatcher, info)),
});

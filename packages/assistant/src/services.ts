/**
 * Wiring: builds the store, catalog, registry and dispatcher once at startup.
 * Both transports receive the same Dispatcher.
 */

import type { ServerConfig } from "@ledgerview/core";
import { DocumentStore } from "./core/DocumentStore.js";
import { Dispatcher, type FaultLogger } from "./core/Dispatcher.js";
import { ProjectSummarizer } from "./core/ProjectSummarizer.js";
import { OperationRegistry } from "./core/Registry.js";
import { createResources } from "./resources/index.js";
import { createTools } from "./tools/index.js";

export const SERVER_INFO: ServerConfig = {
  name: "canton-ledgerview-assistant",
  version: "0.1.0",
};

export interface AssistantServices {
  docs: DocumentStore;
  projects: ProjectSummarizer;
  registry: OperationRegistry;
  dispatcher: Dispatcher;
}

export interface AssistantOptions {
  docsDir: string;
  workspaceRoot: string;
  logFault?: FaultLogger;
}

export function createAssistant(options: AssistantOptions): AssistantServices {
  const docs = new DocumentStore(options.docsDir);
  const projects = new ProjectSummarizer(options.workspaceRoot);
  const registry = new OperationRegistry(createTools({ docs, projects }), createResources(docs));
  const dispatcher = new Dispatcher(registry, options.logFault);

  return { docs, projects, registry, dispatcher };
}

/**
 * Server bootstrap utilities.
 * Creates services, starts one transport over them and handles shutdown.
 */

import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Name and version announced to clients.
 */
export interface ServerConfig {
  name: string;
  version: string;
}

/**
 * A started transport. Closing it stops accepting calls.
 */
export interface RunningTransport {
  /** Human-readable description for logs, e.g. "stdio" or "http://127.0.0.1:8000" */
  describe(): string;
  close(): Promise<void>;
}

export interface ServerBootstrapOptions<S> {
  /** Server name and version configuration */
  config: ServerConfig;

  /** Factory function to create services */
  createServices: () => S | Promise<S>;

  /** Start the transport that serves the services */
  startTransport: (services: S, config: ServerConfig) => Promise<RunningTransport>;

  /** Optional callback before the transport starts */
  onStartup?: (services: S) => Promise<void> | void;

  /** Optional callback when server is shutting down */
  onShutdown?: (services: S) => Promise<void> | void;

  /** Log prefix, defaults to the server name */
  logPrefix?: string;
}

/**
 * Connect an MCP server to this process's stdin/stdout.
 * Nothing else may write to stdout once this resolves.
 */
export async function serveStdio(server: Server): Promise<RunningTransport> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  return {
    describe: () => "stdio",
    close: () => server.close(),
  };
}

/**
 * Bootstrap a server with standardized lifecycle management.
 *
 * Handles:
 * - Service creation
 * - Startup and shutdown hooks
 * - Signal handlers (SIGTERM, SIGINT)
 * - Transport start
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "ledgerview-assistant", version: "0.1.0" },
 *   createServices: () => buildServices(config),
 *   startTransport: (services, serverConfig) => serveStdio(createNativeServer(services, serverConfig)),
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<RunningTransport> {
  const { config, createServices, startTransport, onStartup, onShutdown } = options;
  const prefix = `[${options.logPrefix ?? config.name}]`;

  const services = await createServices();

  await onStartup?.(services);

  const running = await startTransport(services, config);
  console.error(`${prefix} ${config.name} ${config.version} ready on ${running.describe()}`);

  let stopping = false;
  const shutdown = async (): Promise<void> => {
    if (stopping) return;
    stopping = true;
    console.error(`${prefix} Shutting down...`);
    await onShutdown?.(services);
    await running.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      console.error(`${prefix} Shutdown failed:`, error);
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  return running;
}

/**
 * Run bootstrapServer with standard error handling.
 * This is the preferred entry point for servers.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}

/**
 * HTTP transport: a small REST facade over the same Dispatcher.
 *
 * A recognized tool always answers 200; tool failure travels in `isError`.
 * 404 is reserved for names and URIs that resolve to nothing.
 */

import type { Server as HttpServer } from "node:http";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import * as z from "zod/v4";
import { type RunningTransport, type ServerConfig, errorMessage, errorPayload } from "@ledgerview/core";
import { type Dispatcher, toToolPayload } from "../core/Dispatcher.js";

const LOG_PREFIX = "[assistant:http]";

const ToolCallBodySchema = z.object({
  arguments: z.record(z.string(), z.unknown()).optional(),
});

const ResourceReadBodySchema = z.object({
  uri: z.string(),
});

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

export function createHttpApp(dispatcher: Dispatcher, info: ServerConfig): Express {
  const registry = dispatcher.operations;
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  app.get("/", (_req, res) => {
    res.json({ message: `${info.name} ${info.version} HTTP API`, status: "running" });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy" });
  });

  app.get("/tools", (_req, res) => {
    res.json({
      tools: registry.listTools().map((tool) => ({ name: tool.name, description: tool.description })),
    });
  });

  app.post("/tools/:name/call", async (req: Request, res: Response) => {
    const { name } = req.params;
    if (!registry.lookup("tool", name)) {
      res.status(404).json({ error: `Tool not found: ${name}` });
      return;
    }

    try {
      const body = ToolCallBodySchema.safeParse(req.body ?? {});
      if (!body.success) {
        res.json(errorPayload(`Invalid request body: ${z.prettifyError(body.error)}`));
        return;
      }

      const result = await dispatcher.invoke("tool", name, body.data.arguments ?? {});
      if (!result.ok && result.error.kind === "not_found") {
        res.status(404).json({ error: result.error.message });
        return;
      }
      res.json(toToolPayload(result));
    } catch (error) {
      console.error(`${LOG_PREFIX} Tool ${name} request failed:`, error);
      res.json(errorPayload(errorMessage(error)));
    }
  });

  app.get("/resources", (_req, res) => {
    res.json({
      resources: registry.listResources().map((resource) => ({
        name: resource.name,
        uri: resource.uri,
        mimeType: resource.mimeType,
      })),
    });
  });

  app.post("/resources/read", async (req: Request, res: Response) => {
    const body = ResourceReadBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: "Missing required field: uri" });
      return;
    }

    const { uri } = body.data;
    const resource = registry.lookup("resource", uri);
    if (!resource) {
      res.status(404).json({ error: `Resource not found: ${uri}` });
      return;
    }

    try {
      const result = await dispatcher.invoke("resource", uri);
      if (!result.ok) {
        const status = result.error.kind === "not_found" ? 404 : 500;
        res.status(status).json({ error: result.error.message });
        return;
      }
      res.json({ contents: [{ uri, mimeType: resource.mimeType, text: result.value }] });
    } catch (error) {
      console.error(`${LOG_PREFIX} Resource ${uri} request failed:`, error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: `Not found: ${req.method} ${req.path}` });
  });

  // Express recognizes error middleware by its four parameters
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusOf(error);
    if (status !== undefined && status >= 400 && status < 500) {
      res.status(status).json({ error: `Invalid request: ${errorMessage(error)}` });
      return;
    }
    console.error(`${LOG_PREFIX} Unhandled error:`, error);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}

export interface HttpTransport extends RunningTransport {
  /** Base URL, with the port actually bound */
  url: string;
}

/**
 * Listen on host:port. Port 0 binds an ephemeral port (see `url`).
 */
export function serveHttp(app: Express, host: string, port: number): Promise<HttpTransport> {
  return new Promise((resolve, reject) => {
    const server: HttpServer = app.listen(port, host);

    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      const address = server.address();
      const boundPort = typeof address === "object" && address !== null ? address.port : port;
      const url = `http://${host}:${boundPort}`;

      resolve({
        url,
        describe: () => url,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
            server.closeIdleConnections();
          }),
      });
    });
  });
}

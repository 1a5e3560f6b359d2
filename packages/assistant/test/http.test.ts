import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as z from "zod/v4";
import { Dispatcher } from "../src/core/Dispatcher.js";
import { OperationRegistry } from "../src/core/Registry.js";
import { SERVER_INFO } from "../src/services.js";
import { type HttpTransport, createHttpApp, serveHttp } from "../src/transports/http.js";
import { type TempAssistant, brokenResource, createTempAssistant, faultyTool } from "./helpers.js";

const ToolPayloadSchema = z.object({
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })),
  isError: z.boolean(),
});

const ErrorBodySchema = z.object({ error: z.string() });

const ToolListSchema = z.object({
  tools: z.array(z.object({ name: z.string(), description: z.string() })),
});

async function postJson(url: string, body: string): Promise<Response> {
  return fetch(url, { method: "POST", headers: { "content-type": "application/json" }, body });
}

describe("HTTP transport", () => {
  let temp: TempAssistant;
  let http: HttpTransport;

  beforeEach(async () => {
    temp = await createTempAssistant({ "safety_gates.md": "# Gates\n" });
    http = await serveHttp(createHttpApp(temp.services.dispatcher, SERVER_INFO), "127.0.0.1", 0);
  });

  afterEach(async () => {
    await http.close();
    await temp.cleanup();
  });

  it("binds an ephemeral port when asked for port 0", () => {
    expect(http.url).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);
    expect(http.url).not.toBe("http://127.0.0.1:0");
    expect(http.describe()).toBe(http.url);
  });

  describe("liveness", () => {
    it("GET / describes the server", async () => {
      const res = await fetch(`${http.url}/`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        message: "canton-ledgerview-assistant 0.1.0 HTTP API",
        status: "running",
      });
    });

    it("GET /health reports healthy", async () => {
      const res = await fetch(`${http.url}/health`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: "healthy" });
    });
  });

  describe("tools", () => {
    it("GET /tools lists names and descriptions from the registry", async () => {
      const res = await fetch(`${http.url}/tools`);
      const body = ToolListSchema.parse(await res.json());

      expect(res.status).toBe(200);
      expect(body.tools).toHaveLength(6);
      expect(body.tools[5]).toEqual({
        name: "check_server_status",
        description: "Returns a short confirmation that the assistant server is up.",
      });
    });

    it("POST /tools/check_server_status/call returns the exact payload", async () => {
      const res = await postJson(`${http.url}/tools/check_server_status/call`, "{}");
      expect(res.status).toBe(200);
      expect(await res.text()).toBe(
        '{"content":[{"type":"text","text":"Server is running and healthy!"}],"isError":false}'
      );
    });

    it("dispatches the call through Dispatcher.invoke", async () => {
      const invoke = vi.spyOn(temp.services.dispatcher, "invoke");
      await postJson(
        `${http.url}/tools/generate_canton_deployment_script/call`,
        JSON.stringify({ arguments: { network_type: "prod" } })
      );
      expect(invoke).toHaveBeenCalledWith("tool", "generate_canton_deployment_script", { network_type: "prod" });
    });

    it("passes arguments to the tool", async () => {
      const res = await postJson(
        `${http.url}/tools/generate_canton_deployment_script/call`,
        JSON.stringify({ arguments: { network_type: "prod" } })
      );
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        content: [
          {
            type: "text",
            text: "# PROD DEPLOYMENT\n# 1. Verify DCAP settings\n# 2. Check x402 payment routes\n# 3. Submit to Canton Ledger",
          },
        ],
        isError: false,
      });
    });

    it("accepts a call with no body at all", async () => {
      const res = await fetch(`${http.url}/tools/check_server_status/call`, { method: "POST" });
      expect(res.status).toBe(200);
      expect(ToolPayloadSchema.parse(await res.json()).isError).toBe(false);
    });

    it("keeps tool failures at 200 with isError set", async () => {
      const res = await postJson(`${http.url}/tools/analyze_daml_safety/call`, JSON.stringify({ arguments: {} }));
      const body = ToolPayloadSchema.parse(await res.json());

      expect(res.status).toBe(200);
      expect(body.isError).toBe(true);
      expect(body.content[0].text).toMatch(/^Error: Invalid arguments for analyze_daml_safety: code: /);
    });

    it("answers 404 for an unknown tool", async () => {
      const res = await postJson(`${http.url}/tools/deploy_everything/call`, "{}");
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Tool not found: deploy_everything" });
    });

    it("reports non-object arguments as a tool failure", async () => {
      const res = await postJson(`${http.url}/tools/check_server_status/call`, JSON.stringify({ arguments: "all" }));
      const body = ToolPayloadSchema.parse(await res.json());

      expect(res.status).toBe(200);
      expect(body.isError).toBe(true);
      expect(body.content[0].text).toMatch(/^Error: Invalid request body: /);
    });

    it("answers 400 for malformed JSON", async () => {
      const res = await postJson(`${http.url}/tools/check_server_status/call`, "{not json");
      const body = ErrorBodySchema.parse(await res.json());

      expect(res.status).toBe(400);
      expect(body.error).toMatch(/^Invalid request: /);
    });

    it("writes documents through add_documentation", async () => {
      const res = await postJson(
        `${http.url}/tools/add_documentation/call`,
        JSON.stringify({ arguments: { filename: "guide", content: "hello" } })
      );
      expect(await res.json()).toEqual({
        content: [{ type: "text", text: "Documentation added: guide.md (canton://docs/guide)" }],
        isError: false,
      });
      expect(await fs.readFile(path.join(temp.docsDir, "guide.md"), "utf-8")).toBe("hello");

      const again = await postJson(
        `${http.url}/tools/add_documentation/call`,
        JSON.stringify({ arguments: { filename: "guide", content: "changed" } })
      );
      expect(again.status).toBe(200);
      expect(await again.json()).toEqual({
        content: [{ type: "text", text: "Error: Documentation already exists: guide.md" }],
        isError: true,
      });
      expect(await fs.readFile(path.join(temp.docsDir, "guide.md"), "utf-8")).toBe("hello");
    });
  });

  describe("resources", () => {
    it("GET /resources lists the resource directory", async () => {
      const res = await fetch(`${http.url}/resources`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        resources: [
          { name: "Canton Safety Gates", uri: "canton://docs/safety-gates", mimeType: "text/markdown" },
          { name: "DAML Authorization Patterns", uri: "canton://docs/auth-patterns", mimeType: "text/markdown" },
          { name: "Canton Deployment Guide", uri: "canton://docs/deployment-guide", mimeType: "text/markdown" },
        ],
      });
    });

    it("POST /resources/read returns the document text", async () => {
      const res = await postJson(`${http.url}/resources/read`, JSON.stringify({ uri: "canton://docs/safety-gates" }));
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        contents: [{ uri: "canton://docs/safety-gates", mimeType: "text/markdown", text: "# Gates\n" }],
      });
    });

    it("dispatches the read through Dispatcher.invoke", async () => {
      const invoke = vi.spyOn(temp.services.dispatcher, "invoke");
      await postJson(`${http.url}/resources/read`, JSON.stringify({ uri: "canton://docs/safety-gates" }));
      expect(invoke).toHaveBeenCalledWith("resource", "canton://docs/safety-gates");
    });

    it("reads a known URI without a backing file as explanatory text", async () => {
      const res = await postJson(
        `${http.url}/resources/read`,
        JSON.stringify({ uri: "canton://docs/deployment-guide" })
      );
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        contents: [
          {
            uri: "canton://docs/deployment-guide",
            mimeType: "text/markdown",
            text: "Documentation not found: deployment_guide.md",
          },
        ],
      });
    });

    it("answers 404 naming an unknown URI", async () => {
      const res = await postJson(`${http.url}/resources/read`, JSON.stringify({ uri: "canton://docs/unknown-id" }));
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Resource not found: canton://docs/unknown-id" });
    });

    it("answers 400 when uri is missing", async () => {
      const res = await postJson(`${http.url}/resources/read`, "{}");
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Missing required field: uri" });
    });
  });

  it("answers 404 for unknown routes", async () => {
    const res = await fetch(`${http.url}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found: GET /nope" });
  });
});

describe("HTTP transport faults", () => {
  let http: HttpTransport;

  beforeEach(async () => {
    const dispatcher = new Dispatcher(new OperationRegistry([faultyTool], [brokenResource]), () => {});
    http = await serveHttp(createHttpApp(dispatcher, SERVER_INFO), "127.0.0.1", 0);
  });

  afterEach(async () => {
    await http.close();
  });

  it("renders a faulting tool as an isError payload, not a 500", async () => {
    const res = await postJson(`${http.url}/tools/faulty/call`, "{}");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ content: [{ type: "text", text: "Error: boom" }], isError: true });
  });

  it("answers 500 for a faulting resource", async () => {
    const res = await postJson(`${http.url}/resources/read`, JSON.stringify({ uri: "canton://docs/broken" }));
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "disk gone" });
  });
});

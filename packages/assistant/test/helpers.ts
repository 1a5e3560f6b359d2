/**
 * Shared setup for assistant tests: temporary stores and hand-built operations.
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import * as z from "zod/v4";
import { type AssistantServices, createAssistant } from "../src/services.js";
import { defineTool } from "../src/tools/types.js";
import { err, ok, type ResourceOperation, type ToolOperation } from "../src/core/model.js";

export interface TempAssistant {
  root: string;
  docsDir: string;
  workspaceRoot: string;
  services: AssistantServices;
  faults: string[];
  cleanup: () => Promise<void>;
}

/**
 * A full assistant over a temporary docs directory seeded with `docs`.
 */
export async function createTempAssistant(docs: Record<string, string> = {}): Promise<TempAssistant> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "ledgerview-assistant-"));
  const docsDir = path.join(root, "docs");
  const workspaceRoot = path.join(root, "workspace");
  await fs.mkdir(docsDir);
  await fs.mkdir(workspaceRoot);

  for (const [name, content] of Object.entries(docs)) {
    await fs.writeFile(path.join(docsDir, name), content);
  }

  const faults: string[] = [];
  const services = createAssistant({ docsDir, workspaceRoot, logFault: (message) => faults.push(message) });

  return {
    root,
    docsDir,
    workspaceRoot,
    services,
    faults,
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  };
}

export const echoTool: ToolOperation = defineTool({
  name: "echo",
  title: "Echo",
  description: "Repeats its input",
  parameters: z.object({
    text: z.string(),
    times: z.number().int().min(1).default(1),
  }),
  handler: async ({ text, times }) => ok(Array.from({ length: times }, () => text).join(" ")),
});

export const refusingTool: ToolOperation = defineTool({
  name: "refuse",
  title: "Refuse",
  description: "Always reports a failure",
  parameters: z.object({}),
  handler: async () => err("refused on purpose"),
});

export const faultyTool: ToolOperation = defineTool({
  name: "faulty",
  title: "Faulty",
  description: "Throws instead of returning",
  parameters: z.object({}),
  handler: async () => {
    throw new Error("boom");
  },
});

export function staticResource(uri: string, text: string): ResourceOperation {
  return {
    kind: "resource",
    uri,
    name: uri,
    description: `Static ${uri}`,
    mimeType: "text/markdown",
    read: async () => text,
  };
}

export const brokenResource: ResourceOperation = {
  kind: "resource",
  uri: "canton://docs/broken",
  name: "Broken",
  description: "Read always throws",
  mimeType: "text/markdown",
  read: async () => {
    throw new Error("disk gone");
  },
};

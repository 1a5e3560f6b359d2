/**
 * Process configuration from CLI flags and environment.
 * Flags win over environment; both fall back to defaults.
 */

import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import * as z from "zod/v4";
import { type Result, err, errorMessage, ok } from "@ledgerview/core";

export type TransportMode = "stdio" | "http";

export interface AssistantConfig {
  transport: TransportMode;
  host: string;
  port: number;
  /** Directory holding the documentation store */
  docsDir: string;
  /** Base for relative project paths given to tools */
  workspaceRoot: string;
}

/** Documentation shipped with the package */
export const BUNDLED_DOCS_DIR = fileURLToPath(new URL("../docs", import.meta.url));

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8000;

const ConfigSchema = z.object({
  transport: z.enum(["stdio", "http"]),
  host: z.string().min(1),
  port: z.coerce.number().int().min(0).max(65535),
  docsDir: z.string().min(1),
  workspaceRoot: z.string().min(1),
});

const CLI_OPTIONS = {
  http: { type: "boolean" },
  stdio: { type: "boolean" },
  host: { type: "string" },
  port: { type: "string" },
  "docs-dir": { type: "string" },
  workspace: { type: "string" },
} as const;

type Env = Record<string, string | undefined>;

function parseCli(argv: string[]) {
  return parseArgs({ args: argv, options: CLI_OPTIONS, strict: true, allowPositionals: false }).values;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: Env = process.env,
  cwd: string = process.cwd()
): Result<AssistantConfig, string> {
  let flags: ReturnType<typeof parseCli>;
  try {
    flags = parseCli(argv);
  } catch (error) {
    return err(`Invalid command line: ${errorMessage(error)}`);
  }

  if (flags.http && flags.stdio) {
    return err("Invalid command line: --http and --stdio are mutually exclusive");
  }

  const transport = flags.http ? "http" : flags.stdio ? "stdio" : nonEmpty(env.ASSISTANT_TRANSPORT) ?? "stdio";
  const docsDir = flags["docs-dir"] ?? nonEmpty(env.ASSISTANT_DOCS_DIR);
  const workspaceRoot = flags.workspace ?? nonEmpty(env.ASSISTANT_WORKSPACE);

  const parsed = ConfigSchema.safeParse({
    transport,
    host: flags.host ?? nonEmpty(env.ASSISTANT_HOST) ?? DEFAULT_HOST,
    port: flags.port ?? nonEmpty(env.ASSISTANT_PORT) ?? DEFAULT_PORT,
    docsDir: docsDir === undefined ? BUNDLED_DOCS_DIR : path.resolve(cwd, docsDir),
    workspaceRoot: workspaceRoot === undefined ? cwd : path.resolve(cwd, workspaceRoot),
  });

  if (!parsed.success) {
    return err(`Invalid configuration: ${z.prettifyError(parsed.error)}`);
  }
  return ok(parsed.data);
}

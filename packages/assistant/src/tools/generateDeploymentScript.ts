/**
 * generate_canton_deployment_script tool - Starter deployment script per network.
 */

import * as z from "zod/v4";
import { ok } from "../core/model.js";
import { type ToolFactory, defineTool } from "./types.js";

const PROD_SCRIPT = [
  "# PROD DEPLOYMENT",
  "# 1. Verify DCAP settings",
  "# 2. Check x402 payment routes",
  "# 3. Submit to Canton Ledger",
].join("\n");

const DEV_SCRIPT = [
  "# DEV DEPLOYMENT",
  "# 1. daml build",
  "# 2. daml ledger upload-dar --host localhost --port 6865",
].join("\n");

export function deploymentScriptFor(networkType: string): string {
  return networkType === "prod" ? PROD_SCRIPT : DEV_SCRIPT;
}

export const generateDeploymentScript: ToolFactory = () =>
  defineTool({
    name: "generate_canton_deployment_script",
    title: "Generate Canton deployment script",
    description: "Generates a starter deployment script for a Canton network.",
    parameters: z.object({
      network_type: z
        .string()
        .default("dev")
        .describe('Target network: "prod" for production, anything else for a dev sandbox'),
    }),
    handler: async ({ network_type }) => ok(deploymentScriptFor(network_type)),
  });

/**
 * The fixed tool catalog.
 */

import type { ToolOperation } from "../core/model.js";
import type { ToolFactory, ToolServices } from "./types.js";

import { checkServerStatus } from "./checkServerStatus.js";
import { analyzeDamlSafety } from "./analyzeDamlSafety.js";
import { generateDeploymentScript } from "./generateDeploymentScript.js";
import { getProjectSummary } from "./getProjectSummary.js";
import { listAvailableDocs } from "./listAvailableDocs.js";
import { addDocumentation } from "./addDocumentation.js";

const TOOL_FACTORIES: readonly ToolFactory[] = [
  // DAML / Canton guidance
  analyzeDamlSafety,
  generateDeploymentScript,

  // Workspace inspection
  getProjectSummary,

  // Documentation store
  listAvailableDocs,
  addDocumentation,

  checkServerStatus,
];

/**
 * Build every tool over the given services.
 */
export function createTools(services: ToolServices): ToolOperation[] {
  return TOOL_FACTORIES.map((factory) => factory(services));
}

export * from "./types.js";

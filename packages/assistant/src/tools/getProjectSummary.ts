/**
 * get_project_summary tool - Name, dependencies and file count of an npm project.
 */

import * as z from "zod/v4";
import { formatProjectSummary } from "../core/ProjectSummarizer.js";
import { map } from "@ledgerview/core";
import { type ToolFactory, defineTool } from "./types.js";

export const getProjectSummary: ToolFactory = ({ projects }) =>
  defineTool({
    name: "get_project_summary",
    title: "Get project summary",
    description:
      "Reads package.json and counts files (node_modules excluded) to summarize a project. INSTEAD OF: Reading package.json directly.",
    parameters: z.object({
      project_path: z
        .string()
        .default(".")
        .describe("Relative or absolute path to the project root"),
    }),
    handler: async ({ project_path }) => map(await projects.summarize(project_path), formatProjectSummary),
  });

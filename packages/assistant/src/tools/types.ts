/**
 * Shared types for tool definitions.
 */

import * as z from "zod/v4";
import type { DocumentStore } from "../core/DocumentStore.js";
import type { ProjectSummarizer } from "../core/ProjectSummarizer.js";
import {
  type JsonObjectSchema,
  type ToolArguments,
  type ToolOperation,
  type ToolSpec,
  err,
  ok,
} from "../core/model.js";

/**
 * Services a tool may touch.
 */
export interface ToolServices {
  docs: DocumentStore;
  projects: ProjectSummarizer;
}

/**
 * Function type for building a tool from the services it needs.
 */
export interface ToolFactory {
  (services: ToolServices): ToolOperation;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.map(String).join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function toInputSchema(parameters: z.ZodType): JsonObjectSchema {
  const json = z.toJSONSchema(parameters, { io: "input" });
  const schema: JsonObjectSchema = { type: "object", properties: json.properties ?? {} };
  if (json.required && json.required.length > 0) {
    schema.required = json.required;
  }
  return schema;
}

/**
 * Build a tool operation. Argument validation and defaulting happen in `bind`,
 * so the handler only ever sees arguments that match its schema.
 */
export function defineTool<Args>(spec: ToolSpec<Args>): ToolOperation {
  const { name, title, description, parameters, handler } = spec;

  return {
    kind: "tool",
    name,
    title,
    description,
    inputSchema: toInputSchema(parameters),
    bind(args: ToolArguments) {
      const parsed = parameters.safeParse(args);
      if (!parsed.success) {
        return err(`Invalid arguments for ${name}: ${formatIssues(parsed.error)}`);
      }
      const data = parsed.data;
      return ok(() => handler(data));
    },
  };
}

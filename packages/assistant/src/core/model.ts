/**
 * Core domain types for the assistant package.
 */

import type * as z from "zod/v4";
import type { Result } from "@ledgerview/core";

/**
 * Operations come in two kinds: tools act (and may write), resources only read.
 */
export type OperationKind = "tool" | "resource";

/**
 * Loosely-typed argument bag as received from a transport.
 */
export type ToolArguments = Record<string, unknown>;

/**
 * What a tool handler produces: text for the agent, or a failure message.
 */
export type ToolOutcome = Result<string, string>;

/**
 * A tool whose arguments have been validated and is ready to run.
 */
export type BoundTool = () => Promise<ToolOutcome>;

/**
 * A callable, possibly side-effecting operation.
 * Built through `defineTool`, which keeps the parameter schema and handler types in step.
 */
export interface ToolOperation {
  readonly kind: "tool";
  readonly name: string;
  readonly title: string;
  readonly description: string;
  /** JSON Schema of the accepted arguments, as advertised to clients */
  readonly inputSchema: JsonObjectSchema;
  /** Validate and default the arguments. Err carries a readable message. */
  bind(args: ToolArguments): Result<BoundTool, string>;
}

/**
 * A read-only document addressed by URI.
 * Handlers never fail: a missing backing document reads as an explanation.
 */
export interface ResourceOperation {
  readonly kind: "resource";
  readonly uri: string;
  readonly name: string;
  readonly description: string;
  readonly mimeType: string;
  read(): Promise<string>;
}

export type Operation = ToolOperation | ResourceOperation;

/**
 * JSON Schema for a tool's arguments (always an object schema).
 */
export interface JsonObjectSchema {
  [key: string]: unknown;
  type: "object";
  properties?: Record<string, unknown>;
  required?: string[];
}

/**
 * Declarative input to `defineTool`.
 */
export interface ToolSpec<Args> {
  name: string;
  title: string;
  description: string;
  parameters: z.ZodType<Args>;
  handler: (args: Args) => Promise<ToolOutcome>;
}

/**
 * Why a dispatch produced no tool output.
 */
export type DispatchError =
  | { kind: "not_found"; operation: OperationKind; identifier: string; message: string }
  | { kind: "invalid_arguments"; message: string }
  | { kind: "tool_failed"; message: string }
  | { kind: "handler_fault"; message: string };

/**
 * Why a Document Store call failed.
 */
export type DocumentError =
  | { kind: "not_found"; id: string }
  | { kind: "already_exists"; id: string }
  | { kind: "invalid_name"; requested: string }
  | { kind: "io"; id: string; message: string };

/**
 * Errno code of a failed fs call, if it has one.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Summary of an npm project on disk. Computed per call, never cached.
 */
export interface ProjectSummary {
  name: string;
  rootPath: string;
  /** Production dependency names, in package.json order */
  dependencies: string[];
  /** Files under the root, node_modules excluded */
  fileCount: number;
}

// Re-export Result utilities from core
export type { Result } from "@ledgerview/core";
export { ok, err } from "@ledgerview/core";

/**
 * Transport-agnostic dispatcher.
 * Resolves an operation, validates its arguments, runs it and turns every
 * outcome (including a thrown fault) into a Result. Adapters only encode.
 */

import {
  type ToolPayload,
  errorMessage,
  mapErr,
  resultToPayload,
  tryCatchAsync,
} from "@ledgerview/core";
import type { OperationRegistry } from "./Registry.js";
import {
  type DispatchError,
  type OperationKind,
  type Result,
  type ToolArguments,
  err,
  ok,
} from "./model.js";

export type DispatchResult = Result<string, DispatchError>;

export type FaultLogger = (message: string) => void;

const defaultFaultLogger: FaultLogger = (message) => console.error(`[assistant] ${message}`);

function notFound(operation: OperationKind, identifier: string): DispatchError {
  const message = operation === "tool" ? `Tool not found: ${identifier}` : `Resource not found: ${identifier}`;
  return { kind: "not_found", operation, identifier, message };
}

export class Dispatcher {
  constructor(
    private readonly registry: OperationRegistry,
    private readonly logFault: FaultLogger = defaultFaultLogger
  ) {}

  get operations(): OperationRegistry {
    return this.registry;
  }

  /**
   * Entry point for the transports: run a tool or read a resource.
   */
  async invoke(kind: OperationKind, identifier: string, args: ToolArguments = {}): Promise<DispatchResult> {
    return kind === "tool" ? this.callTool(identifier, args) : this.readResource(identifier);
  }

  async callTool(name: string, args: ToolArguments = {}): Promise<DispatchResult> {
    const tool = this.registry.lookup("tool", name);
    if (!tool) {
      return err(notFound("tool", name));
    }

    const bound = tool.bind(args);
    if (!bound.ok) {
      return err({ kind: "invalid_arguments", message: bound.error });
    }

    const outcome = await tryCatchAsync(bound.value);
    if (!outcome.ok) {
      this.logFault(`Tool ${name} faulted: ${outcome.error.message}`);
      return err({ kind: "handler_fault", message: outcome.error.message });
    }
    if (!outcome.value.ok) {
      return err({ kind: "tool_failed", message: outcome.value.error });
    }
    return ok(outcome.value.value);
  }

  async readResource(uri: string): Promise<DispatchResult> {
    const resource = this.registry.lookup("resource", uri);
    if (!resource) {
      return err(notFound("resource", uri));
    }

    try {
      return ok(await resource.read());
    } catch (error) {
      const message = errorMessage(error);
      this.logFault(`Resource ${uri} faulted: ${message}`);
      return err({ kind: "handler_fault", message });
    }
  }
}

/**
 * Agent-facing payload of a tool dispatch that resolved to a tool.
 * Callers handle `not_found` themselves; it is not a tool outcome.
 */
export function toToolPayload(result: DispatchResult): ToolPayload {
  return resultToPayload(mapErr(result, (error) => error.message));
}

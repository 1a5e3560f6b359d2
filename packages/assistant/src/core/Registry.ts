/**
 * Operation registry.
 * Built once at startup from a fixed catalog and read-only afterwards.
 */

import type {
  Operation,
  OperationKind,
  ResourceOperation,
  ToolOperation,
} from "./model.js";

export class OperationRegistry {
  private readonly tools: ReadonlyMap<string, ToolOperation>;
  private readonly resources: ReadonlyMap<string, ResourceOperation>;

  /**
   * @throws Error when two tools share a name or two resources share a URI.
   */
  constructor(tools: readonly ToolOperation[], resources: readonly ResourceOperation[]) {
    this.tools = indexBy(tools, (tool) => tool.name, "tool");
    this.resources = indexBy(resources, (resource) => resource.uri, "resource");
    Object.freeze(this);
  }

  lookup(kind: "tool", identifier: string): ToolOperation | undefined;
  lookup(kind: "resource", identifier: string): ResourceOperation | undefined;
  lookup(kind: OperationKind, identifier: string): Operation | undefined;
  lookup(kind: OperationKind, identifier: string): Operation | undefined {
    return kind === "tool" ? this.tools.get(identifier) : this.resources.get(identifier);
  }

  /** Tools in catalog order */
  listTools(): ToolOperation[] {
    return [...this.tools.values()];
  }

  /** Resources in catalog order */
  listResources(): ResourceOperation[] {
    return [...this.resources.values()];
  }
}

function indexBy<T>(items: readonly T[], key: (item: T) => string, label: string): ReadonlyMap<string, T> {
  const index = new Map<string, T>();
  for (const item of items) {
    const id = key(item);
    if (index.has(id)) {
      throw new Error(`Duplicate ${label} registration: ${id}`);
    }
    index.set(id, item);
  }
  return index;
}

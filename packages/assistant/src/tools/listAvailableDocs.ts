/**
 * list_available_docs tool - Enumerate the documentation store.
 */

import * as z from "zod/v4";
import { describeDocumentError, docIdToUri } from "../core/DocumentStore.js";
import { err, ok } from "../core/model.js";
import { type ToolFactory, defineTool } from "./types.js";

export const listAvailableDocs: ToolFactory = ({ docs }) =>
  defineTool({
    name: "list_available_docs",
    title: "List available docs",
    description: "Lists every documentation file in the store with its resource URI.",
    parameters: z.object({}),
    handler: async () => {
      const result = await docs.list();
      if (!result.ok) {
        return err(describeDocumentError(result.error));
      }

      if (result.value.length === 0) {
        return ok("No documentation files found.");
      }

      const output: string[] = [`Available documentation (${result.value.length}):`];
      for (const id of result.value) {
        output.push(`- ${id} (${docIdToUri(id)})`);
      }
      return ok(output.join("\n"));
    },
  });

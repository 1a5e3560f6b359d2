/**
 * add_documentation tool - Write a new document to the store.
 * Existing documents are never overwritten.
 */

import * as z from "zod/v4";
import { describeDocumentError, docIdToUri } from "../core/DocumentStore.js";
import { err, ok } from "../core/model.js";
import { type ToolFactory, defineTool } from "./types.js";

export const addDocumentation: ToolFactory = ({ docs }) =>
  defineTool({
    name: "add_documentation",
    title: "Add documentation",
    description:
      "Creates a new markdown document in the documentation store. Fails if a document with that name already exists.",
    parameters: z.object({
      filename: z.string().describe('Document name; ".md" is appended when missing and directories are stripped'),
      content: z.string().describe("Markdown content of the new document"),
    }),
    handler: async ({ filename, content }) => {
      const result = await docs.create(filename, content);
      if (!result.ok) {
        return err(describeDocumentError(result.error));
      }
      return ok(`Documentation added: ${result.value} (${docIdToUri(result.value)})`);
    },
  });

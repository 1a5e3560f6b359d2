/**
 * check_server_status tool - Liveness probe for agents.
 */

import * as z from "zod/v4";
import { ok } from "../core/model.js";
import { type ToolFactory, defineTool } from "./types.js";

export const SERVER_STATUS_TEXT = "Server is running and healthy!";

export const checkServerStatus: ToolFactory = () =>
  defineTool({
    name: "check_server_status",
    title: "Check server status",
    description: "Returns a short confirmation that the assistant server is up.",
    parameters: z.object({}),
    handler: async () => ok(SERVER_STATUS_TEXT),
  });

/**
 * analyze_daml_safety tool - Checks DAML source for the safety markers every
 * contract template is expected to carry.
 */

import * as z from "zod/v4";
import { ok } from "../core/model.js";
import { type ToolFactory, defineTool } from "./types.js";

interface SafetyMarker {
  keyword: string;
  warning: string;
}

const SAFETY_MARKERS: SafetyMarker[] = [
  {
    keyword: "signatory",
    warning: "Warning: No signatories defined. This contract might be unauthorized.",
  },
  {
    keyword: "controller",
    warning: "Warning: No controllers defined. The contract may be immutable/unusable.",
  },
];

export function analyzeDamlSource(code: string): string {
  const lowered = code.toLowerCase();
  const issues = SAFETY_MARKERS.filter((marker) => !lowered.includes(marker.keyword)).map(
    (marker) => marker.warning
  );

  if (issues.length === 0) {
    return "✅ DAML code passes basic safety gate analysis.";
  }
  return `❌ Safety Issues Found:\n- ${issues.join("\n- ")}`;
}

export const analyzeDamlSafety: ToolFactory = () =>
  defineTool({
    name: "analyze_daml_safety",
    title: "Analyze DAML safety",
    description:
      "Checks DAML code against the Canton safety gates: every template needs signatories and controllers.",
    parameters: z.object({
      code: z.string().describe("DAML source code to analyze"),
    }),
    handler: async ({ code }) => ok(analyzeDamlSource(code)),
  });

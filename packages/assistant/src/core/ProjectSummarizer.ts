/**
 * Summarizes an npm project: name, production dependencies, rough file count.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { glob } from "glob";
import * as z from "zod/v4";
import { type Result, type ProjectSummary, errnoCode, ok, err } from "./model.js";

const PackageJsonSchema = z.object({
  name: z.string().optional(),
  dependencies: z.record(z.string(), z.string()).optional(),
});

export class ProjectSummarizer {
  constructor(private readonly workspaceRoot: string) {}

  /**
   * Resolve a caller path against the workspace root.
   */
  resolve(projectPath: string): string {
    return path.resolve(this.workspaceRoot, projectPath);
  }

  async summarize(projectPath: string): Promise<Result<ProjectSummary, string>> {
    const rootPath = this.resolve(projectPath);
    const pkgPath = path.join(rootPath, "package.json");

    let raw: string;
    try {
      raw = await fs.readFile(pkgPath, "utf-8");
    } catch (error) {
      const code = errnoCode(error);
      if (code === "ENOENT" || code === "ENOTDIR") {
        return err(`No package.json found at ${rootPath}`);
      }
      return err(`Failed to read package.json: ${String(error)}`);
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(raw);
    } catch (error) {
      return err(`Failed to parse package.json: ${error}`);
    }

    const pkg = PackageJsonSchema.safeParse(parsedJson);
    if (!pkg.success) {
      return err(`Failed to parse package.json: ${z.prettifyError(pkg.error)}`);
    }

    const files = await glob("**/*", {
      cwd: rootPath,
      nodir: true,
      dot: true,
      ignore: ["**/node_modules/**"],
    });

    return ok({
      name: pkg.data.name ?? "Unknown",
      rootPath,
      dependencies: Object.keys(pkg.data.dependencies ?? {}),
      fileCount: files.length,
    });
  }
}

export function formatProjectSummary(summary: ProjectSummary): string {
  return [
    `Project: ${summary.name}`,
    `Dependencies: ${summary.dependencies.join(", ")}`,
    `Estimated Files: ${summary.fileCount}`,
  ].join("\n");
}

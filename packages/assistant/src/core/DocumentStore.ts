/**
 * Documentation store.
 * A flat directory of markdown files; the file name is the document id.
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { type Result, type DocumentError, errnoCode, ok, err } from "./model.js";

export const DOC_EXTENSION = ".md";
export const DOC_URI_PREFIX = "canton://docs/";

/**
 * Turn a caller-supplied name into a store-confined file name.
 * Appends the extension when missing, then keeps only the last path segment
 * (both separators count), so "../../etc/passwd" becomes "passwd.md".
 */
export function canonicalizeDocId(requested: string): Result<string, DocumentError> {
  const trimmed = requested.trim();
  const withExt = trimmed.endsWith(DOC_EXTENSION) ? trimmed : `${trimmed}${DOC_EXTENSION}`;
  const base = withExt.split(/[\\/]/).pop() ?? "";

  if (base === DOC_EXTENSION || base.startsWith(".") || base.includes("\0")) {
    return err({ kind: "invalid_name", requested });
  }
  return ok(base);
}

/**
 * Resource URI of a document id: "safety_gates.md" -> "canton://docs/safety-gates".
 */
export function docIdToUri(id: string): string {
  const stem = id.endsWith(DOC_EXTENSION) ? id.slice(0, -DOC_EXTENSION.length) : id;
  return `${DOC_URI_PREFIX}${stem.replace(/_/g, "-")}`;
}

export function describeDocumentError(error: DocumentError): string {
  switch (error.kind) {
    case "not_found":
      return `Documentation not found: ${error.id}`;
    case "already_exists":
      return `Documentation already exists: ${error.id}`;
    case "invalid_name":
      return `Invalid documentation filename: ${JSON.stringify(error.requested)}`;
    case "io":
      return `Failed to access documentation ${error.id}: ${error.message}`;
  }
}

export class DocumentStore {
  constructor(private readonly rootDir: string) {}

  get directory(): string {
    return this.rootDir;
  }

  /**
   * Read a document. Absence is an Err, never a throw.
   */
  async read(id: string): Promise<Result<string, DocumentError>> {
    const canonical = canonicalizeDocId(id);
    if (!canonical.ok) {
      return canonical;
    }
    const docId = canonical.value;

    try {
      const content = await fs.readFile(path.join(this.rootDir, docId), "utf-8");
      return ok(content);
    } catch (error) {
      const code = errnoCode(error);
      if (code === "ENOENT" || code === "EISDIR" || code === "ENOTDIR") {
        return err({ kind: "not_found", id: docId });
      }
      return err({ kind: "io", id: docId, message: String(error) });
    }
  }

  /**
   * All document ids currently on disk, sorted. Re-read on every call.
   * Files whose name is not its own canonical id are skipped, so every
   * listed id reads back.
   */
  async list(): Promise<Result<string[], DocumentError>> {
    try {
      const entries = await fs.readdir(this.rootDir, { withFileTypes: true });
      const ids = entries
        .filter((entry) => entry.isFile() && entry.name.endsWith(DOC_EXTENSION))
        .map((entry) => entry.name)
        .filter((name) => {
          const canonical = canonicalizeDocId(name);
          return canonical.ok && canonical.value === name;
        })
        .sort();
      return ok(ids);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return ok([]);
      }
      return err({ kind: "io", id: ".", message: String(error) });
    }
  }

  /**
   * Create a new document. The content is written to a hidden temporary file
   * and published with a hard link, which fails with EEXIST when the id is
   * taken. Readers see either no document or the complete one.
   */
  async create(requestedName: string, content: string): Promise<Result<string, DocumentError>> {
    const canonical = canonicalizeDocId(requestedName);
    if (!canonical.ok) {
      return canonical;
    }
    const docId = canonical.value;
    const filePath = path.join(this.rootDir, docId);
    const tempPath = path.join(this.rootDir, `.${docId}.${randomUUID()}.tmp`);

    try {
      await fs.mkdir(this.rootDir, { recursive: true });
      const handle = await fs.open(tempPath, "wx");
      try {
        await handle.writeFile(content, "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.link(tempPath, filePath);
      return ok(docId);
    } catch (error) {
      if (errnoCode(error) === "EEXIST") {
        return err({ kind: "already_exists", id: docId });
      }
      return err({ kind: "io", id: docId, message: String(error) });
    } finally {
      await fs.rm(tempPath, { force: true });
    }
  }
}

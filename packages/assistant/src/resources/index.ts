/**
 * The fixed resource catalog: documentation files exposed by URI.
 */

import { unwrapOrElse } from "@ledgerview/core";
import {
  type DocumentStore,
  describeDocumentError,
  docIdToUri,
} from "../core/DocumentStore.js";
import type { ResourceOperation } from "../core/model.js";

export const DOC_MIME_TYPE = "text/markdown";

interface DocResourceSpec {
  docId: string;
  name: string;
  description: string;
}

const DOC_RESOURCES: readonly DocResourceSpec[] = [
  {
    docId: "safety_gates.md",
    name: "Canton Safety Gates",
    description: "Core Safety Gates architecture for Canton development.",
  },
  {
    docId: "auth_patterns.md",
    name: "DAML Authorization Patterns",
    description: "Canonical DAML authorization patterns.",
  },
  {
    docId: "deployment_guide.md",
    name: "Canton Deployment Guide",
    description: "Steps for promoting a DAR from a dev sandbox to a production Canton network.",
  },
];

/**
 * A resource backed by one document. Every read goes to the store, so edits on
 * disk show up without a restart; a missing file reads as an explanation.
 */
export function docResource(docs: DocumentStore, spec: DocResourceSpec): ResourceOperation {
  return {
    kind: "resource",
    uri: docIdToUri(spec.docId),
    name: spec.name,
    description: spec.description,
    mimeType: DOC_MIME_TYPE,
    read: async () => unwrapOrElse(await docs.read(spec.docId), describeDocumentError),
  };
}

export function createResources(docs: DocumentStore): ResourceOperation[] {
  return DOC_RESOURCES.map((spec) => docResource(docs, spec));
}

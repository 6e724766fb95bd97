import type { KnowledgeCollection } from "./types.js";

/** Index collection names. Audit events need no real embedding, so they live in a 1-dim collection. */
export const COLLECTIONS = {
  facts: "facts",
  files: "files",
  learnings: "learnings",
  relationships: "relationships",
  skills: "skills",
  audit: "audit_log",
} as const;

export const AUDIT_DIMENSIONS = 1;
export const AUDIT_VECTOR = [1];

export function knowledgeCollectionName(collection: KnowledgeCollection): string {
  return COLLECTIONS[collection];
}

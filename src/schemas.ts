import { z } from "zod";
import { ValidationError } from "./errors.js";

const unitScalar = z.number().min(0).max(1);
const scalar = z.union([z.string(), z.number(), z.boolean()]);
const statusSchema = z.enum(["active", "superseded", "deleted"]);

export const MAX_EXTRA_KEYS = 32;

export const ExtraMetadataSchema = z
  .record(z.string().min(1).max(64), scalar)
  .refine((r) => Object.keys(r).length <= MAX_EXTRA_KEYS, {
    message: `at most ${MAX_EXTRA_KEYS} extension keys`,
  });

/** Caller-supplied metadata for facts, file chunks and learnings. */
export const KnowledgeMetadataInputSchema = z.object({
  workspaceId: z.string().max(256).optional(),
  agentName: z.string().max(256).optional(),
  priority: z.string().max(64).optional(),
  importance: unitScalar.optional(),
  reliability: unitScalar.optional(),
  frequency: unitScalar.optional(),
  source: z.string().max(256).optional(),
  fileName: z.string().max(1024).optional(),
  fileId: z.string().max(256).optional(),
  chunkIndex: z.number().int().nonnegative().optional(),
  folder: z.string().max(1024).optional(),
  extra: ExtraMetadataSchema.optional(),
});

export type KnowledgeMetadataInput = z.infer<typeof KnowledgeMetadataInputSchema>;

const KNOWN_INPUT_KEYS = new Set(Object.keys(KnowledgeMetadataInputSchema.shape));

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/**
 * Validate caller metadata. Keys outside the typed fields are folded into
 * the bounded `extra` map; anything that is not a scalar is rejected.
 */
export function parseMetadataInput(raw: Record<string, unknown> | undefined): KnowledgeMetadataInput {
  const known: Record<string, unknown> = {};
  const extra: Record<string, unknown> = {};
  const nestedExtra = raw?.extra;
  if (nestedExtra && typeof nestedExtra === "object" && !Array.isArray(nestedExtra)) {
    Object.assign(extra, nestedExtra);
  }
  for (const [key, value] of Object.entries(raw ?? {})) {
    if (key === "extra" || value === undefined) continue;
    if (KNOWN_INPUT_KEYS.has(key)) known[key] = value;
    else extra[key] = value;
  }
  if (Object.keys(extra).length > 0) known.extra = extra;

  const parsed = KnowledgeMetadataInputSchema.safeParse(known);
  if (!parsed.success) {
    throw new ValidationError(`invalid metadata: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export const ContradictionRefSchema = z.object({
  id: z.string(),
  text: z.string(),
  similarity: z.number(),
  learningKey: z.string().default(""),
});

/** Decodes knowledge payloads read back from the vector index. */
export const StoredKnowledgeMetadataSchema = z.object({
  workspaceId: z.string().default(""),
  agentName: z.string().optional(),
  modelName: z.string().optional(),
  category: z.string().optional(),
  status: statusSchema.default("active"),
  version: z.number().int().positive().default(1),
  learningKey: z.string().optional(),
  priority: z.string().optional(),
  importance: z.number().optional(),
  reliability: z.number().optional(),
  frequency: z.number().optional(),
  source: z.string().optional(),
  createdAt: z.string().default(""),
  createdAtTs: z.number().default(0),
  updatedAt: z.string().optional(),
  supersededAt: z.string().optional(),
  supersededBy: z.string().optional(),
  deletedAt: z.string().optional(),
  previousVersionId: z.string().optional(),
  conflictDetected: z.boolean().optional(),
  contradictions: z.array(ContradictionRefSchema).optional(),
  fileName: z.string().optional(),
  fileId: z.string().optional(),
  chunkIndex: z.number().optional(),
  folder: z.string().optional(),
  pinned: z.boolean().optional(),
  pinnedAt: z.string().optional(),
  extra: z.record(scalar).optional(),
});

export const StoredEdgeSchema = z.object({
  kind: z.literal("relationship"),
  sourceId: z.string(),
  targetId: z.string(),
  relationshipType: z.string(),
  sourceType: z.string().default("knowledge"),
  targetType: z.string().default("knowledge"),
  workspaceId: z.string().default(""),
  createdAt: z.string().default(""),
  metadata: z.record(scalar).default({}),
});

export const StoredSkillSchema = z.object({
  kind: z.literal("skill"),
  canonicalId: z.string(),
  goal: z.string(),
  steps: z.array(z.string()).default([]),
  examples: z.array(z.string()).default([]),
  constraints: z.array(z.string()).default([]),
  sources: z.array(z.string()).default([]),
  confidence: z.number().min(0).max(1),
  version: z.number().int().positive().default(1),
  tags: z.array(z.string()).default([]),
  status: statusSchema.default("active"),
  modelName: z.string().default(""),
  workspaceId: z.string().default(""),
  usageCount: z.number().int().nonnegative().default(0),
  createdAt: z.string().default(""),
  createdAtTs: z.number().default(0),
  updatedAt: z.string().default(""),
  previousVersionId: z.string().optional(),
  deletedAt: z.string().optional(),
});

export const StoredAuditSchema = z.object({
  kind: z.literal("audit"),
  eventType: z.enum([
    "fact_added",
    "file_chunk_added",
    "learning_added",
    "learning_superseded",
    "learnings_deleted",
    "learning_versions_reconciled",
    "file_deleted",
    "file_restored",
    "file_pinned",
    "file_moved",
    "file_renamed",
    "file_purged",
  ]),
  modelName: z.string().default(""),
  workspaceId: z.string().default(""),
  entryId: z.string().default(""),
  createdAt: z.string(),
  createdAtTs: z.number().default(0),
  details: z.record(scalar).default({}),
});

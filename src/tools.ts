import { Type } from "@sinclair/typebox";
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { MemoryEngine } from "./engine.js";
import { isMemoryError } from "./errors.js";
import type { SearchHit, SkillSearchHit } from "./types.js";
import { KNOWLEDGE_COLLECTIONS } from "./types.js";

export interface ToolResult {
  content: Array<{ type: string; text: string }>;
  details: undefined;
}

export interface ToolApi {
  registerTool(
    spec: {
      name: string;
      label: string;
      description: string;
      parameters: unknown;
      execute: (
        toolCallId: string,
        params: Record<string, unknown>,
        signal?: AbortSignal,
      ) => Promise<ToolResult>;
    },
    options: { name: string },
  ): void;
}

export function toolResult(text: string): ToolResult {
  return { content: [{ type: "text" as const, text }], details: undefined };
}

const Scalar = Type.Union([Type.String(), Type.Number(), Type.Boolean()]);
const Metadata = Type.Optional(
  Type.Record(Type.String(), Scalar, { description: "Extra metadata (scalar values only)" }),
);
const WorkspaceId = Type.Optional(Type.String({ description: "Workspace scope (omit for global)" }));
const Priority = Type.Optional(
  Type.String({ description: "Minimum priority tag: critical, pinned, reinforced, normal, archived" }),
);

function defineTool<T extends TSchema>(
  api: ToolApi,
  spec: { name: string; label: string; description: string; parameters: T },
  run: (params: Static<T>) => Promise<string>,
): void {
  api.registerTool(
    {
      ...spec,
      async execute(_toolCallId, params) {
        if (!Value.Check(spec.parameters, params)) {
          const problems = [...Value.Errors(spec.parameters, params)]
            .map((e) => `${e.path || "/"} ${e.message}`)
            .join("; ");
          return toolResult(`Invalid parameters for ${spec.name}: ${problems}`);
        }
        try {
          return toolResult(await run(params));
        } catch (err) {
          if (isMemoryError(err)) return toolResult(`Error (${err.kind}): ${err.message}`);
          throw err;
        }
      },
    },
    { name: spec.name },
  );
}

export function formatHits(hits: SearchHit[]): string {
  if (hits.length === 0) return "No matching memories.";
  return hits
    .map((h, i) => `${i + 1}. [${h.source}] (score ${h.score}) ${h.text}\n   id: ${h.id}`)
    .join("\n");
}

function formatSkills(hits: SkillSearchHit[]): string {
  if (hits.length === 0) return "No matching skills.";
  return hits
    .map((s, i) => {
      const steps = s.steps.map((step, j) => `   ${j + 1}) ${step}`).join("\n");
      const header = `${i + 1}. ${s.goal} (relevance ${s.relevance}, confidence ${s.confidence.toFixed(2)}, v${s.version})\n   id: ${s.id}`;
      return steps ? `${header}\n${steps}` : header;
    })
    .join("\n");
}

export function registerTools(api: ToolApi, engine: MemoryEngine): void {
  const { knowledge, graph, skills, lifecycle } = engine;

  defineTool(
    api,
    {
      name: "memory_add_fact",
      label: "Store Fact",
      description: "Store a fact in long-term memory. Blank text is ignored.",
      parameters: Type.Object({
        text: Type.String({ description: "The fact to remember" }),
        agentName: Type.Optional(Type.String()),
        workspaceId: WorkspaceId,
        priority: Type.Optional(Type.String()),
        importance: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
        metadata: Metadata,
      }),
    },
    async ({ text, metadata, ...fields }) => {
      const id = await knowledge.addFact(text, { ...metadata, ...fields });
      return id ? `Stored fact ${id}` : "Nothing stored: text was blank.";
    },
  );

  defineTool(
    api,
    {
      name: "memory_search_facts",
      label: "Search Facts",
      description: "Ranked semantic + keyword search over stored facts (optionally file chunks too).",
      parameters: Type.Object({
        query: Type.String(),
        topK: Type.Optional(Type.Integer({ minimum: 1, maximum: 50 })),
        agentName: Type.Optional(Type.String()),
        workspaceId: WorkspaceId,
        includeFiles: Type.Optional(Type.Boolean()),
        minPriority: Priority,
      }),
    },
    async ({ query, ...options }) => formatHits(await knowledge.searchFacts(query, options)),
  );

  defineTool(
    api,
    {
      name: "memory_add_learning",
      label: "Store Learning",
      description:
        "Store a versioned learning for a model. A new write supersedes the active learning with the same workspace, model and category.",
      parameters: Type.Object({
        text: Type.String(),
        modelName: Type.String(),
        agentName: Type.Optional(Type.String()),
        category: Type.Optional(
          Type.String({ description: "general, preference, fact, skill or correction" }),
        ),
        workspaceId: WorkspaceId,
        metadata: Metadata,
      }),
    },
    async (params) => {
      const result = await engine.addLearning({
        text: params.text,
        modelName: params.modelName,
        agentName: params.agentName ?? "",
        category: params.category,
        workspaceId: params.workspaceId,
        metadata: params.metadata,
      });
      if (!result.id) return "Nothing stored: text was blank.";
      const lines = [`Stored learning ${result.id} (v${result.version}, key ${result.learningKey})`];
      if (result.previousVersionId) {
        lines.push(
          `Superseded ${result.previousVersionId}${result.conflictDetected ? " (content changed)" : ""}`,
        );
      }
      for (const c of result.contradictions) {
        lines.push(`Possible contradiction with ${c.id} (similarity ${c.similarity}): ${c.text}`);
      }
      return lines.join("\n");
    },
  );

  defineTool(
    api,
    {
      name: "memory_search_learnings",
      label: "Search Learnings",
      description: "Ranked search over the active learnings of one model.",
      parameters: Type.Object({
        query: Type.String(),
        modelName: Type.String(),
        workspaceId: WorkspaceId,
        category: Type.Optional(Type.String()),
        topK: Type.Optional(Type.Integer({ minimum: 1, maximum: 50 })),
        minPriority: Priority,
      }),
    },
    async ({ query, ...options }) => formatHits(await knowledge.searchLearnings(query, options)),
  );

  defineTool(
    api,
    {
      name: "memory_delete_learnings",
      label: "Delete Learnings",
      description: "Soft-delete the active learnings of a model, optionally by category and workspace.",
      parameters: Type.Object({
        modelName: Type.String(),
        category: Type.Optional(Type.String()),
        workspaceId: WorkspaceId,
      }),
    },
    async ({ modelName, ...filter }) => {
      const deleted = await knowledge.deleteModelLearnings(modelName, filter);
      return `Deleted ${deleted} learning(s) of ${modelName}.`;
    },
  );

  defineTool(
    api,
    {
      name: "memory_add_file",
      label: "Store File",
      description: "Chunk file content and store every chunk for retrieval.",
      parameters: Type.Object({
        fileName: Type.String(),
        content: Type.String(),
        folder: Type.Optional(Type.String()),
        workspaceId: WorkspaceId,
      }),
    },
    async ({ fileName, content, ...metadata }) => {
      const ids = await knowledge.addFile(fileName, content, metadata);
      return `Stored ${ids.length} chunk(s) of ${fileName.trim()}.`;
    },
  );

  defineTool(
    api,
    {
      name: "memory_manage_file",
      label: "Manage File",
      description: "Soft-delete, restore, pin, unpin, move, rename or purge a stored file.",
      parameters: Type.Object({
        action: Type.Union([
          Type.Literal("delete"),
          Type.Literal("restore"),
          Type.Literal("pin"),
          Type.Literal("unpin"),
          Type.Literal("move"),
          Type.Literal("rename"),
          Type.Literal("purge"),
        ]),
        fileName: Type.String(),
        folder: Type.Optional(Type.String()),
        newFileName: Type.Optional(Type.String()),
        workspaceId: WorkspaceId,
      }),
    },
    async ({ action, fileName, folder, newFileName, workspaceId }) => {
      const apply = async (): Promise<number> => {
        switch (action) {
          case "delete":
            return knowledge.softDeleteFile(fileName, workspaceId);
          case "restore":
            return knowledge.restoreFile(fileName, workspaceId);
          case "pin":
          case "unpin":
            return knowledge.pinFile(fileName, action === "pin", workspaceId);
          case "move":
            return knowledge.moveFile(fileName, folder ?? "", workspaceId);
          case "rename":
            return knowledge.renameFile(fileName, newFileName ?? "", workspaceId);
          case "purge":
            return knowledge.purgeFile(fileName, workspaceId);
        }
      };
      return `${action}: ${await apply()} chunk(s) of ${fileName.trim()} changed.`;
    },
  );

  defineTool(
    api,
    {
      name: "memory_list_files",
      label: "List Files",
      description: "List stored files with chunk counts, folder, pin flag and status.",
      parameters: Type.Object({ workspaceId: WorkspaceId }),
    },
    async ({ workspaceId }) => {
      const files = await knowledge.listFiles(workspaceId);
      if (files.length === 0) return "No files stored.";
      return files
        .map((f) => {
          const folder = f.folder ? `${f.folder}/` : "";
          const flags = [f.status, ...(f.pinned ? ["pinned"] : [])].join(", ");
          return `- ${folder}${f.fileName} (${f.chunksCount} chunks, ${flags})`;
        })
        .join("\n");
    },
  );

  defineTool(
    api,
    {
      name: "graph_link",
      label: "Link Knowledge",
      description: `Create a typed relationship between two knowledge nodes. Allowed types: ${graph.relationshipTypes.join(", ")}.`,
      parameters: Type.Object({
        sourceId: Type.String(),
        targetId: Type.String(),
        relationshipType: Type.String(),
        sourceType: Type.Optional(Type.String()),
        targetType: Type.Optional(Type.String()),
        workspaceId: WorkspaceId,
        metadata: Metadata,
      }),
    },
    async (params) => {
      const { id } = await graph.createRelationship(params);
      return `Created relationship ${id}: ${params.sourceId} ${params.relationshipType} ${params.targetId}`;
    },
  );

  defineTool(
    api,
    {
      name: "graph_traverse",
      label: "Traverse Graph",
      description: "Breadth-first walk of the knowledge graph from a node, bounded by depth and node count.",
      parameters: Type.Object({
        startNodeId: Type.String(),
        maxDepth: Type.Optional(Type.Integer({ minimum: 0 })),
        relationshipTypes: Type.Optional(Type.Array(Type.String())),
        maxNodes: Type.Optional(Type.Integer({ minimum: 1 })),
      }),
    },
    async ({ startNodeId, ...options }) => {
      const result = await graph.traverse(startNodeId, options);
      const lines = result.nodes.map(
        (n) => `${"  ".repeat(n.depth)}${n.nodeId} (depth ${n.depth}, ${n.relationships.length} edge(s))`,
      );
      lines.push(
        `${result.nodes.length} node(s), ${result.totalRelationships} relationship(s), max depth ${result.maxDepthReached}`,
      );
      return lines.join("\n");
    },
  );

  defineTool(
    api,
    {
      name: "skill_create",
      label: "Create Skill",
      description: "Store a reusable skill: a goal with ordered steps, examples and constraints.",
      parameters: Type.Object({
        goal: Type.String(),
        steps: Type.Optional(Type.Array(Type.String())),
        examples: Type.Optional(Type.Array(Type.String())),
        constraints: Type.Optional(Type.Array(Type.String())),
        tags: Type.Optional(Type.Array(Type.String())),
        confidence: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
        modelName: Type.Optional(Type.String()),
        workspaceId: WorkspaceId,
      }),
    },
    async (params) => {
      const result = await skills.createSkill(params);
      return `Created skill ${result.id} (canonical ${result.canonicalId})`;
    },
  );

  defineTool(
    api,
    {
      name: "skill_from_dialog",
      label: "Extract Skill",
      description:
        "Extract a skill from dialog text: the first line is the goal, numbered or bulleted lines are steps.",
      parameters: Type.Object({
        text: Type.String(),
        modelName: Type.Optional(Type.String()),
        workspaceId: WorkspaceId,
      }),
    },
    async ({ text, modelName, workspaceId }) => {
      const result = await skills.createFromDialog(text, modelName, workspaceId);
      return `Created skill ${result.id} (canonical ${result.canonicalId})`;
    },
  );

  defineTool(
    api,
    {
      name: "skill_search",
      label: "Search Skills",
      description: "Semantic search over active skills above a confidence floor.",
      parameters: Type.Object({
        query: Type.String(),
        topK: Type.Optional(Type.Integer({ minimum: 1, maximum: 50 })),
        minConfidence: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
        workspaceId: WorkspaceId,
      }),
    },
    async ({ query, ...options }) => formatSkills(await skills.searchSkills(query, options)),
  );

  defineTool(
    api,
    {
      name: "skill_record_usage",
      label: "Record Skill Use",
      description: "Record a successful use of a skill; raises its confidence slightly.",
      parameters: Type.Object({ id: Type.String() }),
    },
    async ({ id }) =>
      (await skills.recordUsage(id)) ? `Recorded usage of skill ${id}.` : `Skill ${id} is not active.`,
  );

  defineTool(
    api,
    {
      name: "memory_maintenance",
      label: "Memory Maintenance",
      description: "Run TTL cleanup, check or run reindexing, or report storage and embedding status.",
      parameters: Type.Object({
        action: Type.Union([
          Type.Literal("cleanup"),
          Type.Literal("reindex_check"),
          Type.Literal("reindex"),
          Type.Literal("status"),
        ]),
        collection: Type.Optional(
          Type.Union([Type.Literal("facts"), Type.Literal("files"), Type.Literal("learnings")]),
        ),
        force: Type.Optional(Type.Boolean()),
      }),
    },
    async ({ action, collection, force }) => {
      switch (action) {
        case "cleanup": {
          const result = await lifecycle.cleanupExpired(collection ?? "all");
          return `Removed ${result.totalDeleted} expired record(s).`;
        }
        case "reindex_check": {
          const status = await lifecycle.checkReindexNeeded();
          return KNOWLEDGE_COLLECTIONS.map((c) => {
            const s = status.collections[c];
            return `${c}: ${s.needsReindex ? "stale" : "ok"} (stored ${s.storedModel}@${s.storedVersion}, current ${s.currentModel}@${s.currentVersion})`;
          }).join("\n");
        }
        case "reindex": {
          const targets = collection ? [collection] : KNOWLEDGE_COLLECTIONS;
          const lines: string[] = [];
          for (const c of targets) {
            lines.push(`${c}: ${await lifecycle.reindexCollection(c, force === true)} record(s) re-embedded`);
          }
          return lines.join("\n");
        }
        case "status": {
          const status = await lifecycle.getEmbeddingStatus();
          const metrics = knowledge.getRetrievalMetrics();
          return [
            `model: ${status.modelName}@${status.modelVersion} (${status.vectorSize} dims, ${status.status})`,
            `records: facts ${status.collections.facts}, files ${status.collections.files}, learnings ${status.collections.learnings}`,
            `searches: ${metrics.searchRequestsTotal} (${metrics.searchErrorsTotal} failed, avg ${metrics.avgLatencyMs} ms)`,
          ].join("\n");
        }
      }
    },
  );
}

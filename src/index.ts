import { parseConfig } from "./config.js";
import { MemoryEngine } from "./engine.js";
import { initLogger, log } from "./logger.js";
import type { LoggerBackend } from "./logger.js";
import { registerTools } from "./tools.js";
import type { ToolApi } from "./tools.js";

/** Host surface the plugin registers itself against. */
export interface PluginApi extends ToolApi {
  logger: LoggerBackend;
  /** Plugin-specific config block from the host */
  pluginConfig?: Record<string, unknown>;
  registerService(spec: {
    id: string;
    start?: () => Promise<void> | void;
    stop?: () => Promise<void> | void;
  }): void;
}

export default {
  id: "memvault",
  name: "memvault (Long-term Memory)",
  description:
    "Versioned long-term memory for agents: ranked fact and learning retrieval, a typed knowledge graph, reusable skills and TTL maintenance.",
  kind: "memory" as const,

  register(api: PluginApi): MemoryEngine {
    // Debug stays off until the config has been read.
    initLogger(api.logger, false);
    const cfg = parseConfig(api.pluginConfig ?? {});
    initLogger(api.logger, cfg.debug);
    log.info(
      `initialized (debug=${cfg.debug}, backend=${cfg.vectorBackend}, model=${cfg.embeddingModel}, scheduler=${cfg.schedulerEnabled})`,
    );

    const engine = new MemoryEngine(cfg);
    registerTools(api, engine);

    api.registerService({
      id: "memvault",
      start: async () => {
        await engine.start();
        log.info("memory engine started");
      },
      stop: async () => {
        await engine.close();
      },
    });
    return engine;
  },
};

export { parseConfig } from "./config.js";
export { MemoryEngine } from "./engine.js";
export type { MemoryEngineDeps } from "./engine.js";
export { OpenAiEmbedder } from "./embedding.js";
export type { Embedder } from "./embedding.js";
export * from "./errors.js";
export { GraphEngine, VectorEdgeStore } from "./graph.js";
export type { EdgeStore } from "./graph.js";
export { KnowledgeStore } from "./knowledge-store.js";
export { LifecycleManager } from "./lifecycle.js";
export { blendRelevance, buildRankScore, keywordOverlapScore, recencyScore, resolvePriorityScore } from "./ranking.js";
export { SkillEngine } from "./skills.js";
export type * from "./types.js";
export { createVectorIndex, QdrantVectorIndex, SqliteVectorIndex } from "./vector/index.js";
export type { VectorIndex } from "./vector/types.js";

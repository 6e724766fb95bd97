import { AuditLog } from "./audit.js";
import { AUDIT_DIMENSIONS, COLLECTIONS } from "./collections.js";
import { ContradictionDetector } from "./contradiction.js";
import type { Embedder } from "./embedding.js";
import { OpenAiEmbedder } from "./embedding.js";
import { GraphEngine, VectorEdgeStore } from "./graph.js";
import type { EdgeStore } from "./graph.js";
import { KnowledgeStore } from "./knowledge-store.js";
import { LifecycleManager } from "./lifecycle.js";
import { log } from "./logger.js";
import { RetrievalMetrics } from "./metrics.js";
import { SkillEngine } from "./skills.js";
import type { AddLearningInput, AddLearningResult, MemvaultConfig } from "./types.js";
import { createVectorIndex } from "./vector/index.js";
import type { VectorIndex } from "./vector/types.js";

export interface MemoryEngineDeps {
  index?: VectorIndex;
  embedder?: Embedder;
  edgeStore?: EdgeStore;
}

const EMBEDDED_COLLECTIONS = [
  COLLECTIONS.facts,
  COLLECTIONS.files,
  COLLECTIONS.learnings,
  COLLECTIONS.relationships,
  COLLECTIONS.skills,
];

/**
 * Composition root: one index, one embedder and every engine built on them.
 * Collaborators can be injected; otherwise they come from the config.
 */
export class MemoryEngine {
  readonly config: MemvaultConfig;
  readonly index: VectorIndex;
  readonly embedder: Embedder;
  readonly audit: AuditLog;
  readonly metrics: RetrievalMetrics;
  readonly knowledge: KnowledgeStore;
  readonly graph: GraphEngine;
  readonly skills: SkillEngine;
  readonly lifecycle: LifecycleManager;

  private initPromise: Promise<void> | null = null;
  private closed = false;

  constructor(config: MemvaultConfig, deps: MemoryEngineDeps = {}) {
    this.config = config;
    this.index = deps.index ?? createVectorIndex(config);
    this.embedder = deps.embedder ?? new OpenAiEmbedder(config);
    this.audit = new AuditLog(this.index);
    this.metrics = new RetrievalMetrics();
    this.knowledge = new KnowledgeStore({
      index: this.index,
      embedder: this.embedder,
      config,
      audit: this.audit,
      detector: new ContradictionDetector(this.index, COLLECTIONS.learnings, config),
      metrics: this.metrics,
    });
    this.graph = new GraphEngine(deps.edgeStore ?? new VectorEdgeStore(this.index), this.embedder, config);
    this.skills = new SkillEngine(this.index, this.embedder, config);
    this.lifecycle = new LifecycleManager({
      index: this.index,
      embedder: this.embedder,
      config,
      store: this.knowledge,
    });
  }

  /** Creates every collection once; concurrent callers share the same run, a failed run can be retried. */
  initialize(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.createCollections().catch((err: unknown) => {
        this.initPromise = null;
        throw err;
      });
    }
    return this.initPromise;
  }

  private async createCollections(): Promise<void> {
    const dimensions = await this.embedder.dimensions();
    const info = {
      embeddingModel: this.embedder.model,
      embeddingModelVersion: this.embedder.version,
    };
    for (const name of EMBEDDED_COLLECTIONS) {
      await this.index.ensureCollection(name, dimensions, info);
    }
    await this.index.ensureCollection(COLLECTIONS.audit, AUDIT_DIMENSIONS, info);
    log.debug(`collections ready (${this.index.kind}, ${dimensions} dims)`);
  }

  async start(): Promise<void> {
    await this.initialize();
    if (this.config.schedulerEnabled) this.lifecycle.start();
  }

  /** Versioned learning write; reported contradictions are also linked in the graph. */
  async addLearning(input: AddLearningInput): Promise<AddLearningResult> {
    const result = await this.knowledge.addLearning(input);
    if (!result.id || !this.config.graphLinkContradictions) return result;

    for (const contradiction of result.contradictions) {
      try {
        await this.graph.createContradictionRelationship(
          result.id,
          contradiction.id,
          contradiction.similarity,
          result.workspaceId,
        );
      } catch (err) {
        log.warn(
          `linking contradiction ${result.id} -> ${contradiction.id} failed: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }
    return result;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.lifecycle.stop();
    await this.index.close();
  }
}

import { knowledgeCollectionName } from "./collections.js";
import type { Embedder } from "./embedding.js";
import type { KnowledgeStore } from "./knowledge-store.js";
import { log } from "./logger.js";
import type {
  CleanupResult,
  CollectionReindexStatus,
  EmbeddingStatus,
  KnowledgeCollection,
  MemvaultConfig,
  ReindexStatus,
} from "./types.js";
import { KNOWLEDGE_COLLECTIONS } from "./types.js";
import type { VectorIndex } from "./vector/types.js";

const DAY_SECONDS = 86_400;
const REINDEX_BATCH = 64;

export interface LifecycleDeps {
  index: VectorIndex;
  embedder: Embedder;
  config: Pick<MemvaultConfig, "ttlDays" | "reindexCheckIntervalSeconds">;
  /** Runs learning-version reconciliation each tick when present. */
  store?: KnowledgeStore;
}

/**
 * TTL expiry, embedding-model drift detection and reindexing, plus the
 * background loop that runs them.
 */
export class LifecycleManager {
  private readonly index: VectorIndex;
  private readonly embedder: Embedder;
  private readonly config: LifecycleDeps["config"];
  private readonly store: KnowledgeStore | undefined;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private tickInFlight = false;

  constructor(deps: LifecycleDeps) {
    this.index = deps.index;
    this.embedder = deps.embedder;
    this.config = deps.config;
    this.store = deps.store;
  }

  /** Ids whose stored `createdAtTs` is older than `ttlDays`. A TTL of 0 disables expiry. */
  async getExpiredIds(collection: KnowledgeCollection, ttlDays: number, nowMs: number = Date.now()): Promise<string[]> {
    if (ttlDays <= 0) return [];
    const cutoff = nowMs / 1000 - ttlDays * DAY_SECONDS;
    const records = await this.index.get(knowledgeCollectionName(collection), {});
    const expired: string[] = [];
    for (const record of records) {
      const ts = record.metadata.createdAtTs;
      if (typeof ts === "number" && Number.isFinite(ts) && ts < cutoff) expired.push(record.id);
    }
    return expired;
  }

  async cleanupExpired(target: KnowledgeCollection | "all" = "all", nowMs: number = Date.now()): Promise<CleanupResult> {
    const collections = target === "all" ? KNOWLEDGE_COLLECTIONS : [target];
    const result: CleanupResult = { totalDeleted: 0, byCollection: {} };
    for (const collection of collections) {
      const ids = await this.getExpiredIds(collection, this.config.ttlDays[collection], nowMs);
      const deleted = ids.length > 0 ? await this.index.delete(knowledgeCollectionName(collection), ids) : 0;
      result.byCollection[collection] = deleted;
      result.totalDeleted += deleted;
      if (deleted > 0) log.info(`ttl: purged ${deleted} expired ${collection} record(s)`);
    }
    return result;
  }

  private async collectionStatus(collection: KnowledgeCollection): Promise<CollectionReindexStatus> {
    const info = await this.index.collectionInfo(knowledgeCollectionName(collection));
    const status: CollectionReindexStatus = {
      storedModel: info?.embeddingModel ?? "",
      storedVersion: info?.embeddingModelVersion ?? "",
      currentModel: this.embedder.model,
      currentVersion: this.embedder.version,
      needsReindex: false,
    };
    status.needsReindex =
      info !== null &&
      (status.storedModel !== status.currentModel || status.storedVersion !== status.currentVersion);
    return status;
  }

  async checkReindexNeeded(): Promise<ReindexStatus> {
    const facts = await this.collectionStatus("facts");
    const files = await this.collectionStatus("files");
    const learnings = await this.collectionStatus("learnings");
    return {
      needsReindex: facts.needsReindex || files.needsReindex || learnings.needsReindex,
      collections: { facts, files, learnings },
    };
  }

  /**
   * Re-embeds every document of a collection in place (ids and metadata
   * kept) and records the current model. No-op unless forced or stale.
   */
  async reindexCollection(collection: KnowledgeCollection, force = false): Promise<number> {
    const status = await this.collectionStatus(collection);
    if (!force && !status.needsReindex) return 0;

    const name = knowledgeCollectionName(collection);
    const records = await this.index.get(name, {});
    for (let i = 0; i < records.length; i += REINDEX_BATCH) {
      const batch = records.slice(i, i + REINDEX_BATCH);
      const vectors = await this.embedder.embedBatch(batch.map((r) => r.document));
      await this.index.upsert(
        name,
        batch.map((r, j) => ({ id: r.id, vector: vectors[j], document: r.document, metadata: r.metadata })),
      );
    }
    await this.index.setCollectionInfo(name, {
      embeddingModel: this.embedder.model,
      embeddingModelVersion: this.embedder.version,
    });
    log.info(`reindexed ${records.length} ${collection} record(s) with ${this.embedder.model}`);
    return records.length;
  }

  async getEmbeddingStatus(): Promise<EmbeddingStatus> {
    const collections: Record<KnowledgeCollection, number> = { facts: 0, files: 0, learnings: 0 };
    for (const collection of KNOWLEDGE_COLLECTIONS) {
      try {
        collections[collection] = await this.index.count(knowledgeCollectionName(collection));
      } catch (err) {
        log.error(`counting ${collection} failed`, err);
      }
    }
    let vectorSize = 0;
    let status: EmbeddingStatus["status"] = "loaded";
    try {
      vectorSize = await this.embedder.dimensions();
    } catch (err) {
      log.error("embedding model unavailable", err);
      status = "unavailable";
    }
    return {
      modelName: this.embedder.model,
      modelVersion: this.embedder.version,
      vectorSize,
      status,
      collections,
    };
  }

  /** One maintenance pass: expiry, drift check (logged only), version reconciliation. */
  async tick(): Promise<void> {
    const cleanup = await this.cleanupExpired("all");
    if (cleanup.totalDeleted > 0) log.debug(`ttl tick removed ${cleanup.totalDeleted} record(s)`);

    const reindex = await this.checkReindexNeeded();
    if (reindex.needsReindex) {
      const stale = KNOWLEDGE_COLLECTIONS.filter((c) => reindex.collections[c].needsReindex);
      log.warn(`embedding model changed; reindex needed for: ${stale.join(", ")}`);
    }

    if (this.store) await this.store.reconcileLearningVersions();
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule();
    log.info(`lifecycle scheduler started (every ${this.config.reindexCheckIntervalSeconds}s)`);
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    log.info("lifecycle scheduler stopped");
  }

  private schedule(): void {
    if (!this.running || this.timer) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runTick();
    }, this.config.reindexCheckIntervalSeconds * 1000);
    this.timer.unref();
  }

  private runTick(): void {
    if (!this.running || this.tickInFlight) return;
    this.tickInFlight = true;
    this.tick()
      .catch((err) => log.error("lifecycle tick failed", err))
      .finally(() => {
        this.tickInFlight = false;
        this.schedule();
      });
  }
}

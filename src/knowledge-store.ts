import { randomUUID } from "node:crypto";
import { performance } from "node:perf_hooks";
import type { AuditLog, AuditQuery } from "./audit.js";
import { chunkText } from "./chunking.js";
import { COLLECTIONS, knowledgeCollectionName } from "./collections.js";
import type { ContradictionDetector } from "./contradiction.js";
import type { Embedder } from "./embedding.js";
import { ValidationError } from "./errors.js";
import { KeyedMutex } from "./locks.js";
import { log } from "./logger.js";
import { RetrievalMetrics } from "./metrics.js";
import { blendRelevance, buildRankScore, keywordOverlapScore, resolvePriorityScore, roundScore } from "./ranking.js";
import type { KnowledgeMetadataInput } from "./schemas.js";
import { parseMetadataInput, StoredKnowledgeMetadataSchema } from "./schemas.js";
import { epochSeconds, isBlank, isLearningCategory, learningKey, normalizeText, preview, stripNul } from "./text.js";
import type {
  AddLearningInput,
  AddLearningResult,
  AuditEvent,
  AuditEventType,
  FactSearchOptions,
  FileSummary,
  KnowledgeCollection,
  KnowledgeEntry,
  KnowledgeMetadata,
  LearningCategory,
  LearningSearchOptions,
  LearningStats,
  MemvaultConfig,
  RetrievalMetricsSnapshot,
  SearchHit,
} from "./types.js";
import { KNOWLEDGE_COLLECTIONS } from "./types.js";
import type { MetadataFilter, QueryHit, StoredRecord, VectorIndex } from "./vector/types.js";

export interface KnowledgeStoreDeps {
  index: VectorIndex;
  embedder: Embedder;
  config: MemvaultConfig;
  audit: AuditLog;
  detector?: ContradictionDetector;
  metrics?: RetrievalMetrics;
}

export interface LearningFilter {
  category?: string;
  workspaceId?: string;
}

function emptyLearningResult(): AddLearningResult {
  return {
    id: "",
    version: 0,
    learningKey: "",
    workspaceId: "",
    conflictDetected: false,
    previousVersionId: null,
    contradictions: [],
  };
}

function resolveCategory(raw: string | undefined): LearningCategory {
  const category = (raw ?? "general").trim().toLowerCase();
  if (isLearningCategory(category)) return category;
  log.warn(`unknown learning category '${raw ?? ""}'; using 'general'`);
  return "general";
}

function decodeEntry(record: StoredRecord, collection: KnowledgeCollection): KnowledgeEntry | null {
  const parsed = StoredKnowledgeMetadataSchema.safeParse(record.metadata);
  if (!parsed.success) {
    log.debug(`skipping undecodable ${collection} record ${record.id}`);
    return null;
  }
  return { id: record.id, text: record.document, collection, metadata: parsed.data };
}

function decodeAll(records: StoredRecord[], collection: KnowledgeCollection): KnowledgeEntry[] {
  const out: KnowledgeEntry[] = [];
  for (const record of records) {
    const entry = decodeEntry(record, collection);
    if (entry) out.push(entry);
  }
  return out;
}

/** Newest active entry first: highest version, then latest creation. */
function compareNewestFirst(a: KnowledgeEntry, b: KnowledgeEntry): number {
  if (a.metadata.version !== b.metadata.version) return b.metadata.version - a.metadata.version;
  if (a.metadata.createdAtTs !== b.metadata.createdAtTs) return b.metadata.createdAtTs - a.metadata.createdAtTs;
  return b.metadata.createdAt.localeCompare(a.metadata.createdAt);
}

/**
 * Facts, file chunks and per-model learnings: validation, embedding,
 * versioning, soft delete, file management and ranked search.
 */
export class KnowledgeStore {
  private readonly index: VectorIndex;
  private readonly embedder: Embedder;
  private readonly config: MemvaultConfig;
  private readonly audit: AuditLog;
  private readonly detector: ContradictionDetector | undefined;
  private readonly metrics: RetrievalMetrics;
  private readonly learningLocks = new KeyedMutex();

  constructor(deps: KnowledgeStoreDeps) {
    this.index = deps.index;
    this.embedder = deps.embedder;
    this.config = deps.config;
    this.audit = deps.audit;
    this.detector = deps.detector;
    this.metrics = deps.metrics ?? new RetrievalMetrics();
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  /** Strips NUL bytes; returns null for blank text and throws when oversized. */
  private cleanText(raw: string | undefined | null, what: string): string | null {
    if (raw === undefined || raw === null || isBlank(raw)) {
      log.warn(`ignoring blank ${what}`);
      return null;
    }
    if (raw.length > this.config.maxTextLength) {
      throw new ValidationError(
        `${what} exceeds the ${this.config.maxTextLength}-character limit (${raw.length})`,
      );
    }
    const text = stripNul(raw);
    if (isBlank(text)) {
      log.warn(`ignoring blank ${what}`);
      return null;
    }
    return text;
  }

  private newMetadata(input: KnowledgeMetadataInput, workspaceId: string, now: Date): KnowledgeMetadata {
    return {
      ...input,
      workspaceId,
      status: "active",
      version: 1,
      createdAt: now.toISOString(),
      createdAtTs: epochSeconds(now),
    };
  }

  /** Returns the new id, or "" when the text is blank. */
  async addFact(text: string, metadata?: Record<string, unknown>): Promise<string> {
    const clean = this.cleanText(text, "fact");
    if (clean === null) return "";
    const input = parseMetadataInput(metadata);
    const workspaceId = input.workspaceId ?? "";

    const id = randomUUID();
    const vector = await this.embedder.embed(clean);
    await this.index.upsert(COLLECTIONS.facts, [
      { id, vector, document: clean, metadata: this.newMetadata(input, workspaceId, new Date()) },
    ]);
    log.debug(`added fact ${id}: ${preview(clean)}`);
    await this.audit.append("fact_added", { workspaceId, entryId: id });
    return id;
  }

  /** Returns the new id, or "" when the text is blank. `fileName` is required. */
  async addFileChunk(text: string, metadata: Record<string, unknown>): Promise<string> {
    const clean = this.cleanText(text, "file chunk");
    if (clean === null) return "";
    const input = parseMetadataInput(metadata);
    const fileName = input.fileName?.trim();
    if (!fileName) throw new ValidationError("file chunk metadata requires fileName");
    const workspaceId = input.workspaceId ?? "";

    const id = randomUUID();
    const vector = await this.embedder.embed(clean);
    await this.index.upsert(COLLECTIONS.files, [
      {
        id,
        vector,
        document: clean,
        metadata: { ...this.newMetadata(input, workspaceId, new Date()), fileName, folder: input.folder ?? "" },
      },
    ]);
    log.debug(`added chunk ${id} of ${fileName}`);
    await this.audit.append("file_chunk_added", {
      workspaceId,
      entryId: id,
      details: { fileName, chunkIndex: input.chunkIndex },
    });
    return id;
  }

  /** Split content with the configured chunk size/overlap and store every chunk. */
  async addFile(fileName: string, content: string, metadata: Record<string, unknown> = {}): Promise<string[]> {
    const name = fileName.trim();
    if (!name) throw new ValidationError("fileName is required");
    if (content.length > this.config.maxTextLength) {
      throw new ValidationError(`file ${name} exceeds the ${this.config.maxTextLength}-character limit`);
    }
    const fileId = typeof metadata.fileId === "string" && metadata.fileId ? metadata.fileId : randomUUID();
    const chunks = chunkText(stripNul(content), {
      chunkSize: this.config.chunkSize,
      chunkOverlap: this.config.chunkOverlap,
    });

    const ids: string[] = [];
    for (const chunk of chunks) {
      const id = await this.addFileChunk(chunk.content, {
        ...metadata,
        fileName: name,
        fileId,
        chunkIndex: chunk.index,
      });
      if (id) ids.push(id);
    }
    log.debug(`stored ${ids.length} chunk(s) for ${name}`);
    return ids;
  }

  private async findActiveLearning(key: string): Promise<KnowledgeEntry | null> {
    const records = await this.index.get(COLLECTIONS.learnings, {
      filter: { learningKey: key, status: "active" },
    });
    const active = decodeAll(records, "learnings").sort(compareNewestFirst);
    return active[0] ?? null;
  }

  /**
   * Versioned write: stores the new entry, then supersedes the active entry
   * of the same learning key. Contradictions are checked against other active
   * learnings of the model.
   * Blank text yields an empty-id result.
   */
  async addLearning(input: AddLearningInput): Promise<AddLearningResult> {
    const text = this.cleanText(input.text, "learning");
    if (text === null) return emptyLearningResult();
    const category = resolveCategory(input.category);
    const extra = parseMetadataInput(input.metadata);
    const workspaceId = input.workspaceId ?? extra.workspaceId ?? "";
    const key = learningKey(workspaceId, input.modelName, category);
    const vector = await this.embedder.embed(text);

    const result = await this.learningLocks.runExclusive(key, async () => {
      const id = randomUUID();
      const now = new Date();
      const nowIso = now.toISOString();

      const previous = await this.findActiveLearning(key);
      let version = 1;
      let conflictDetected = false;
      if (previous) {
        conflictDetected = normalizeText(previous.text) !== normalizeText(text);
        version = previous.metadata.version + 1;
      }

      const contradictions = this.detector
        ? await this.detector.detect({
            text,
            vector,
            modelName: input.modelName,
            workspaceId,
            excludeId: previous?.id ?? null,
          })
        : [];

      const metadata: KnowledgeMetadata = {
        ...this.newMetadata(extra, workspaceId, now),
        agentName: input.agentName,
        modelName: input.modelName,
        category,
        learningKey: key,
        version,
        conflictDetected,
        contradictions,
        ...(previous ? { previousVersionId: previous.id } : {}),
      };
      // New version first: a failure in between leaves two active entries,
      // which reconcileLearningVersions resolves toward the higher version.
      await this.index.upsert(COLLECTIONS.learnings, [{ id, vector, document: text, metadata }]);
      if (previous) {
        await this.index.updateMetadata(
          COLLECTIONS.learnings,
          [previous.id],
          [{ ...previous.metadata, status: "superseded", supersededAt: nowIso, supersededBy: id, updatedAt: nowIso }],
        );
      }

      return {
        id,
        version,
        learningKey: key,
        workspaceId,
        conflictDetected,
        previousVersionId: previous?.id ?? null,
        contradictions,
      };
    });

    log.info(`learning v${result.version} stored for ${input.modelName} (${category}): ${preview(text)}`);
    if (result.previousVersionId) {
      await this.audit.append("learning_superseded", {
        modelName: input.modelName,
        workspaceId,
        entryId: result.previousVersionId,
        details: { supersededBy: result.id, learningKey: key },
      });
    }
    await this.audit.append("learning_added", {
      modelName: input.modelName,
      workspaceId,
      entryId: result.id,
      details: {
        learningKey: key,
        version: result.version,
        category,
        conflictDetected: result.conflictDetected,
        contradictions: result.contradictions.length,
      },
    });
    return result;
  }

  // ---------------------------------------------------------------------------
  // Search
  // ---------------------------------------------------------------------------

  private toHit(query: string, hit: QueryHit, collection: KnowledgeCollection): SearchHit | null {
    const entry = decodeEntry(hit, collection);
    if (!entry || entry.metadata.status !== "active") return null;
    const similarity = Math.max(0, 1 - hit.distance);
    const relevance = blendRelevance(
      similarity,
      keywordOverlapScore(query, hit.document),
      this.config.blendWeights,
    );
    return {
      id: hit.id,
      text: hit.document,
      score: buildRankScore(relevance, entry.metadata, this.config),
      similarity: roundScore(similarity),
      relevance,
      source: collection,
      metadata: entry.metadata,
    };
  }

  private async rankedSearch(
    query: string,
    targets: Array<{ collection: KnowledgeCollection; filter: MetadataFilter }>,
    topK: number,
    minPriority: string | undefined,
  ): Promise<SearchHit[]> {
    const started = performance.now();
    try {
      const vector = await this.embedder.embed(query);
      const hits: SearchHit[] = [];
      for (const target of targets) {
        const raw = await this.index.query(knowledgeCollectionName(target.collection), vector, {
          filter: target.filter,
          limit: topK,
        });
        for (const h of raw) {
          const hit = this.toHit(query, h, target.collection);
          if (hit) hits.push(hit);
        }
      }

      hits.sort((a, b) => b.score - a.score);
      const floor = minPriority !== undefined ? resolvePriorityScore(minPriority) : null;
      const seen = new Set<string>();
      const results: SearchHit[] = [];
      for (const hit of hits) {
        if (seen.has(hit.text)) continue;
        seen.add(hit.text);
        if (floor !== null && resolvePriorityScore(hit.metadata.priority) < floor) continue;
        results.push(hit);
      }

      const limited = results.slice(0, topK);
      this.metrics.record(performance.now() - started, limited.length);
      return limited;
    } catch (err) {
      this.metrics.record(performance.now() - started, 0, true);
      log.error("search failed", err);
      return [];
    }
  }

  async searchFacts(query: string, options: FactSearchOptions = {}): Promise<SearchHit[]> {
    const filter: MetadataFilter = { status: "active" };
    if (options.agentName) filter.agentName = options.agentName;
    if (options.workspaceId !== undefined) filter.workspaceId = options.workspaceId;

    const targets: Array<{ collection: KnowledgeCollection; filter: MetadataFilter }> = [
      { collection: "facts", filter },
    ];
    if (options.includeFiles) targets.push({ collection: "files", filter });
    return this.rankedSearch(query, targets, options.topK ?? this.config.topK, options.minPriority);
  }

  async searchLearnings(query: string, options: LearningSearchOptions): Promise<SearchHit[]> {
    const filter: MetadataFilter = { modelName: options.modelName, status: "active" };
    if (options.workspaceId !== undefined) filter.workspaceId = options.workspaceId;
    if (options.category) filter.category = options.category;
    return this.rankedSearch(
      query,
      [{ collection: "learnings", filter }],
      options.topK ?? this.config.topK,
      options.minPriority,
    );
  }

  getRetrievalMetrics(): RetrievalMetricsSnapshot {
    return this.metrics.snapshot();
  }

  // ---------------------------------------------------------------------------
  // Learning lifecycle
  // ---------------------------------------------------------------------------

  private learningFilter(modelName: string, filter: LearningFilter): MetadataFilter {
    const out: MetadataFilter = { modelName };
    if (filter.category) out.category = filter.category;
    if (filter.workspaceId !== undefined) out.workspaceId = filter.workspaceId;
    return out;
  }

  private async rewrite(
    collection: KnowledgeCollection,
    entries: KnowledgeEntry[],
    patch: (metadata: KnowledgeMetadata) => KnowledgeMetadata,
  ): Promise<number> {
    if (entries.length === 0) return 0;
    await this.index.updateMetadata(
      knowledgeCollectionName(collection),
      entries.map((e) => e.id),
      entries.map((e) => patch(e.metadata)),
    );
    return entries.length;
  }

  /** Soft-deletes active learnings only; repeated calls report 0. */
  async deleteModelLearnings(modelName: string, filter: LearningFilter = {}): Promise<number> {
    const records = await this.index.get(COLLECTIONS.learnings, {
      filter: { ...this.learningFilter(modelName, filter), status: "active" },
    });
    const active = decodeAll(records, "learnings").filter((e) => e.metadata.status === "active");
    const now = new Date().toISOString();
    const deleted = await this.rewrite("learnings", active, (m) => ({
      ...m,
      status: "deleted",
      deletedAt: now,
      updatedAt: now,
    }));
    if (deleted > 0) {
      log.info(`soft-deleted ${deleted} learning(s) of ${modelName}`);
      await this.audit.append("learnings_deleted", {
        modelName,
        workspaceId: filter.workspaceId,
        details: { count: deleted, category: filter.category },
      });
    }
    return deleted;
  }

  /** Every version of every key, ordered by learning key then version. */
  async listVersions(modelName: string, filter: LearningFilter = {}): Promise<KnowledgeEntry[]> {
    try {
      const records = await this.index.get(COLLECTIONS.learnings, {
        filter: this.learningFilter(modelName, filter),
      });
      return decodeAll(records, "learnings").sort((a, b) => {
        const byKey = (a.metadata.learningKey ?? "").localeCompare(b.metadata.learningKey ?? "");
        return byKey !== 0 ? byKey : a.metadata.version - b.metadata.version;
      });
    } catch (err) {
      log.error(`listing learning versions of ${modelName} failed`, err);
      return [];
    }
  }

  /**
   * Repairs keys left with more than one active entry by concurrent writers
   * outside this process or by an interrupted supersede. Keeps the newest,
   * supersedes the rest.
   */
  async reconcileLearningVersions(): Promise<number> {
    const records = await this.index.get(COLLECTIONS.learnings, { filter: { status: "active" } });
    const byKey = new Map<string, KnowledgeEntry[]>();
    for (const entry of decodeAll(records, "learnings")) {
      const key = entry.metadata.learningKey;
      if (!key) continue;
      const group = byKey.get(key) ?? [];
      group.push(entry);
      byKey.set(key, group);
    }

    let superseded = 0;
    for (const [key, group] of byKey) {
      if (group.length < 2) continue;
      const [keeper, ...stale] = [...group].sort(compareNewestFirst);
      const now = new Date().toISOString();
      const changed = await this.rewrite("learnings", stale, (m) => ({
        ...m,
        status: "superseded",
        supersededAt: now,
        supersededBy: keeper.id,
        updatedAt: now,
      }));
      superseded += changed;
      log.warn(`reconciled ${changed} duplicate active version(s) of ${key}`);
      await this.audit.append("learning_versions_reconciled", {
        modelName: keeper.metadata.modelName,
        workspaceId: keeper.metadata.workspaceId,
        entryId: keeper.id,
        details: { learningKey: key, superseded: changed },
      });
    }
    return superseded;
  }

  async getLearningStats(): Promise<LearningStats> {
    const stats: LearningStats = { totalLearnings: 0, activeLearnings: 0, byModel: {}, byCategory: {} };
    try {
      const entries = decodeAll(await this.index.get(COLLECTIONS.learnings, {}), "learnings");
      stats.totalLearnings = entries.length;
      for (const entry of entries) {
        if (entry.metadata.status !== "active") continue;
        stats.activeLearnings += 1;
        const model = entry.metadata.modelName ?? "unknown";
        const category = entry.metadata.category ?? "general";
        stats.byModel[model] = (stats.byModel[model] ?? 0) + 1;
        stats.byCategory[category] = (stats.byCategory[category] ?? 0) + 1;
      }
    } catch (err) {
      log.error("learning stats failed", err);
    }
    return stats;
  }

  async getStats(): Promise<Record<KnowledgeCollection, number>> {
    const stats: Record<KnowledgeCollection, number> = { facts: 0, files: 0, learnings: 0 };
    for (const collection of KNOWLEDGE_COLLECTIONS) {
      try {
        stats[collection] = await this.index.count(knowledgeCollectionName(collection));
      } catch (err) {
        log.error(`counting ${collection} failed`, err);
      }
    }
    return stats;
  }

  async listAuditLogs(query: AuditQuery = {}): Promise<AuditEvent[]> {
    return this.audit.list(query);
  }

  // ---------------------------------------------------------------------------
  // File management
  // ---------------------------------------------------------------------------

  private async fileChunks(fileName: string, workspaceId?: string): Promise<KnowledgeEntry[]> {
    const filter: MetadataFilter = { fileName };
    if (workspaceId !== undefined) filter.workspaceId = workspaceId;
    return decodeAll(await this.index.get(COLLECTIONS.files, { filter }), "files");
  }

  private async changeFile(
    eventType: AuditEventType,
    fileName: string,
    workspaceId: string | undefined,
    select: (entry: KnowledgeEntry) => boolean,
    patch: (metadata: KnowledgeMetadata) => KnowledgeMetadata,
    details: Record<string, string | boolean> = {},
  ): Promise<number> {
    const name = fileName.trim();
    if (!name) return 0;
    const chunks = (await this.fileChunks(name, workspaceId)).filter(select);
    const changed = await this.rewrite("files", chunks, patch);
    if (changed > 0) {
      await this.audit.append(eventType, {
        workspaceId,
        entryId: chunks[0].metadata.fileId ?? chunks[0].id,
        details: { fileName: name, chunks: changed, ...details },
      });
    }
    return changed;
  }

  async softDeleteFile(fileName: string, workspaceId?: string): Promise<number> {
    const now = new Date().toISOString();
    return this.changeFile(
      "file_deleted",
      fileName,
      workspaceId,
      (e) => e.metadata.status !== "deleted",
      (m) => ({ ...m, status: "deleted", deletedAt: now, updatedAt: now }),
    );
  }

  async restoreFile(fileName: string, workspaceId?: string): Promise<number> {
    const now = new Date().toISOString();
    return this.changeFile(
      "file_restored",
      fileName,
      workspaceId,
      (e) => e.metadata.status === "deleted",
      ({ deletedAt: _deletedAt, ...m }) => ({ ...m, status: "active", updatedAt: now }),
    );
  }

  /** Pinning raises the priority tag to `pinned`; unpinning resets it to `normal`. */
  async pinFile(fileName: string, pinned: boolean, workspaceId?: string): Promise<number> {
    const now = new Date().toISOString();
    return this.changeFile(
      "file_pinned",
      fileName,
      workspaceId,
      () => true,
      ({ pinnedAt: _pinnedAt, ...m }) => ({
        ...m,
        pinned,
        priority: pinned ? "pinned" : "normal",
        ...(pinned ? { pinnedAt: now } : {}),
        updatedAt: now,
      }),
      { pinned },
    );
  }

  async moveFile(fileName: string, folder: string, workspaceId?: string): Promise<number> {
    const target = folder.trim();
    const now = new Date().toISOString();
    return this.changeFile(
      "file_moved",
      fileName,
      workspaceId,
      () => true,
      (m) => ({ ...m, folder: target, updatedAt: now }),
      { folder: target },
    );
  }

  async renameFile(oldName: string, newName: string, workspaceId?: string): Promise<number> {
    const target = newName.trim();
    if (!target) return 0;
    const now = new Date().toISOString();
    return this.changeFile(
      "file_renamed",
      oldName,
      workspaceId,
      () => true,
      (m) => ({ ...m, fileName: target, updatedAt: now }),
      { newFileName: target },
    );
  }

  /** One row per file, soft-deleted files included. */
  async listFiles(workspaceId?: string): Promise<FileSummary[]> {
    try {
      const filter: MetadataFilter = {};
      if (workspaceId !== undefined) filter.workspaceId = workspaceId;
      const entries = decodeAll(await this.index.get(COLLECTIONS.files, { filter }), "files");

      const files = new Map<string, FileSummary>();
      for (const entry of entries) {
        const name = entry.metadata.fileName ?? "";
        if (!name) continue;
        const summary = files.get(name) ?? {
          fileName: name,
          chunksCount: 0,
          folder: entry.metadata.folder ?? "",
          pinned: false,
          status: "deleted",
        };
        summary.chunksCount += 1;
        if (entry.metadata.pinned) summary.pinned = true;
        if (entry.metadata.status === "active") summary.status = "active";
        files.set(name, summary);
      }
      return [...files.values()].sort((a, b) => a.fileName.localeCompare(b.fileName));
    } catch (err) {
      log.error("listing files failed", err);
      return [];
    }
  }

  /** Hard delete of every chunk of a file. */
  async purgeFile(fileName: string, workspaceId?: string): Promise<number> {
    const name = fileName.trim();
    if (!name) return 0;
    const chunks = await this.fileChunks(name, workspaceId);
    return this.purgeChunks(chunks, { fileName: name }, workspaceId);
  }

  async purgeFileChunks(fileId: string): Promise<number> {
    const id = fileId.trim();
    if (!id) return 0;
    const chunks = decodeAll(await this.index.get(COLLECTIONS.files, { filter: { fileId: id } }), "files");
    return this.purgeChunks(chunks, { fileId: id }, undefined);
  }

  private async purgeChunks(
    chunks: KnowledgeEntry[],
    details: Record<string, string>,
    workspaceId: string | undefined,
  ): Promise<number> {
    if (chunks.length === 0) return 0;
    const removed = await this.index.delete(
      COLLECTIONS.files,
      chunks.map((c) => c.id),
    );
    if (removed > 0) {
      await this.audit.append("file_purged", {
        workspaceId,
        entryId: chunks[0].metadata.fileId ?? chunks[0].id,
        details: { ...details, chunks: removed },
      });
    }
    return removed;
  }
}

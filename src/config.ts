import path from "node:path";
import os from "node:os";
import { UnsupportedBackendError } from "./errors.js";
import { log } from "./logger.js";
import type {
  BlendWeights,
  CollectionTtlDays,
  MemvaultConfig,
  RankWeights,
  VectorBackendKind,
} from "./types.js";

const DEFAULT_SQLITE_PATH = path.join(
  process.env.HOME ?? os.homedir(),
  ".memvault",
  "memvault.sqlite",
);

export const SUPPORTED_VECTOR_BACKENDS: readonly VectorBackendKind[] = ["sqlite", "qdrant"];

export const DEFAULT_RELATIONSHIP_TYPES = [
  "relates_to",
  "contradicts",
  "depends_on",
  "supersedes",
  "derived_from",
];

export const DEFAULT_RANK_WEIGHTS: RankWeights = {
  relevance: 0.5,
  importance: 0.15,
  reliability: 0.1,
  recency: 0.1,
  frequency: 0.05,
  priority: 0.1,
};

export const DEFAULT_BLEND_WEIGHTS: BlendWeights = { semantic: 0.8, keyword: 0.2 };

export const DEFAULT_TTL_DAYS: CollectionTtlDays = { facts: 90, files: 30, learnings: 0 };

function resolveEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
    const envValue = process.env[envVar];
    if (!envValue) {
      throw new Error(`Environment variable ${envVar} is not set`);
    }
    return envValue;
  });
}

function asRecord(value: unknown): Record<string, unknown> {
  return value && typeof value === "object" && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : {};
}

function stringOr(value: unknown, envValue: string | undefined, fallback: string): string {
  if (typeof value === "string" && value.length > 0) return resolveEnvVars(value);
  if (envValue && envValue.length > 0) return envValue;
  return fallback;
}

function optionalString(value: unknown, envValue: string | undefined): string | undefined {
  if (typeof value === "string" && value.length > 0) return resolveEnvVars(value);
  return envValue && envValue.length > 0 ? envValue : undefined;
}

function numberOr(value: unknown, envValue: string | undefined, fallback: number): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (envValue !== undefined && envValue.trim().length > 0) {
    const parsed = Number(envValue);
    if (Number.isFinite(parsed)) return parsed;
  }
  return fallback;
}

function weight(value: unknown, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  if (typeof value === "number" && Number.isFinite(value) && value >= 0) return value;
  log.warn(`ignoring invalid weight ${name}=${String(value)}; using ${fallback}`);
  return fallback;
}

function unitInterval(value: unknown, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  if (typeof value === "number" && value >= 0 && value <= 1) return value;
  log.warn(`ignoring ${name}=${String(value)} outside [0,1]; using ${fallback}`);
  return fallback;
}

function positiveInt(value: unknown, envValue: string | undefined, fallback: number): number {
  const n = Math.floor(numberOr(value, envValue, fallback));
  return n > 0 ? n : fallback;
}

/** Longest delay setTimeout accepts, in whole seconds. */
export const MAX_SCHEDULER_INTERVAL_SECONDS = 2_147_483;

function schedulerInterval(seconds: number): number {
  if (seconds <= MAX_SCHEDULER_INTERVAL_SECONDS) return seconds;
  log.warn(`reindexCheckIntervalSeconds=${seconds} exceeds the timer limit; using ${MAX_SCHEDULER_INTERVAL_SECONDS}`);
  return MAX_SCHEDULER_INTERVAL_SECONDS;
}

/**
 * Normalize and validate the vector backend selection.
 * An unknown backend is fatal: the engine must not start half-configured.
 */
export function resolveVectorBackend(raw: string | undefined): VectorBackendKind {
  const normalized = (raw ?? "sqlite").trim().toLowerCase();
  for (const backend of SUPPORTED_VECTOR_BACKENDS) {
    if (backend === normalized) return backend;
  }
  throw new UnsupportedBackendError(raw ?? "", SUPPORTED_VECTOR_BACKENDS);
}

function normalizeBaseUrl(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    log.warn(`ignoring invalid URL: ${trimmed}`);
    return undefined;
  }
  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    log.warn(`ignoring URL with unsupported scheme (${parsed.protocol.replace(":", "")})`);
    return undefined;
  }
  return parsed.toString().replace(/\/+$/, "");
}

function parseRankWeights(raw: unknown): RankWeights {
  const w = asRecord(raw);
  return {
    relevance: weight(w.relevance, DEFAULT_RANK_WEIGHTS.relevance, "rankWeights.relevance"),
    importance: weight(w.importance, DEFAULT_RANK_WEIGHTS.importance, "rankWeights.importance"),
    reliability: weight(w.reliability, DEFAULT_RANK_WEIGHTS.reliability, "rankWeights.reliability"),
    recency: weight(w.recency, DEFAULT_RANK_WEIGHTS.recency, "rankWeights.recency"),
    frequency: weight(w.frequency, DEFAULT_RANK_WEIGHTS.frequency, "rankWeights.frequency"),
    priority: weight(w.priority, DEFAULT_RANK_WEIGHTS.priority, "rankWeights.priority"),
  };
}

function parseBlendWeights(raw: unknown): BlendWeights {
  const w = asRecord(raw);
  return {
    semantic: weight(w.semantic, DEFAULT_BLEND_WEIGHTS.semantic, "blendWeights.semantic"),
    keyword: weight(w.keyword, DEFAULT_BLEND_WEIGHTS.keyword, "blendWeights.keyword"),
  };
}

function parseTtlDays(raw: unknown): CollectionTtlDays {
  const t = asRecord(raw);
  const env = process.env;
  const days = (value: unknown, envValue: string | undefined, fallback: number): number =>
    Math.max(0, Math.floor(numberOr(value, envValue, fallback)));
  return {
    facts: days(t.facts, env.MEMVAULT_FACTS_TTL_DAYS, DEFAULT_TTL_DAYS.facts),
    files: days(t.files, env.MEMVAULT_FILES_TTL_DAYS, DEFAULT_TTL_DAYS.files),
    learnings: days(t.learnings, env.MEMVAULT_LEARNINGS_TTL_DAYS, DEFAULT_TTL_DAYS.learnings),
  };
}

export function parseConfig(raw: unknown): MemvaultConfig {
  const cfg = asRecord(raw);
  const env = process.env;

  const rawBackend =
    typeof cfg.vectorBackend === "string" ? cfg.vectorBackend : env.MEMVAULT_VECTOR_BACKEND;
  const vectorBackend = resolveVectorBackend(rawBackend);

  const relationshipTypes = Array.isArray(cfg.graphRelationshipTypes)
    ? cfg.graphRelationshipTypes.filter((t): t is string => typeof t === "string" && t.trim().length > 0)
    : [];

  const embeddingDimensions = numberOr(cfg.embeddingDimensions, env.MEMVAULT_EMBEDDING_DIMENSIONS, 0);

  return {
    debug: cfg.debug === true || env.MEMVAULT_DEBUG === "true",
    vectorBackend,
    sqlitePath: stringOr(cfg.sqlitePath, env.MEMVAULT_SQLITE_PATH, DEFAULT_SQLITE_PATH),
    qdrantUrl:
      normalizeBaseUrl(stringOr(cfg.qdrantUrl, env.QDRANT_URL, "http://localhost:6333")) ??
      "http://localhost:6333",
    qdrantApiKey: optionalString(cfg.qdrantApiKey, env.QDRANT_API_KEY),
    embeddingModel: stringOr(cfg.embeddingModel, env.MEMVAULT_EMBEDDING_MODEL, "text-embedding-3-small"),
    embeddingModelVersion: stringOr(cfg.embeddingModelVersion, env.MEMVAULT_EMBEDDING_MODEL_VERSION, "1"),
    embeddingDimensions: embeddingDimensions > 0 ? Math.floor(embeddingDimensions) : undefined,
    embeddingApiKey: optionalString(cfg.embeddingApiKey, env.OPENAI_API_KEY),
    embeddingBaseUrl: normalizeBaseUrl(optionalString(cfg.embeddingBaseUrl, env.OPENAI_BASE_URL)),
    chunkSize: positiveInt(cfg.chunkSize, env.MEMVAULT_CHUNK_SIZE, 500),
    chunkOverlap: Math.max(0, Math.floor(numberOr(cfg.chunkOverlap, env.MEMVAULT_CHUNK_OVERLAP, 50))),
    maxTextLength: positiveInt(cfg.maxTextLength, undefined, 10 * 1024 * 1024),
    topK: positiveInt(cfg.topK, env.MEMVAULT_TOP_K, 5),
    rankWeights: parseRankWeights(cfg.rankWeights),
    recencyWindowDays: positiveInt(cfg.recencyWindowDays, env.MEMVAULT_RECENCY_WINDOW_DAYS, 30),
    blendWeights: parseBlendWeights(cfg.blendWeights),
    contradictionSimilarityThreshold: unitInterval(
      cfg.contradictionSimilarityThreshold,
      0.85,
      "contradictionSimilarityThreshold",
    ),
    contradictionCandidates: positiveInt(cfg.contradictionCandidates, undefined, 5),
    graphLinkContradictions: cfg.graphLinkContradictions !== false,
    skillConfidenceDefault: unitInterval(cfg.skillConfidenceDefault, 0.5, "skillConfidenceDefault"),
    skillConfidenceMin: unitInterval(cfg.skillConfidenceMin, 0.3, "skillConfidenceMin"),
    skillSearchTopK: positiveInt(cfg.skillSearchTopK, undefined, 5),
    skillUsageBoostRate: unitInterval(cfg.skillUsageBoostRate, 0.05, "skillUsageBoostRate"),
    graphMaxDepth: positiveInt(cfg.graphMaxDepth, undefined, 3),
    graphMaxNeighbors: positiveInt(cfg.graphMaxNeighbors, undefined, 50),
    graphMaxNodes: positiveInt(cfg.graphMaxNodes, undefined, 50),
    graphRelationshipTypes: relationshipTypes.length > 0 ? relationshipTypes : [...DEFAULT_RELATIONSHIP_TYPES],
    ttlDays: parseTtlDays(cfg.ttlDays),
    reindexCheckIntervalSeconds: schedulerInterval(
      positiveInt(cfg.reindexCheckIntervalSeconds, env.MEMVAULT_REINDEX_CHECK_INTERVAL, 3600),
    ),
    schedulerEnabled: cfg.schedulerEnabled !== false,
  };
}
